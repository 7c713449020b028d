import fs from "node:fs/promises";
import path from "node:path";
import { setTimeout as sleep } from "node:timers/promises";
import { parseArgs } from "node:util";
import { fetch, FormData, File } from "undici";
import { z } from "zod";
import { JOB_STATUSES, MAX_EXPECTED_SPEAKERS, MIN_EXPECTED_SPEAKERS, RESPONSE_FORMATS } from "./constants.js";
import { errorMessage } from "./errors.js";
import type { ResponseFormat } from "./types.js";

const AUDIO_TYPES: Record<string, string> = {
  ".wav": "audio/wav",
  ".mp3": "audio/mpeg",
  ".m4a": "audio/mp4",
  ".flac": "audio/flac",
  ".ogg": "audio/ogg",
  ".webm": "audio/webm",
};

const SubmitResponseSchema = z.object({ jobId: z.string().min(1) });

const JobViewSchema = z
  .object({
    jobId: z.string(),
    status: z.enum(JOB_STATUSES),
    progress: z.string().nullable(),
    progressPercent: z.number().nullable(),
    error: z.string().nullable(),
    result: z.unknown(),
  })
  .passthrough();

export type RemoteJob = z.infer<typeof JobViewSchema>;

const StructuredSummarySchema = z.object({
  audioDuration: z.number(),
  speakersDetected: z.number(),
  utterances: z.array(z.unknown()),
  llmEnhancements: z.unknown().optional(),
});

export interface SubmitOptions {
  expectedSpeakers?: number;
  responseFormat: ResponseFormat;
  enableLlmAnalysis: boolean;
}

export interface WaitOptions {
  pollIntervalMs: number;
  onProgress?: (job: RemoteJob) => void;
}

/**
 * HTTP client for the /v1/transcribe routes: submit an upload, then poll
 * the job until it reaches a terminal state.
 */
export class TranscriptionClient {
  constructor(
    private readonly baseUrl: string,
    private readonly apiKey?: string
  ) {}

  private headers(): Record<string, string> {
    return this.apiKey ? { "x-api-key": this.apiKey } : {};
  }

  private async request(pathname: string, init: { method?: string; body?: FormData } = {}): Promise<unknown> {
    const res = await fetch(`${this.baseUrl}${pathname}`, { ...init, headers: this.headers() });
    const text = await res.text();
    if (!res.ok) {
      throw new Error(`${init.method ?? "GET"} ${pathname} failed: ${res.status} ${text}`);
    }
    return JSON.parse(text);
  }

  async submit(filePath: string, opts: SubmitOptions): Promise<string> {
    const audio = await fs.readFile(filePath);
    const name = path.basename(filePath);
    const type = AUDIO_TYPES[path.extname(name).toLowerCase()] ?? "audio/wav";

    const form = new FormData();
    form.append("response_format", opts.responseFormat);
    form.append("enable_llm_analysis", String(opts.enableLlmAnalysis));
    if (opts.expectedSpeakers !== undefined) {
      form.append("expected_speakers", String(opts.expectedSpeakers));
    }
    form.append("file", new File([audio], name, { type }));

    const body = SubmitResponseSchema.parse(await this.request("/v1/transcribe", { method: "POST", body: form }));
    return body.jobId;
  }

  async getJob(jobId: string): Promise<RemoteJob> {
    return JobViewSchema.parse(await this.request(`/v1/transcribe/${encodeURIComponent(jobId)}`));
  }

  async waitForCompletion(jobId: string, opts: WaitOptions): Promise<RemoteJob> {
    for (;;) {
      const job = await this.getJob(jobId);
      if (job.status === "completed") return job;
      if (job.status === "failed") {
        throw new Error(`Job failed: ${job.error ?? "Unknown error"}`);
      }
      opts.onProgress?.(job);
      await sleep(opts.pollIntervalMs);
    }
  }

  async health(): Promise<unknown> {
    return this.request("/healthz");
  }
}

const CliOptionsSchema = z.object({
  audioFile: z.string().optional(),
  output: z.string().optional(),
  speakers: z.coerce.number().int().min(MIN_EXPECTED_SPEAKERS).max(MAX_EXPECTED_SPEAKERS).optional(),
  format: z.enum(RESPONSE_FORMATS).default("json"),
  llmAnalysis: z.boolean().default(false),
  server: z.string().url(),
  apiKey: z.string().optional(),
  pollInterval: z.coerce.number().min(0).default(5),
  health: z.boolean().default(false),
  quiet: z.boolean().default(false),
});

export type CliOptions = z.infer<typeof CliOptionsSchema>;

export const USAGE = `Usage: speaker-transcripts [options] <audio-file>

Options:
  -o, --output <path>        Output file (default: <name>_transcript.<format>)
  -s, --speakers <n>         Expected number of speakers (${MIN_EXPECTED_SPEAKERS}-${MAX_EXPECTED_SPEAKERS})
  -f, --format <format>      ${RESPONSE_FORMATS.join(" | ")} (default: json)
      --llm-analysis         Add summary, action items and topics
      --server <url>         API server (default: $TRANSCRIPTS_SERVER or http://localhost:8000)
      --api-key <key>        Sent as x-api-key (default: $API_KEY)
      --poll-interval <sec>  Seconds between status checks (default: 5)
      --health               Check server health and exit
  -q, --quiet                Minimal output
  -h, --help                 Show this help`;

export function parseCliArgs(argv: string[], env: NodeJS.ProcessEnv = process.env): CliOptions | "help" {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      output: { type: "string", short: "o" },
      speakers: { type: "string", short: "s" },
      format: { type: "string", short: "f" },
      "llm-analysis": { type: "boolean" },
      server: { type: "string" },
      "api-key": { type: "string" },
      "poll-interval": { type: "string" },
      health: { type: "boolean" },
      quiet: { type: "boolean", short: "q" },
      help: { type: "boolean", short: "h" },
    },
  });
  if (values.help) return "help";

  const parsed = CliOptionsSchema.safeParse({
    audioFile: positionals[0],
    output: values.output,
    speakers: values.speakers,
    format: values.format,
    llmAnalysis: values["llm-analysis"],
    server: values.server ?? env.TRANSCRIPTS_SERVER ?? "http://localhost:8000",
    apiKey: values["api-key"] ?? (env.API_KEY || undefined),
    pollInterval: values["poll-interval"],
    health: values.health,
    quiet: values.quiet,
  });
  if (!parsed.success) {
    throw new Error(parsed.error.issues.map((i) => `--${i.path.join(".")}: ${i.message}`).join("; "));
  }
  return { ...parsed.data, server: parsed.data.server.replace(/\/+$/, "") };
}

export function defaultOutputPath(audioFile: string, format: ResponseFormat): string {
  return `${path.parse(audioFile).name}_transcript.${format}`;
}

// JSON output keeps the whole job view; other formats write the rendered text
export function renderOutput(job: RemoteJob, format: ResponseFormat): string {
  if (format !== "json" && typeof job.result === "string") return job.result;
  return JSON.stringify(job, null, 2);
}

export interface CliIO {
  out(line: string): void;
  err(line: string): void;
}

/**
 * Runs the command line client and returns the process exit code.
 */
export async function runCli(argv: string[], io: CliIO, env: NodeJS.ProcessEnv = process.env): Promise<number> {
  let opts: CliOptions;
  try {
    const parsed = parseCliArgs(argv, env);
    if (parsed === "help") {
      io.out(USAGE);
      return 0;
    }
    opts = parsed;
  } catch (err) {
    io.err(`Error: ${errorMessage(err)}`);
    io.err(USAGE);
    return 2;
  }

  const client = new TranscriptionClient(opts.server, opts.apiKey);
  const say = (line: string) => {
    if (!opts.quiet) io.out(line);
  };

  try {
    if (opts.health) {
      const health = await client.health();
      say("Server health:");
      say(JSON.stringify(health, null, 2));
      return 0;
    }

    if (!opts.audioFile) {
      io.err("Error: an audio file is required (or use --health to check the server)");
      return 2;
    }
    const audioFile = opts.audioFile;
    const output = opts.output ?? defaultOutputPath(audioFile, opts.format);

    say(`Submitting audio file: ${audioFile}`);
    say(`Expected speakers: ${opts.speakers ?? "auto-detect"}`);
    say(`Output format: ${opts.format}`);
    say(`LLM analysis: ${opts.llmAnalysis ? "enabled" : "disabled"}`);
    say(`Output file: ${output}`);

    const jobId = await client.submit(audioFile, {
      expectedSpeakers: opts.speakers,
      responseFormat: opts.format,
      enableLlmAnalysis: opts.llmAnalysis,
    });
    say(`Job submitted: ${jobId}`);

    const job = await client.waitForCompletion(jobId, {
      pollIntervalMs: opts.pollInterval * 1000,
      onProgress: (j) => {
        const label = j.progress ?? j.status;
        say(j.progressPercent === null ? `  Status: ${label}` : `  [${String(j.progressPercent).padStart(3)}%] ${label}`);
      },
    });

    await fs.writeFile(output, renderOutput(job, opts.format), "utf8");
    say(`Transcription saved to: ${output}`);

    const summary = StructuredSummarySchema.safeParse(job.result);
    if (summary.success) {
      say(`  Audio duration: ${summary.data.audioDuration.toFixed(1)}s`);
      say(`  Speakers detected: ${summary.data.speakersDetected}`);
      say(`  Utterances: ${summary.data.utterances.length}`);
      if (summary.data.llmEnhancements !== undefined) say("  LLM analysis included");
    }
    return 0;
  } catch (err) {
    io.err(`Error: ${errorMessage(err)}`);
    return 1;
  }
}
