import { fetch } from "undici";
import { z } from "zod";
import { EnhancementError, errorMessage } from "../errors.js";
import type { LLMEnhancements } from "../types.js";
import type { Logger } from "../utils/logger.js";

export interface SpeakerLine {
  speaker: string;
  text: string;
}

export interface Enhancer {
  readonly enabled: boolean;
  readonly model: string | null;
  isAvailable(): Promise<boolean>;
  // Best effort: null when nothing could be produced
  enhance(lines: SpeakerLine[]): Promise<LLMEnhancements | null>;
}

/**
 * One "Speaker: text" line per utterance, stopping before the running
 * length (lines plus newlines) would exceed `maxLength`.
 */
export function formatTranscriptForLlm(lines: SpeakerLine[], maxLength = 8000): string {
  const out: string[] = [];
  let length = 0;
  for (const { speaker, text } of lines) {
    const line = `${speaker}: ${text}`;
    if (length + line.length > maxLength) break;
    out.push(line);
    length += line.length + 1;
  }
  return out.join("\n");
}

const PROMPTS = {
  summary: (transcript: string) => `Please provide a concise summary of this meeting transcript. Focus on:
1. Key topics discussed
2. Main decisions made
3. Action items or next steps
4. Important points raised by each speaker

Transcript:
${transcript}

Summary:`,
  actionItems: (transcript: string) => `Extract all action items, tasks, and next steps from this meeting transcript. Format as a bullet-point list.

Transcript:
${transcript}

Action Items:`,
  topics: (transcript: string) => `Identify the main topics and themes discussed in this meeting transcript. List them as bullet points.

Transcript:
${transcript}

Main Topics:`,
};

const GenerateResponseSchema = z.object({ response: z.string().default("") });

export interface OllamaEnhancerOptions {
  host: string;
  model: string;
  timeoutMs: number;
  logger: Logger;
}

export class OllamaEnhancer implements Enhancer {
  readonly enabled = true;
  readonly model: string;

  constructor(private readonly opts: OllamaEnhancerOptions) {
    this.model = opts.model;
  }

  async isAvailable(): Promise<boolean> {
    try {
      const res = await fetch(`${this.opts.host}/api/tags`, { signal: AbortSignal.timeout(5000) });
      await res.body?.cancel();
      return res.ok;
    } catch (error) {
      this.opts.logger.debug({ err: error }, "Ollama health probe failed");
      return false;
    }
  }

  async generateCompletion(prompt: string, temperature: number): Promise<string> {
    const res = await fetch(`${this.opts.host}/api/generate`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({
        model: this.opts.model,
        prompt,
        stream: false,
        options: { temperature, top_p: 0.9, top_k: 40 },
      }),
      signal: AbortSignal.timeout(this.opts.timeoutMs),
    });
    if (!res.ok) {
      throw new EnhancementError(`Ollama API error: ${res.status} ${await res.text()}`);
    }
    const parsed = GenerateResponseSchema.safeParse(await res.json());
    if (!parsed.success) {
      throw new EnhancementError(`Ollama returned an unexpected payload: ${parsed.error.message}`);
    }
    return parsed.data.response.trim();
  }

  // Each prompt is attempted in turn, never in parallel, so one Ollama host is not flooded
  async enhance(lines: SpeakerLine[]): Promise<LLMEnhancements | null> {
    const transcript = formatTranscriptForLlm(lines);
    const attempt = async (label: string, prompt: string, temperature: number) => {
      try {
        return (await this.generateCompletion(prompt, temperature)) || null;
      } catch (error) {
        this.opts.logger.warn({ err: error }, `Ollama ${label} failed: ${errorMessage(error)}`);
        return null;
      }
    };

    const summary = await attempt("summary", PROMPTS.summary(transcript), 0.1);
    const actionItems = await attempt("action items", PROMPTS.actionItems(transcript), 0.1);
    const topics = await attempt("topics", PROMPTS.topics(transcript), 0.2);

    if (summary === null && actionItems === null && topics === null) return null;
    return { summary, actionItems, topics };
  }
}

export class DisabledEnhancer implements Enhancer {
  readonly enabled = false;
  readonly model = null;

  async isAvailable(): Promise<boolean> {
    return false;
  }

  async enhance(): Promise<LLMEnhancements | null> {
    return null;
  }
}
