import { fetch, FormData, File } from "undici";
import { z } from "zod";
import { TRANSCRIPTION_FAILED_TEXT } from "../constants.js";
import { ClipTranscriptionError, errorMessage } from "../errors.js";
import type { AudioClip, TranscribedSegment, WordTimestamp } from "../types.js";
import type { Logger } from "../utils/logger.js";
import { encodeWav } from "../utils/wav.js";

// Word timing relative to the start of the clip audio
export interface ClipWord {
  word: string;
  start: number;
  end: number;
  probability: number;
}

export interface ClipTranscript {
  text: string;
  confidence: number | null;
  words: ClipWord[];
}

export interface Transcriber {
  transcribe(samples: Float32Array, sampleRate: number): Promise<ClipTranscript>;
}

export interface TranscribeClipsOptions {
  sampleRate: number;
  logger: Logger;
  // Called after each clip, with the 1-based count of clips done
  onClipDone?: (done: number, total: number) => Promise<void>;
}

/**
 * Transcribes clips one at a time, in clip order. A failing clip becomes a
 * placeholder segment instead of failing the batch.
 */
export async function transcribeClips(
  clips: AudioClip[],
  transcriber: Transcriber,
  opts: TranscribeClipsOptions
): Promise<TranscribedSegment[]> {
  const segments: TranscribedSegment[] = [];

  for (let i = 0; i < clips.length; i++) {
    const clip = clips[i];
    try {
      const result = await transcriber.transcribe(clip.audio, opts.sampleRate);
      // Word timings are relative to the clip; shift them onto the recording timeline
      const offset = clip.start;
      segments.push({
        speaker: clip.speaker,
        start: clip.start,
        end: clip.end,
        text: result.text.trim(),
        confidence: result.confidence,
        words: result.words.map((w): WordTimestamp => ({
          word: w.word,
          start: offset + w.start,
          end: offset + w.end,
          probability: w.probability,
        })),
      });
    } catch (err) {
      opts.logger.warn(
        { err },
        `Failed to transcribe segment ${clip.start.toFixed(2)}-${clip.end.toFixed(2)}: ${errorMessage(err)}`
      );
      segments.push(placeholderSegment(clip));
    }

    if (opts.onClipDone) {
      await opts.onClipDone(i + 1, clips.length);
    }
  }

  return segments;
}

export function placeholderSegment(clip: AudioClip): TranscribedSegment {
  return {
    speaker: clip.speaker,
    start: clip.start,
    end: clip.end,
    text: TRANSCRIPTION_FAILED_TEXT,
    confidence: 0,
    words: [],
  };
}

const VerboseWordSchema = z.object({
  word: z.string(),
  start: z.number(),
  end: z.number(),
  probability: z.number().min(0).max(1).optional(),
});

const VerboseJsonSchema = z.object({
  text: z.string(),
  language: z.string().optional(),
  segments: z
    .array(
      z.object({
        text: z.string().optional(),
        words: z.array(VerboseWordSchema).optional(),
      })
    )
    .optional(),
  words: z.array(VerboseWordSchema).optional(),
});

type VerboseJson = z.infer<typeof VerboseJsonSchema>;

/**
 * Maps an OpenAI-compatible verbose_json body to a clip transcript.
 * Confidence is the mean reported word probability, or null when no word carries one.
 */
export function normalizeVerboseJson(raw: VerboseJson): ClipTranscript {
  const rawWords = raw.words?.length ? raw.words : (raw.segments ?? []).flatMap((s) => s.words ?? []);
  const reported = rawWords.flatMap((w) => (w.probability === undefined ? [] : [w.probability]));

  return {
    text: raw.text.trim(),
    confidence: reported.length ? reported.reduce((a, b) => a + b, 0) / reported.length : null,
    words: rawWords.map((w) => ({
      word: w.word,
      start: w.start,
      end: w.end,
      probability: w.probability ?? 0,
    })),
  };
}

export interface HttpTranscriberOptions {
  baseUrl: string;
  model: string;
  language?: string;
  timeoutMs: number;
}

export function buildTranscriptionForm(
  samples: Float32Array,
  sampleRate: number,
  opts: Pick<HttpTranscriberOptions, "model" | "language">
): FormData {
  const form = new FormData();
  form.append("file", new File([encodeWav(samples, sampleRate)], "clip.wav", { type: "audio/wav" }));
  form.append("model", opts.model);
  form.append("response_format", "verbose_json");
  form.append("timestamp_granularities[]", "word");
  if (opts.language) {
    form.append("language", opts.language);
  }
  return form;
}

// Sends each clip as an in-memory WAV to an OpenAI-compatible ASR service
export class HttpTranscriber implements Transcriber {
  constructor(private readonly opts: HttpTranscriberOptions) {}

  async transcribe(samples: Float32Array, sampleRate: number): Promise<ClipTranscript> {
    const response = await fetch(`${this.opts.baseUrl}/openai/v1/audio/transcriptions`, {
      method: "POST",
      body: buildTranscriptionForm(samples, sampleRate, this.opts),
      signal: AbortSignal.timeout(this.opts.timeoutMs),
    });

    if (!response.ok) {
      const errorText = await response.text();
      throw new ClipTranscriptionError(`ASR transcription failed: ${response.status} ${errorText}`);
    }

    const parsed = VerboseJsonSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new ClipTranscriptionError(`ASR service returned an unexpected payload: ${parsed.error.message}`);
    }
    return normalizeVerboseJson(parsed.data);
  }
}

/**
 * Deterministic stand-in used when no ASR service is configured:
 * one word spanning the whole clip.
 */
export class StubTranscriber implements Transcriber {
  async transcribe(samples: Float32Array, sampleRate: number): Promise<ClipTranscript> {
    const seconds = samples.length / sampleRate;
    const text = `[stub transcript ${seconds.toFixed(2)}s]`;
    return {
      text,
      confidence: 1,
      words: [{ word: text, start: 0, end: seconds, probability: 1 }],
    };
  }
}
