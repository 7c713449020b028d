import fs from "node:fs";
import path from "node:path";
import { fetch, FormData, File } from "undici";
import { z } from "zod";
import { CollaboratorError, errorMessage } from "../errors.js";
import type { DiarizationTurn } from "../types.js";

// Turn as produced by a diarization backend, before relabelling
export interface RawTurn {
  start: number;
  end: number;
  speaker: string;
}

export interface DiarizeInput {
  audioPath: string;
  durationSeconds: number;
  expectedSpeakers?: number | null;
}

export interface Diarizer {
  diarize(input: DiarizeInput): Promise<RawTurn[]>;
}

// A..Z, then AA, AB, ... past the 26th speaker
export function speakerLabel(index: number): string {
  let letters = "";
  for (let n = index; n >= 0; n = Math.floor(n / 26) - 1) {
    letters = String.fromCharCode(65 + (n % 26)) + letters;
  }
  return `Speaker ${letters}`;
}

/**
 * Drops degenerate turns, sorts by start (stable) and relabels speakers
 * as "Speaker A", "Speaker B", ... in first-seen order.
 */
export function canonicalizeTurns(raw: RawTurn[]): DiarizationTurn[] {
  const sorted = raw
    .filter((t) => Number.isFinite(t.start) && Number.isFinite(t.end) && t.start < t.end)
    .map((t, idx) => ({ t, idx }))
    .sort((a, b) => a.t.start - b.t.start || a.idx - b.idx)
    .map(({ t }) => t);

  const mapping = new Map<string, string>();
  return sorted.map((t) => {
    let label = mapping.get(t.speaker);
    if (label === undefined) {
      label = speakerLabel(mapping.size);
      mapping.set(t.speaker, label);
    }
    return { start: t.start, end: t.end, speaker: label };
  });
}

export function countSpeakers(turns: DiarizationTurn[]): number {
  return new Set(turns.map((t) => t.speaker)).size;
}

const DiarizationResponseSchema = z.object({
  segments: z.array(
    z.object({
      start: z.number(),
      end: z.number(),
      speaker: z.string(),
    })
  ),
});

export interface HttpDiarizerOptions {
  baseUrl: string;
  timeoutMs: number;
}

export function buildDiarizeForm(audio: Buffer, input: DiarizeInput): FormData {
  const form = new FormData();
  form.append("file", new File([audio], path.basename(input.audioPath), { type: "audio/wav" }));
  if (input.expectedSpeakers) {
    form.append("num_speakers", String(input.expectedSpeakers));
  }
  return form;
}

// Talks to a diarization model service over HTTP (multipart upload, JSON segments back)
export class HttpDiarizer implements Diarizer {
  constructor(private readonly opts: HttpDiarizerOptions) {}

  async diarize(input: DiarizeInput): Promise<RawTurn[]> {
    let body: unknown;
    try {
      const audio = await fs.promises.readFile(input.audioPath);
      const res = await fetch(`${this.opts.baseUrl}/diarize`, {
        method: "POST",
        body: buildDiarizeForm(audio, input),
        signal: AbortSignal.timeout(this.opts.timeoutMs),
      });
      if (!res.ok) {
        const text = await res.text();
        throw new Error(`${res.status} ${text}`);
      }
      body = await res.json();
    } catch (err) {
      throw new CollaboratorError("diarizer", `Diarization failed: ${errorMessage(err)}`, { cause: err });
    }

    const parsed = DiarizationResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new CollaboratorError("diarizer", `Diarization service returned an unexpected payload: ${parsed.error.message}`);
    }
    return parsed.data.segments;
  }
}

/**
 * Deterministic stand-in used when no diarization service is configured:
 * alternates speakers over roughly eight equal turns.
 */
export class StubDiarizer implements Diarizer {
  async diarize(input: DiarizeInput): Promise<RawTurn[]> {
    const duration = input.durationSeconds;
    const speakers = input.expectedSpeakers || 2;
    const turnLength = Math.max(2.0, duration / 8);
    const turns: RawTurn[] = [];

    let current = 0;
    let speakerIdx = 0;
    while (current < duration) {
      const end = Math.min(current + turnLength, duration);
      turns.push({ start: current, end, speaker: speakerLabel(speakerIdx) });
      current = end;
      speakerIdx = (speakerIdx + 1) % speakers;
    }
    return turns;
  }
}
