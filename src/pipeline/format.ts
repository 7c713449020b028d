import type { ResponseFormat } from "../constants.js";
import type { LLMEnhancements, TranscribedSegment, TranscriptionResult } from "../types.js";

export interface ResultMetadata {
  audioDuration: number;
  speakersDetected: number;
  llmEnhancements?: LLMEnhancements | null;
}

function pad2(n: number) { return n.toString().padStart(2, "0"); }
function pad3(n: number) { return n.toString().padStart(3, "0"); }

/**
 * Seconds to `HH:MM:SS<sep>mmm`. Rounds to whole milliseconds first so
 * the seconds field never reads 60.
 */
export function formatTimestamp(seconds: number, separator: "," | "." = ","): string {
  const totalMs = Math.max(0, Math.round(seconds * 1000));
  const h = Math.floor(totalMs / 3600000);
  const m = Math.floor((totalMs % 3600000) / 60000);
  const s = Math.floor((totalMs % 60000) / 1000);
  const ms = totalMs % 1000;
  return `${pad2(h)}:${pad2(m)}:${pad2(s)}${separator}${pad3(ms)}`;
}

export function toStructured(segments: TranscribedSegment[], meta: ResultMetadata): TranscriptionResult {
  const result: TranscriptionResult = {
    utterances: segments.map((s) => ({
      speaker: s.speaker,
      start: s.start,
      end: s.end,
      text: s.text,
      confidence: s.confidence,
    })),
    audioDuration: meta.audioDuration,
    speakersDetected: meta.speakersDetected,
  };
  if (meta.llmEnhancements) {
    result.llmEnhancements = {
      summary: meta.llmEnhancements.summary,
      actionItems: meta.llmEnhancements.actionItems,
      topics: meta.llmEnhancements.topics,
    };
  }
  return result;
}

export function toSrt(segments: TranscribedSegment[]): string {
  const lines: string[] = [];
  segments.forEach((s, i) => {
    lines.push(String(i + 1));
    lines.push(`${formatTimestamp(s.start, ",")} --> ${formatTimestamp(s.end, ",")}`);
    lines.push(`[${s.speaker}] ${s.text}`);
    lines.push("");
  });
  return lines.join("\n");
}

export function toVtt(segments: TranscribedSegment[]): string {
  const lines: string[] = ["WEBVTT", ""];
  for (const s of segments) {
    lines.push(`${formatTimestamp(s.start, ".")} --> ${formatTimestamp(s.end, ".")}`);
    lines.push(`[${s.speaker}] ${s.text}`);
    lines.push("");
  }
  return lines.join("\n");
}

export function toText(segments: TranscribedSegment[]): string {
  return segments
    .map((s) => `[${formatTimestamp(s.start, ",")}] ${s.speaker}: ${s.text}`)
    .join("\n");
}

// Renders the stored result; the json format is serialized structured output
export function formatResult(
  format: ResponseFormat,
  segments: TranscribedSegment[],
  meta: ResultMetadata
): string {
  switch (format) {
    case "srt":
      return toSrt(segments);
    case "vtt":
      return toVtt(segments);
    case "text":
      return toText(segments);
    case "json":
      return JSON.stringify(toStructured(segments, meta));
  }
}
