/**
 * Centralized pipeline constants
 * Single source of truth for statuses, formats and tuning defaults
 */

// Sample rate every decoded buffer is resampled to
export const SAMPLE_RATE = 16000;

// Audio added on each side of a diarization turn before transcription
export const DEFAULT_SEGMENT_PADDING_SECONDS = 0.15;

// Largest silence between two same-speaker segments that still merges them
export const DEFAULT_MERGE_GAP_SECONDS = 2.0;

// Job records expire after 24 hours regardless of outcome
export const DEFAULT_JOB_TTL_SECONDS = 60 * 60 * 24;

export const TRANSCRIPTION_FAILED_TEXT = "[Transcription failed]";

export const QUEUE_NAME = "diarization";

export const JOB_KEY_PREFIX = "job:";

// Pipeline order; "failed" is reachable from any non-terminal state
export const JOB_STATUSES = [
  "pending",
  "processing",
  "preprocessing",
  "diarizing",
  "transcribing",
  "llm_analysis",
  "formatting",
  "completed",
  "failed",
] as const;

export type JobStatus = (typeof JOB_STATUSES)[number];

export const TERMINAL_STATUSES: readonly JobStatus[] = ["completed", "failed"];

export const RESPONSE_FORMATS = ["json", "srt", "vtt", "text"] as const;

export type ResponseFormat = (typeof RESPONSE_FORMATS)[number];

// Advisory progress bands (percent)
export const PROGRESS = {
  init: 5,
  preprocessing: 10,
  loading: 15,
  diarizing: 25,
  diarized: 40,
  transcribingStart: 45,
  transcribingEnd: 70,
  llmStart: 75,
  llmGenerating: 80,
  llmEnd: 90,
  formatting: 95,
  completed: 100,
} as const;

// Speakers accepted as a diarization hint
export const MIN_EXPECTED_SPEAKERS = 2;
export const MAX_EXPECTED_SPEAKERS = 10;

// Whisper model defaults per deployment target
export const DEFAULT_WHISPER_MODEL_PRODUCTION = "large-v3";
export const DEFAULT_WHISPER_MODEL_DEVELOPMENT = "medium";
