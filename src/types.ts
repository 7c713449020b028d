import type { JobStatus, ResponseFormat } from "./constants.js";

export type { JobStatus, ResponseFormat };

export interface DiarizationTurn {
  start: number; // seconds
  end: number; // seconds
  speaker: string; // canonical label, e.g. "Speaker A"
}

export interface AudioClip {
  audio: Float32Array;
  start: number; // un-padded turn start, recording timeline
  end: number; // un-padded turn end, recording timeline
  speaker: string;
  startSample: number; // padded window
  endSample: number;
}

export interface WordTimestamp {
  word: string;
  start: number; // recording-relative seconds
  end: number;
  probability: number; // 0..1
}

export interface TranscribedSegment {
  speaker: string;
  start: number;
  end: number;
  text: string;
  confidence: number | null;
  words: WordTimestamp[];
}

export interface LLMEnhancements {
  summary: string | null;
  actionItems: string | null;
  topics: string | null;
}

export interface Utterance {
  speaker: string;
  start: number;
  end: number;
  text: string;
  confidence: number | null;
}

export interface TranscriptionResult {
  utterances: Utterance[];
  audioDuration: number;
  speakersDetected: number;
  llmEnhancements?: LLMEnhancements;
}

export interface JobRecord {
  jobId: string;
  status: JobStatus;
  createdAt: string; // ISO timestamp
  completedAt: string | null;
  progress: string | null;
  progressPercent: number | null;
  error: string | null;
  result: string | null; // formatted output; JSON text for the json format
  filePath: string;
  expectedSpeakers: number | null;
  responseFormat: ResponseFormat;
  enableLlmAnalysis: boolean;
}

export type JobRecordUpdate = Partial<Omit<JobRecord, "jobId" | "createdAt">>;

// Payload carried by a queued job
export interface TranscriptionJobData {
  jobId: string;
  filePath: string;
  expectedSpeakers: number | null;
  responseFormat: ResponseFormat;
  enableLlmAnalysis: boolean;
}
