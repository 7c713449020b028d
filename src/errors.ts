export type PipelineStage =
  | "initialize"
  | "preprocess"
  | "diarize"
  | "segment"
  | "transcribe"
  | "merge"
  | "llm_analysis"
  | "format"
  | "finalize";

// Duration/size limits or bad input; raised before any model is invoked
export class ValidationError extends Error {
  override name = "ValidationError";
}

// Decode, diarization or other collaborator failure that sinks the whole job
export class CollaboratorError extends Error {
  override name = "CollaboratorError";

  constructor(
    readonly collaborator: string,
    message: string,
    options?: ErrorOptions
  ) {
    super(message, options);
  }
}

// One clip failed; the pipeline degrades it to a placeholder
export class ClipTranscriptionError extends Error {
  override name = "ClipTranscriptionError";
}

// LLM analysis failure; never fails a job
export class EnhancementError extends Error {
  override name = "EnhancementError";
}

// Job record store unreachable or returned bad data
export class StorageError extends Error {
  override name = "StorageError";
}

export class StageFailure extends Error {
  override name = "StageFailure";

  constructor(
    readonly jobId: string,
    readonly stage: PipelineStage,
    cause: unknown
  ) {
    super(`Job ${jobId} failed during ${stage}: ${errorMessage(cause)}`, { cause });
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
