import type { Job } from "bullmq";
import type { JobPipeline } from "../pipeline/jobPipeline.js";
import type { TranscriptionJobData } from "../types.js";

export type JobProcessor = (job: Job<TranscriptionJobData>) => Promise<void>;

/**
 * The job record already holds the failure by the time this throws; the
 * throw only marks the BullMQ job as failed.
 */
export function createProcessor(pipeline: JobPipeline): JobProcessor {
  return async (job) => {
    const outcome = await pipeline.run(job.data);
    if (outcome.status === "failed") {
      throw new Error(outcome.error ?? `Job ${outcome.jobId} failed`);
    }
  };
}
