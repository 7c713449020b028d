import { Queue } from "bullmq";
import { QUEUE_NAME } from "../constants.js";
import type { TranscriptionJobData } from "../types.js";
import type { RedisConnectionOptions } from "../utils/redis.js";

export interface JobQueue {
  enqueue(data: TranscriptionJobData): Promise<void>;
  close(): Promise<void>;
}

export class BullJobQueue implements JobQueue {
  private readonly queue: Queue<TranscriptionJobData>;

  constructor(connection: RedisConnectionOptions) {
    this.queue = new Queue<TranscriptionJobData>(QUEUE_NAME, {
      connection,
      defaultJobOptions: {
        // A failed job is resubmitted by the client, never retried here
        attempts: 1,
        removeOnComplete: { count: 100 },
        removeOnFail: { count: 500 },
      },
    });
  }

  async enqueue(data: TranscriptionJobData): Promise<void> {
    // Reusing the job id as the BullMQ id keeps a job from being queued twice
    await this.queue.add("transcribe", data, { jobId: data.jobId });
  }

  async close(): Promise<void> {
    await this.queue.close();
  }
}
