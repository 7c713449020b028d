import { StorageError } from "../errors.js";
import type { JobRecord, JobRecordUpdate } from "../types.js";
import type { JobStore } from "./jobStore.js";

interface Entry {
  record: JobRecord;
  expiresAt: number;
}

// In-process store with the same expiry semantics as the Redis one; no persistence
export class MemoryJobStore implements JobStore {
  private readonly jobs = new Map<string, Entry>();

  constructor(private readonly ttlSeconds: number) {}

  private live(jobId: string): Entry | null {
    const entry = this.jobs.get(jobId);
    if (!entry) return null;
    if (entry.expiresAt <= Date.now()) {
      this.jobs.delete(jobId);
      return null;
    }
    return entry;
  }

  async create(record: JobRecord): Promise<void> {
    this.jobs.set(record.jobId, {
      record: { ...record },
      expiresAt: Date.now() + this.ttlSeconds * 1000,
    });
  }

  async update(jobId: string, fields: JobRecordUpdate): Promise<void> {
    const entry = this.live(jobId);
    if (!entry) throw new StorageError(`Failed to update job ${jobId}: Job not found`);
    const defined = Object.fromEntries(Object.entries(fields).filter(([, v]) => v !== undefined));
    entry.record = { ...entry.record, ...defined };
  }

  async get(jobId: string): Promise<JobRecord | null> {
    const entry = this.live(jobId);
    return entry ? { ...entry.record } : null;
  }

  async delete(jobId: string): Promise<boolean> {
    const existed = this.live(jobId) !== null;
    this.jobs.delete(jobId);
    return existed;
  }
}
