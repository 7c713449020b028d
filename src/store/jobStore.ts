import { JOB_KEY_PREFIX } from "../constants.js";
import { StorageError, errorMessage } from "../errors.js";
import type { JobRecord, JobRecordUpdate } from "../types.js";
import { decodeRecord, encodeFields } from "./recordCodec.js";

export interface JobStore {
  // Writes every field and starts the retention clock
  create(record: JobRecord): Promise<void>;
  // Field-level update of an existing record, applied atomically; StorageError when the record is gone
  update(jobId: string, fields: JobRecordUpdate): Promise<void>;
  get(jobId: string): Promise<JobRecord | null>;
  delete(jobId: string): Promise<boolean>;
}

export function jobKey(jobId: string): string {
  return `${JOB_KEY_PREFIX}${jobId}`;
}

// Writes the hash and its expiry together
export const CREATE_JOB_SCRIPT = `
redis.call("HSET", KEYS[1], unpack(ARGV, 2))
redis.call("EXPIRE", KEYS[1], ARGV[1])
return 1`;

// Returns 0 without writing when the key has expired or was deleted
export const UPDATE_JOB_SCRIPT = `
if redis.call("EXISTS", KEYS[1]) == 0 then
  return 0
end
redis.call("HSET", KEYS[1], unpack(ARGV))
return 1`;

// The ioredis calls the store makes; an ioredis client satisfies it
export interface JobHashClient {
  eval(script: string, numKeys: number, ...args: (string | number)[]): Promise<unknown>;
  hgetall(key: string): Promise<Record<string, string>>;
  del(key: string): Promise<number>;
}

function flatten(fields: Record<string, string>): string[] {
  return Object.entries(fields).flat();
}

export class RedisJobStore implements JobStore {
  constructor(
    private readonly redis: JobHashClient,
    private readonly ttlSeconds: number
  ) {}

  async create(record: JobRecord): Promise<void> {
    try {
      await this.redis.eval(
        CREATE_JOB_SCRIPT,
        1,
        jobKey(record.jobId),
        this.ttlSeconds,
        ...flatten(encodeFields(record))
      );
    } catch (err) {
      throw new StorageError(`Failed to create job ${record.jobId}: ${errorMessage(err)}`, { cause: err });
    }
  }

  async update(jobId: string, fields: JobRecordUpdate): Promise<void> {
    const encoded = encodeFields(fields);
    if (Object.keys(encoded).length === 0) return;
    let applied: unknown;
    try {
      applied = await this.redis.eval(UPDATE_JOB_SCRIPT, 1, jobKey(jobId), ...flatten(encoded));
    } catch (err) {
      throw new StorageError(`Failed to update job ${jobId}: ${errorMessage(err)}`, { cause: err });
    }
    if (applied !== 1) {
      throw new StorageError(`Failed to update job ${jobId}: Job not found`);
    }
  }

  async get(jobId: string): Promise<JobRecord | null> {
    try {
      return decodeRecord(await this.redis.hgetall(jobKey(jobId)));
    } catch (err) {
      throw new StorageError(`Failed to read job ${jobId}: ${errorMessage(err)}`, { cause: err });
    }
  }

  async delete(jobId: string): Promise<boolean> {
    try {
      return (await this.redis.del(jobKey(jobId))) > 0;
    } catch (err) {
      throw new StorageError(`Failed to delete job ${jobId}: ${errorMessage(err)}`, { cause: err });
    }
  }
}
