import { z } from "zod";
import { JOB_STATUSES, RESPONSE_FORMATS } from "../constants.js";
import type { JobRecord, JobRecordUpdate } from "../types.js";

// Redis hashes hold strings only; null is written as ""
const nullableString = z
  .string()
  .optional()
  .transform((v) => (v ? v : null));

const nullableInt = z
  .string()
  .optional()
  .transform((v, ctx) => {
    if (!v) return null;
    const n = Number.parseInt(v, 10);
    if (!Number.isFinite(n)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `not an integer: ${v}` });
      return z.NEVER;
    }
    return n;
  });

const JobHashSchema = z.object({
  jobId: z.string().min(1),
  status: z.enum(JOB_STATUSES),
  createdAt: z.string().min(1),
  completedAt: nullableString,
  progress: nullableString,
  progressPercent: nullableInt,
  error: nullableString,
  result: nullableString,
  filePath: z.string(),
  expectedSpeakers: nullableInt,
  responseFormat: z.enum(RESPONSE_FORMATS),
  enableLlmAnalysis: z
    .enum(["true", "false"])
    .default("false")
    .transform((v) => v === "true"),
});

export function encodeFields(fields: JobRecordUpdate | JobRecord): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(fields)) {
    if (value === undefined) continue;
    out[key] = value === null ? "" : String(value);
  }
  return out;
}

/**
 * Returns null for an empty hash (missing or expired key); throws on a hash
 * that does not describe a job.
 */
export function decodeRecord(hash: Record<string, string>): JobRecord | null {
  if (Object.keys(hash).length === 0) return null;
  const parsed = JobHashSchema.safeParse(hash);
  if (!parsed.success) {
    throw new Error(`Malformed job record: ${parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")}`);
  }
  return parsed.data;
}
