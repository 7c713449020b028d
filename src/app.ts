import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import { pipeline } from "node:stream/promises";
import Fastify from "fastify";
import multipart from "@fastify/multipart";
import { z } from "zod";
import type { JobQueue } from "./async/queue.js";
import {
  MAX_EXPECTED_SPEAKERS,
  MIN_EXPECTED_SPEAKERS,
  RESPONSE_FORMATS,
} from "./constants.js";
import { StorageError, ValidationError, errorMessage } from "./errors.js";
import type { Enhancer } from "./pipeline/enhance.js";
import type { JobStore } from "./store/jobStore.js";
import type { JobRecord, JobStatus, ResponseFormat } from "./types.js";
import { removeFileQuietly, sanitizeFileName } from "./utils/files.js";
import type { Logger } from "./utils/logger.js";

export interface AppSettings {
  uploadDir: string;
  maxFileSizeBytes: number;
  apiKey?: string;
}

export interface AppDeps {
  store: JobStore;
  queue: Pick<JobQueue, "enqueue">;
  enhancer: Enhancer;
  logger: Logger;
  settings: AppSettings;
  now?: () => Date;
  newJobId?: () => string;
}

// Multipart form fields arrive as strings; blank values count as absent
const SubmitFieldsSchema = z.object({
  expected_speakers: z.coerce
    .number()
    .int()
    .min(MIN_EXPECTED_SPEAKERS)
    .max(MAX_EXPECTED_SPEAKERS)
    .optional(),
  response_format: z.enum(RESPONSE_FORMATS).default("json"),
  enable_llm_analysis: z
    .enum(["true", "false"])
    .default("false")
    .transform((v) => v === "true"),
});

export interface JobView {
  jobId: string;
  status: JobStatus;
  createdAt: string;
  completedAt: string | null;
  progress: string | null;
  progressPercent: number | null;
  responseFormat: ResponseFormat;
  error: string | null;
  result: unknown;
}

/**
 * Public view of a job. The upload path stays private; a json result is
 * handed back as an object.
 */
export function toJobView(record: JobRecord): JobView {
  const view: JobView = {
    jobId: record.jobId,
    status: record.status,
    createdAt: record.createdAt,
    completedAt: record.completedAt,
    progress: record.progress,
    progressPercent: record.progressPercent,
    responseFormat: record.responseFormat,
    error: record.error,
    result: null,
  };

  if (record.status !== "completed" || record.result === null) return view;
  if (record.responseFormat !== "json") return { ...view, result: record.result };

  try {
    const parsed: unknown = JSON.parse(record.result);
    return { ...view, result: parsed };
  } catch {
    return { ...view, status: "failed", error: "Failed to parse result data" };
  }
}

export function buildApp(deps: AppDeps) {
  const { store, queue, enhancer, settings } = deps;
  const now = deps.now ?? (() => new Date());
  const newJobId = deps.newJobId ?? (() => crypto.randomUUID());

  const app = Fastify({ logger: deps.logger });

  app.register(multipart, {
    limits: { fileSize: settings.maxFileSizeBytes, files: 1 },
  });

  app.setErrorHandler((err, request, reply) => {
    if (err instanceof ValidationError) {
      return reply.code(400).send({ error: err.message });
    }
    if (err instanceof StorageError) {
      request.log.error({ err }, "Job store unavailable");
      return reply.code(500).send({ error: err.message });
    }
    const statusCode = err.statusCode ?? 500;
    if (statusCode >= 500) request.log.error({ err }, "Request failed");
    return reply.code(statusCode).send({ error: err.message });
  });

  app.addHook("preHandler", async (request, reply) => {
    const protectedRoute = request.routeOptions.url?.startsWith("/v1/") ?? false;
    if (protectedRoute && settings.apiKey) {
      const apiKey = request.headers["x-api-key"];
      if (!apiKey || apiKey !== settings.apiKey) {
        return reply.code(401).send({ error: "Unauthorized: Invalid or missing API key" });
      }
    }
  });

  app.post("/v1/transcribe", async (request, reply) => {
    if (!request.isMultipart()) {
      throw new ValidationError("Expected multipart/form-data with an audio file");
    }

    const jobId = newJobId();
    const fields: Record<string, string> = {};
    let uploadPath: string | null = null;
    let rejection: string | null = null;

    try {
      for await (const part of request.parts()) {
        if (part.type === "field") {
          const value = String(part.value).trim();
          if (value) fields[part.fieldname] = value;
          continue;
        }
        if (part.fieldname !== "file" || !part.mimetype.startsWith("audio/")) {
          rejection ??= part.fieldname !== "file" ? `Unexpected file field "${part.fieldname}"` : "File must be an audio file";
          part.file.resume();
          continue;
        }
        uploadPath = path.join(settings.uploadDir, `${jobId}_${sanitizeFileName(part.filename)}`);
        await pipeline(part.file, fs.createWriteStream(uploadPath));
      }
    } catch (err) {
      // Oversize uploads surface here with a 413 status code
      if (uploadPath) await removeFileQuietly(uploadPath, request.log);
      throw err;
    }

    if (rejection || !uploadPath) {
      if (uploadPath) await removeFileQuietly(uploadPath, request.log);
      throw new ValidationError(rejection ?? "An audio file is required in the \"file\" field");
    }

    const parsed = SubmitFieldsSchema.safeParse(fields);
    if (!parsed.success) {
      await removeFileQuietly(uploadPath, request.log);
      return reply.code(400).send({ error: parsed.error.issues });
    }

    const createdAt = now().toISOString();
    const record: JobRecord = {
      jobId,
      status: "pending",
      createdAt,
      completedAt: null,
      progress: null,
      progressPercent: null,
      error: null,
      result: null,
      filePath: uploadPath,
      expectedSpeakers: parsed.data.expected_speakers ?? null,
      responseFormat: parsed.data.response_format,
      enableLlmAnalysis: parsed.data.enable_llm_analysis,
    };

    let created = false;
    try {
      await store.create(record);
      created = true;
      await queue.enqueue({
        jobId,
        filePath: record.filePath,
        expectedSpeakers: record.expectedSpeakers,
        responseFormat: record.responseFormat,
        enableLlmAnalysis: record.enableLlmAnalysis,
      });
    } catch (err) {
      request.log.error({ err, jobId }, "Failed to create job");
      await removeFileQuietly(uploadPath, request.log);
      if (created) {
        await store.delete(jobId).catch((cleanupErr: unknown) => {
          request.log.warn({ err: cleanupErr, jobId }, "Could not remove orphaned job record");
        });
      }
      return reply.code(500).send({ error: `Failed to create job: ${errorMessage(err)}` });
    }

    request.log.info({ jobId }, "Job accepted for processing");
    return reply.code(202).send({
      jobId,
      status: record.status,
      createdAt,
      statusUrl: `/v1/transcribe/${jobId}`,
    });
  });

  app.get<{ Params: { jobId: string } }>("/v1/transcribe/:jobId", async (request, reply) => {
    const { jobId } = request.params;
    const record = await store.get(jobId);
    if (!record) {
      return reply.code(404).send({ error: "Job not found" });
    }
    return reply.code(200).send(toJobView(record));
  });

  app.delete<{ Params: { jobId: string } }>("/v1/transcribe/:jobId", async (request, reply) => {
    const { jobId } = request.params;
    try {
      const record = await store.get(jobId);
      if (!record) {
        return reply.code(404).send({ error: "Job not found" });
      }
      await removeFileQuietly(record.filePath, request.log);
      await store.delete(jobId);
    } catch (err) {
      request.log.error({ err, jobId }, "Failed to delete job");
      return reply.code(500).send({ error: `Failed to delete job: ${errorMessage(err)}` });
    }
    return reply.code(200).send({ message: `Job ${jobId} deleted successfully` });
  });

  app.get("/v1/llm/status", async () => {
    if (!enhancer.enabled) {
      return { enabled: false, available: false, model: null, message: "LLM analysis is disabled" };
    }
    const available = await enhancer.isAvailable();
    return {
      enabled: true,
      available,
      model: enhancer.model,
      message: available ? "LLM server is available" : "LLM server is not responding",
    };
  });

  app.get("/healthz", async () => ({ ok: true, llmEnabled: enhancer.enabled }));

  return app;
}
