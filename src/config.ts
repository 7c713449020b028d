import "dotenv/config";
import path from "node:path";
import fs from "node:fs";
import {
  DEFAULT_JOB_TTL_SECONDS,
  DEFAULT_MERGE_GAP_SECONDS,
  DEFAULT_SEGMENT_PADDING_SECONDS,
  DEFAULT_WHISPER_MODEL_DEVELOPMENT,
  DEFAULT_WHISPER_MODEL_PRODUCTION,
} from "./constants.js";

export type DeploymentTarget = "production" | "development";

export interface ServiceConfig {
  deploymentTarget: DeploymentTarget;
  port: number;
  host: string;
  apiKey?: string;
  logLevel: string;
  redisHost: string;
  redisPort: number;
  redisDb: number;
  uploadDir: string;
  ffmpegCmd: string;
  ffprobeCmd: string;
  preprocessTimeoutMs: number;
  maxFileSizeBytes: number;
  maxAudioDurationSeconds: number;
  // Diarization service; unset selects the deterministic stub
  diarizationBaseUrl?: string;
  diarizationTimeoutMs: number;
  // OpenAI-compatible ASR service; unset selects the deterministic stub
  asrBaseUrl?: string;
  asrModel: string;
  asrLanguage?: string;
  asrTimeoutMs: number;
  ollamaEnabled: boolean;
  ollamaHost: string;
  ollamaModel: string;
  ollamaTimeoutMs: number;
  segmentPaddingSeconds: number;
  mergeGapSeconds: number;
  jobTtlSeconds: number;
  workerConcurrency: number;
}

function ensureDir(dir: string) {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

function intOr(raw: string | undefined, fallback: number): number {
  const n = parseInt(raw || "", 10);
  return Number.isFinite(n) ? n : fallback;
}

function floatOr(raw: string | undefined, fallback: number): number {
  const n = parseFloat(raw || "");
  return Number.isFinite(n) ? n : fallback;
}

export const rootDir = path.resolve(process.cwd());

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const deploymentTarget: DeploymentTarget =
    env.DEPLOYMENT_TARGET === "production" ? "production" : "development";
  const production = deploymentTarget === "production";

  const uploadDir = path.resolve(rootDir, env.UPLOAD_DIR || "uploads");

  // Production hosts take longer recordings and the larger model
  const maxFileSizeBytes = intOr(env.MAX_FILE_SIZE, production ? 100_000_000 : 50_000_000);
  const maxAudioDurationSeconds = intOr(env.MAX_AUDIO_DURATION, production ? 7200 : 1800);
  const asrModel =
    env.WHISPER_MODEL ||
    (production ? DEFAULT_WHISPER_MODEL_PRODUCTION : DEFAULT_WHISPER_MODEL_DEVELOPMENT);

  ensureDir(uploadDir);

  return {
    deploymentTarget,
    port: intOr(env.PORT, 8000),
    host: env.HOST || "0.0.0.0",
    apiKey: env.API_KEY || undefined,
    logLevel: env.LOG_LEVEL || "info",
    redisHost: env.REDIS_HOST || "localhost",
    redisPort: intOr(env.REDIS_PORT, 6379),
    redisDb: intOr(env.REDIS_DB, 0),
    uploadDir,
    ffmpegCmd: env.FFMPEG_CMD || "ffmpeg",
    ffprobeCmd: env.FFPROBE_CMD || "ffprobe",
    preprocessTimeoutMs: intOr(env.PREPROCESS_TIMEOUT_MS, 600_000),
    maxFileSizeBytes,
    maxAudioDurationSeconds,
    diarizationBaseUrl: env.DIARIZATION_BASE_URL || undefined,
    diarizationTimeoutMs: intOr(env.DIARIZATION_TIMEOUT_MS, 1_800_000),
    asrBaseUrl: env.ASR_BASE_URL || undefined,
    asrModel,
    asrLanguage: env.ASR_LANGUAGE || undefined,
    asrTimeoutMs: intOr(env.ASR_TIMEOUT_MS, 120_000),
    ollamaEnabled: (env.OLLAMA_ENABLED || "false").toLowerCase() === "true",
    ollamaHost: env.OLLAMA_HOST || "http://localhost:11434",
    ollamaModel: env.OLLAMA_MODEL || "llama3.2",
    ollamaTimeoutMs: intOr(env.OLLAMA_TIMEOUT_MS, 60_000),
    segmentPaddingSeconds: floatOr(env.SEGMENT_PADDING_SECONDS, DEFAULT_SEGMENT_PADDING_SECONDS),
    mergeGapSeconds: floatOr(env.MERGE_GAP_SECONDS, DEFAULT_MERGE_GAP_SECONDS),
    jobTtlSeconds: intOr(env.JOB_TTL_SECONDS, DEFAULT_JOB_TTL_SECONDS),
    workerConcurrency: Math.max(1, intOr(env.WORKER_CONCURRENCY, 2)),
  };
}
