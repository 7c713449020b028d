import { Worker } from "bullmq";
import { loadConfig } from "../config.js";
import { QUEUE_NAME } from "../constants.js";
import { createCollaborators } from "../pipeline/collaborators.js";
import { JobPipeline } from "../pipeline/jobPipeline.js";
import { RedisJobStore } from "../store/jobStore.js";
import type { TranscriptionJobData } from "../types.js";
import { createLogger } from "../utils/logger.js";
import { createRedisClient, disconnectRedis, redisConnectionOptions } from "../utils/redis.js";
import { createProcessor } from "./processor.js";

const cfg = loadConfig();
const logger = createLogger(cfg.logLevel, "worker");
const redis = createRedisClient(cfg, logger);

const pipeline = new JobPipeline({
  store: new RedisJobStore(redis, cfg.jobTtlSeconds),
  ...createCollaborators(cfg, logger),
  logger,
  settings: {
    segmentPaddingSeconds: cfg.segmentPaddingSeconds,
    mergeGapSeconds: cfg.mergeGapSeconds,
  },
});

const worker = new Worker<TranscriptionJobData>(QUEUE_NAME, createProcessor(pipeline), {
  connection: redisConnectionOptions(cfg),
  concurrency: cfg.workerConcurrency,
});

logger.info(`Worker started (concurrency ${cfg.workerConcurrency}, ${cfg.deploymentTarget})`);

worker.on("completed", (job) => {
  logger.info(`${job.id} has completed!`);
});

worker.on("failed", (job, err) => {
  if (job) {
    logger.warn(`${job.id} has failed with ${err.message}`);
  } else {
    logger.warn(`A job has failed with ${err.message}`);
  }
});

worker.on("error", (err) => {
  logger.error({ err }, "Worker error");
});

async function shutdown(signal: string) {
  logger.info(`Received ${signal}, closing worker`);
  try {
    await worker.close();
  } finally {
    await disconnectRedis(redis, logger);
  }
  process.exit(0);
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((err: unknown) => {
      logger.error({ err }, "Worker shutdown failed");
      process.exit(1);
    });
  });
}
