import { buildApp } from "./app.js";
import { BullJobQueue } from "./async/queue.js";
import { loadConfig } from "./config.js";
import { createEnhancer } from "./pipeline/collaborators.js";
import { RedisJobStore } from "./store/jobStore.js";
import { createLogger } from "./utils/logger.js";
import { createRedisClient, disconnectRedis, redisConnectionOptions } from "./utils/redis.js";

const cfg = loadConfig();
const logger = createLogger(cfg.logLevel, "api");
const redis = createRedisClient(cfg, logger);
const queue = new BullJobQueue(redisConnectionOptions(cfg));

const app = buildApp({
  store: new RedisJobStore(redis, cfg.jobTtlSeconds),
  queue,
  enhancer: createEnhancer(cfg, logger),
  logger,
  settings: {
    uploadDir: cfg.uploadDir,
    maxFileSizeBytes: cfg.maxFileSizeBytes,
    apiKey: cfg.apiKey,
  },
});

const start = async () => {
  try {
    await app.listen({ port: cfg.port, host: cfg.host });
    app.log.info(`listening on :${cfg.port} (${cfg.deploymentTarget})`);
  } catch (err) {
    app.log.error(err);
    process.exit(1);
  }
};

async function shutdown(signal: string) {
  app.log.info(`Received ${signal}, shutting down`);
  try {
    await app.close();
    await queue.close();
  } finally {
    await disconnectRedis(redis, logger);
  }
  process.exit(0);
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((err: unknown) => {
      logger.error({ err }, "Shutdown failed");
      process.exit(1);
    });
  });
}

await start();
