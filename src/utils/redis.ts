import { Redis } from "ioredis";
import type { ServiceConfig } from "../config.js";
import type { Logger } from "./logger.js";

export interface RedisConnectionOptions {
  host: string;
  port: number;
  db: number;
  // BullMQ workers block on Redis and require this to be null
  maxRetriesPerRequest: null;
}

export function redisConnectionOptions(cfg: ServiceConfig): RedisConnectionOptions {
  return {
    host: cfg.redisHost,
    port: cfg.redisPort,
    db: cfg.redisDb,
    maxRetriesPerRequest: null,
  };
}

export function createRedisClient(cfg: ServiceConfig, logger: Logger): Redis {
  const redis = new Redis(redisConnectionOptions(cfg));

  redis.on("error", (err) => {
    logger.error({ err }, "Redis client error");
  });

  redis.on("connect", () => {
    logger.info(`Connected to Redis at ${cfg.redisHost}:${cfg.redisPort}`);
  });

  redis.on("ready", () => {
    logger.debug("Redis client ready");
  });

  redis.on("end", () => {
    logger.info("Redis connection ended");
  });

  return redis;
}

export async function disconnectRedis(redis: Redis, logger: Logger) {
  try {
    await redis.quit();
    logger.info("Redis client disconnected");
  } catch (error) {
    logger.error({ err: error }, "Error disconnecting from Redis");
  }
}
