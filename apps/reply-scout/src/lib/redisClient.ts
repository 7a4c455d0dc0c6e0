import type { AppConfig } from "@/config";
import IORedis from "ioredis";

export function createRedisClient(config: AppConfig["cache"]): IORedis {
  return new IORedis({
    host: config.host,
    port: config.port,
    maxRetriesPerRequest: 3,
  });
}
