/**
 * Redis Connection
 * ================
 * Builds the Redis client used by the refresh-token store.
 *
 * Notes:
 * - The container owns the client; there is no module-level singleton.
 * - Connection errors after startup are logged, the client reconnects on its own.
 */

import { createClient } from "redis";

import { logger } from "./logger.js";

export type RedisClient = ReturnType<typeof createClient>;

export async function connectRedis(url: string): Promise<RedisClient> {
  const client = createClient({ url });
  client.on("error", (err: unknown) => {
    logger.error("Redis client error", {
      error: err instanceof Error ? err.message : String(err),
    });
  });
  client.on("reconnecting", () => {
    logger.warn("Redis reconnecting...");
  });

  await client.connect();
  logger.info("Redis connected");
  return client;
}

export async function disconnectRedis(client: RedisClient): Promise<void> {
  if (!client.isOpen) {return;}
  try {
    await client.quit();
  } catch (err: unknown) {
    logger.warn("Redis quit failed", {
      error: err instanceof Error ? err.message : String(err),
    });
  }
}
