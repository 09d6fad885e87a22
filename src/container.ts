/**
 * Container
 * =========
 * Builds every long-lived object once, leaves first:
 * config → drivers → repositories/stores → services.
 */

import OpenAI from "openai";

import type { AppConfig } from "./config/env.js";
import { logger } from "./shared/logger.js";
import { connectMongo, disconnectMongo } from "./shared/mongo.js";
import { connectRedis, disconnectRedis } from "./shared/redis.js";
import { type AuthService, createAuthService, createRedisTokenStore } from "./modules/auth/index.js";
import {
  createOpenAiRagService,
  createUnavailableRagService,
  type RagService,
} from "./modules/chat/index.js";
import { createMongoUserRepository, getUserModel } from "./modules/users/index.js";

export type Container = {
  config: AppConfig;
  authService: AuthService;
  ragService: RagService;
  close(): Promise<void>;
};

export function buildRagService(config: AppConfig): RagService {
  const { openaiApiKey, model, vectorStoreId } = config.rag;
  if (!openaiApiKey || !vectorStoreId) {
    const missing = [!openaiApiKey && "OPENAI_API_KEY", !vectorStoreId && "OPENAI_VECTOR_STORE_ID"]
      .filter(Boolean)
      .join(", ");
    logger.warn("Chat disabled: missing settings", { missing });
    return createUnavailableRagService(`missing ${missing}`);
  }

  return createOpenAiRagService({
    client: new OpenAI({ apiKey: openaiApiKey }),
    model,
    vectorStoreId,
  });
}

export async function buildContainer(config: AppConfig): Promise<Container> {
  logger.setLevel(config.logLevel);

  const redis = await connectRedis(config.redisUrl);
  const mongo = await connectMongo(config.mongoUri);

  const users = createMongoUserRepository(getUserModel(mongo));
  await users.ensureIndexes();

  const tokens = createRedisTokenStore(redis);
  const authService = createAuthService({ config: config.auth, users, tokens });
  const ragService = buildRagService(config);

  return {
    config,
    authService,
    ragService,
    async close() {
      await disconnectRedis(redis);
      await disconnectMongo(mongo);
    },
  };
}
