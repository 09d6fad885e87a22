/**
 * Application Config
 * ==================
 * Reads the environment once at startup. The resulting object is passed to
 * the container; nothing else reads `process.env` for runtime settings.
 */

import { ConfigurationError } from "../shared/errors.js";
import type { LogLevel } from "../shared/logger.js";

type Env = Record<string, string | undefined>;

function envString(env: Env, key: string): string | undefined {
  const raw = env[key];
  const trimmed = typeof raw === "string" ? raw.trim() : "";
  return trimmed.length > 0 ? trimmed : undefined;
}

function envInt(env: Env, key: string, fallback: number): number {
  const raw = envString(env, key);
  if (!raw) {return fallback;}
  const v = Number(raw);
  return Number.isFinite(v) && v > 0 ? Math.floor(v) : fallback;
}

function envList(env: Env, key: string, fallback: string[]): string[] {
  const raw = envString(env, key);
  if (!raw) {return fallback;}
  return raw
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

export type AuthConfig = {
  jwtSecret: string;
  issuer: string;
  audience: string;
  accessTtlSeconds: number;
  refreshTtlSeconds: number;
  refreshCookieName: string;
  cookieSecure: boolean;
  cookieSameSite: "lax" | "strict" | "none";
};

export type RagConfig = {
  openaiApiKey: string | null;
  model: string;
  vectorStoreId: string | null;
};

export type AppConfig = {
  nodeEnv: string;
  port: number;
  /** reverse proxies in front of the app; 0 means `req.ip` is the socket peer */
  trustProxyHops: number;
  logLevel: LogLevel;
  corsOrigins: string[];
  redisUrl: string;
  mongoUri: string;
  auth: AuthConfig;
  rag: RagConfig;
};

function readLogLevel(env: Env, nodeEnv: string): LogLevel {
  const raw = (envString(env, "LOG_LEVEL") || "").toLowerCase();
  if (raw === "error" || raw === "warn" || raw === "info" || raw === "debug") {return raw;}
  return nodeEnv === "development" ? "debug" : "info";
}

function readAuthConfig(env: Env, nodeEnv: string): AuthConfig {
  const jwtSecret = envString(env, "JWT_SECRET_KEY");
  if (!jwtSecret) {throw new ConfigurationError("JWT_SECRET_KEY is required");}

  const sameSiteRaw = (envString(env, "AUTH_COOKIE_SAMESITE") || "lax").toLowerCase();
  const cookieSameSite: AuthConfig["cookieSameSite"] =
    sameSiteRaw === "strict" ? "strict" : sameSiteRaw === "none" ? "none" : "lax";

  const cookieSecureRaw = (envString(env, "AUTH_COOKIE_SECURE") || "").toLowerCase();
  const cookieSecure =
    cookieSecureRaw === "1" ||
    cookieSecureRaw === "true" ||
    (cookieSecureRaw === "" && nodeEnv === "production");

  return {
    jwtSecret,
    issuer: envString(env, "JWT_ISSUER") || "rag-chat-api",
    audience: envString(env, "JWT_AUDIENCE") || "rag-chat-api",
    accessTtlSeconds: envInt(env, "AUTH_ACCESS_TTL_SECONDS", 15 * 60),
    refreshTtlSeconds: envInt(env, "AUTH_REFRESH_TTL_SECONDS", 7 * 24 * 60 * 60),
    refreshCookieName: envString(env, "AUTH_REFRESH_COOKIE_NAME") || "refresh_token",
    cookieSecure,
    cookieSameSite,
  };
}

export function loadConfig(env: Env = process.env): AppConfig {
  const nodeEnv = envString(env, "NODE_ENV") || "development";

  return Object.freeze({
    nodeEnv,
    port: envInt(env, "PORT", 3000),
    trustProxyHops: envInt(env, "TRUST_PROXY_HOPS", 0),
    logLevel: readLogLevel(env, nodeEnv),
    corsOrigins: envList(env, "CORS_ORIGINS", [
      "http://localhost:3000",
      "http://localhost:5173", // Vite default
    ]),
    redisUrl: envString(env, "REDIS_URL") || "redis://localhost:6379",
    mongoUri: envString(env, "MONGO_URI") || "mongodb://localhost:27017/rag_chat",
    auth: Object.freeze(readAuthConfig(env, nodeEnv)),
    rag: Object.freeze({
      openaiApiKey: envString(env, "OPENAI_API_KEY") ?? null,
      model: envString(env, "OPENAI_MODEL") || "gpt-4o-mini",
      vectorStoreId: envString(env, "OPENAI_VECTOR_STORE_ID") ?? null,
    }),
  });
}
