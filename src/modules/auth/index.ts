/**
 * Auth Module
 * ===========
 * JWT access tokens + rotating refresh tokens for the app.
 */

// ═══════════════════════════════════════════════════════════════════════════
// PRESENTATION LAYER
// ═══════════════════════════════════════════════════════════════════════════

export { createAuthRouter } from "./auth.routes.js";

// ═══════════════════════════════════════════════════════════════════════════
// ORCHESTRATION LAYER
// ═══════════════════════════════════════════════════════════════════════════

export { type AuthService, type AuthServiceDeps, createAuthService } from "./auth.service.js";

// ═══════════════════════════════════════════════════════════════════════════
// DATA LAYER
// ═══════════════════════════════════════════════════════════════════════════

export { createRedisTokenStore, type TokenStoreRedis } from "./auth.token-store.js";

// ═══════════════════════════════════════════════════════════════════════════
// FOUNDATION LAYER
// ═══════════════════════════════════════════════════════════════════════════

export type * from "./auth.types.js";
export type { LoginInput, RefreshInput } from "./auth.schemas.js";
export { readRefreshInput, validateLoginInput } from "./auth.schemas.js";
