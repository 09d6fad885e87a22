/**
 * Auth Service
 * ============
 * Login / refresh / logout orchestration.
 *
 * Refresh tokens rotate on every use: the presented token id is revoked with
 * a compare-and-set before a new pair is minted, so a token id can be
 * exchanged at most once.
 */

import type { AuthConfig } from "../../config/env.js";
import { readStringArray, type SignedToken, signToken, verifyToken } from "../../shared/auth.js";
import { AuthenticationError, isAuthFailure } from "../../shared/errors.js";
import { logger } from "../../shared/logger.js";
import { verifyAgainstDummy, verifyPassword } from "../../shared/password.js";
import type { PublicUser, User, UserRepository } from "../users/index.js";
import { toPublicUser } from "../users/index.js";
import type {
  RefreshTokenRecord,
  SessionSummary,
  TokenPair,
  TokenStore,
  UserIdentity,
} from "./auth.types.js";

export type AuthServiceDeps = {
  config: AuthConfig;
  users: UserRepository;
  tokens: TokenStore;
  /** epoch ms; injectable for tests */
  now?: () => number;
};

export type ClientInfo = {
  ip?: string | null;
  userAgent?: string | null;
};

export type AuthService = {
  login(params: { email: string; password: string } & ClientInfo): Promise<TokenPair>;
  refresh(params: { refreshToken: string } & ClientInfo): Promise<TokenPair>;
  logout(params: { refreshToken: string }): Promise<void>;
  logoutAll(userId: string): Promise<number>;
  verify(accessToken: string): Promise<UserIdentity>;
  listSessions(userId: string): Promise<SessionSummary[]>;
  getProfile(userId: string): Promise<PublicUser>;
};

const log = logger.child({ component: "auth" });

function invalidCredentials(): never {
  // Same error for unknown email and wrong password.
  throw new AuthenticationError("InvalidCredentials");
}

function isLive(record: RefreshTokenRecord, nowMs: number): boolean {
  return !record.revoked && record.expiresAt > nowMs;
}

export function createAuthService(deps: AuthServiceDeps): AuthService {
  const { config, users, tokens } = deps;
  const now = deps.now ?? (() => Date.now());

  type MintedPair = {
    access: SignedToken;
    refresh: SignedToken;
    nowMs: number;
  };

  // Signing only; nothing is stored until `storePair`.
  async function mintPair(user: User): Promise<MintedPair> {
    const nowMs = now();
    const access = await signToken(config, {
      use: "access",
      subject: user.id,
      claims: { email: user.email, roles: user.roles },
      nowMs,
    });
    const refresh = await signToken(config, {
      use: "refresh",
      subject: user.id,
      nowMs,
    });
    return { access, refresh, nowMs };
  }

  async function storePair(user: User, minted: MintedPair, client: ClientInfo): Promise<TokenPair> {
    const { access, refresh, nowMs } = minted;
    await tokens.put(
      {
        tokenId: refresh.tokenId,
        userId: user.id,
        issuedAt: refresh.issuedAt,
        expiresAt: refresh.expiresAt,
        revoked: false,
        revokedAt: null,
        revokedReason: null,
        replacedBy: null,
        createdByIp: client.ip ?? null,
        userAgent: client.userAgent ?? null,
      },
      (refresh.expiresAt - nowMs) / 1000
    );

    return {
      accessToken: access.token,
      refreshToken: refresh.token,
      tokenType: "Bearer",
      accessExpiresIn: config.accessTtlSeconds,
      refreshExpiresIn: config.refreshTtlSeconds,
    };
  }

  return {
    async login(params) {
      const email = String(params.email || "").trim().toLowerCase();
      const password = String(params.password || "");
      if (!email || !password) {invalidCredentials();}

      const user = await users.findByEmail(email);
      if (!user || !user.passwordHash) {
        await verifyAgainstDummy(password);
        invalidCredentials();
      }

      const matches = await verifyPassword(password, user.passwordHash);
      if (!matches) {invalidCredentials();}

      const pair = await storePair(user, await mintPair(user), params);
      log.info("User logged in", { userId: user.id });
      return pair;
    },

    async refresh(params) {
      const raw = String(params.refreshToken || "").trim();
      if (!raw) {throw new AuthenticationError("MissingToken", "refresh token");}

      const nowMs = now();
      const presented = await verifyToken(config, raw, "refresh", nowMs);

      const record = await tokens.get(presented.tokenId);
      if (!record) {throw new AuthenticationError("TokenNotFound");}
      if (record.userId !== presented.subject) {
        throw new AuthenticationError("TokenInvalid", "subject mismatch");
      }
      if (record.revoked) {
        log.warn("Revoked refresh token presented", {
          userId: record.userId,
          tokenId: record.tokenId,
          revokedReason: record.revokedReason,
        });
        throw new AuthenticationError("TokenRevoked", record.revokedReason ?? undefined);
      }
      if (record.expiresAt <= nowMs) {throw new AuthenticationError("TokenExpired");}

      const user = await users.findById(record.userId);
      if (!user) {throw new AuthenticationError("TokenInvalid", "user no longer exists");}

      // Revoke before storing the successor; losing the race means someone
      // else rotated it.
      const next = await mintPair(user);
      const outcome = await tokens.revoke(record.tokenId, {
        reason: "rotated",
        replacedBy: next.refresh.tokenId,
        at: nowMs,
      });
      if (outcome === "already_revoked") {throw new AuthenticationError("TokenRevoked", "lost rotation race");}
      if (outcome === "not_found") {throw new AuthenticationError("TokenNotFound");}

      const pair = await storePair(user, next, params);
      log.debug("Refresh token rotated", { userId: user.id, tokenId: record.tokenId });
      return pair;
    },

    async logout(params) {
      const raw = String(params.refreshToken || "").trim();
      if (!raw) {return;}

      let tokenId: string;
      try {
        tokenId = (await verifyToken(config, raw, "refresh", now())).tokenId;
      } catch (err: unknown) {
        if (isAuthFailure(err)) {
          log.debug("Logout with unusable refresh token ignored", { reason: err.reason });
          return;
        }
        throw err;
      }

      const outcome = await tokens.revoke(tokenId, { reason: "logout", at: now() });
      log.info("User logged out", { tokenId, outcome });
    },

    async logoutAll(userId) {
      const nowMs = now();
      const records = await tokens.listForUser(userId);
      let revoked = 0;
      for (const record of records) {
        if (!isLive(record, nowMs)) {continue;}
        const outcome = await tokens.revoke(record.tokenId, { reason: "logout_all", at: nowMs });
        if (outcome === "revoked") {revoked += 1;}
      }
      log.info("All sessions revoked", { userId, revoked });
      return revoked;
    },

    async verify(accessToken) {
      const verified = await verifyToken(config, accessToken, "access", now());
      const email = typeof verified.claims.email === "string" ? verified.claims.email.trim() : "";
      if (!email) {throw new AuthenticationError("TokenInvalid", "missing email claim");}

      return {
        userId: verified.subject,
        email,
        roles: readStringArray(verified.claims.roles),
      };
    },

    async listSessions(userId) {
      const nowMs = now();
      const records = await tokens.listForUser(userId);
      return records
        .filter((r) => isLive(r, nowMs))
        .sort((a, b) => b.issuedAt - a.issuedAt)
        .map((r) => ({
          session_id: r.tokenId,
          issued_at: new Date(r.issuedAt).toISOString(),
          expires_at: new Date(r.expiresAt).toISOString(),
          created_by_ip: r.createdByIp,
          user_agent: r.userAgent,
        }));
    },

    async getProfile(userId) {
      const user = await users.findById(userId);
      if (!user) {throw new AuthenticationError("TokenInvalid", "user no longer exists");}
      return toPublicUser(user);
    },
  };
}
