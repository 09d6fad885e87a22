/**
 * Refresh Token Store (Redis)
 * ===========================
 * One hash per refresh token, expiring with the token itself.
 *
 * Keys:
 * - `refresh_token:<tokenId>`        hash with the record fields
 * - `user_refresh_tokens:<userId>`   set of token ids issued to the user
 *
 * Revocation is a Lua compare-and-set so two concurrent rotations of the
 * same token cannot both succeed.
 *
 * The per-user index only ever has its expiry pushed forward
 * (`PEXPIRE NX` then `PEXPIRE GT`, Redis 7+).
 */

import { logger } from "../../shared/logger.js";
import type { RefreshTokenRecord, RevokeOutcome, RevokeReason, TokenStore } from "./auth.types.js";

const TOKEN_PREFIX = "refresh_token:";
const USER_PREFIX = "user_refresh_tokens:";

// 1 = flipped to revoked, -1 = already revoked, 0 = no such token
const REVOKE_SCRIPT = `
local state = redis.call("HGET", KEYS[1], "revoked")
if not state then
  return 0
end
if state == "1" then
  return -1
end
redis.call("HSET", KEYS[1], "revoked", "1", "revoked_at", ARGV[1], "revoked_reason", ARGV[2], "replaced_by", ARGV[3])
return 1
`;

export type TokenStoreMulti = {
  hSet(key: string, value: Record<string, string>): TokenStoreMulti;
  pExpire(key: string, milliseconds: number, mode?: "NX" | "GT"): TokenStoreMulti;
  sAdd(key: string, member: string): TokenStoreMulti;
  exec(): Promise<unknown>;
};

/**
 * Redis commands the store issues. A connected `RedisClient` satisfies it.
 */
export type TokenStoreRedis = {
  multi(): TokenStoreMulti;
  hGetAll(key: string): Promise<Record<string, string>>;
  sMembers(key: string): Promise<string[]>;
  sRem(key: string, members: string[]): Promise<number>;
  sendCommand(args: string[]): Promise<unknown>;
};

function tokenKey(tokenId: string): string {
  return `${TOKEN_PREFIX}${tokenId}`;
}

function userKey(userId: string): string {
  return `${USER_PREFIX}${userId}`;
}

function toHash(record: RefreshTokenRecord): Record<string, string> {
  return {
    token_id: record.tokenId,
    user_id: record.userId,
    issued_at: String(record.issuedAt),
    expires_at: String(record.expiresAt),
    revoked: record.revoked ? "1" : "0",
    revoked_at: record.revokedAt === null ? "" : String(record.revokedAt),
    revoked_reason: record.revokedReason ?? "",
    replaced_by: record.replacedBy ?? "",
    created_by_ip: record.createdByIp ?? "",
    user_agent: record.userAgent ?? "",
  };
}

function readReason(value: string | undefined): RevokeReason | null {
  return value === "rotated" || value === "logout" || value === "logout_all" ? value : null;
}

function emptyToNull(value: string | undefined): string | null {
  return value ? value : null;
}

export function fromHash(hash: Record<string, string>): RefreshTokenRecord | null {
  const tokenId = hash.token_id;
  const userId = hash.user_id;
  const issuedAt = Number(hash.issued_at);
  const expiresAt = Number(hash.expires_at);
  if (!tokenId || !userId || !Number.isFinite(issuedAt) || !Number.isFinite(expiresAt)) {
    return null;
  }

  const revokedAt = hash.revoked_at ? Number(hash.revoked_at) : null;
  return {
    tokenId,
    userId,
    issuedAt,
    expiresAt,
    revoked: hash.revoked === "1",
    revokedAt: revokedAt !== null && Number.isFinite(revokedAt) ? revokedAt : null,
    revokedReason: readReason(hash.revoked_reason),
    replacedBy: emptyToNull(hash.replaced_by),
    createdByIp: emptyToNull(hash.created_by_ip),
    userAgent: emptyToNull(hash.user_agent),
  };
}

function readRevokeReply(reply: unknown): RevokeOutcome {
  if (reply === 1) {return "revoked";}
  if (reply === -1) {return "already_revoked";}
  return "not_found";
}

export function createRedisTokenStore(redis: TokenStoreRedis): TokenStore {
  async function get(tokenId: string): Promise<RefreshTokenRecord | null> {
    const hash = await redis.hGetAll(tokenKey(tokenId));
    if (Object.keys(hash).length === 0) {return null;}

    const record = fromHash(hash);
    if (!record) {
      logger.warn("Discarding malformed refresh token entry", { tokenId });
    }
    return record;
  }

  return {
    async put(record, ttlSeconds) {
      const ttlMs = Math.max(1000, Math.floor(ttlSeconds * 1000));
      await redis
        .multi()
        .hSet(tokenKey(record.tokenId), toHash(record))
        .pExpire(tokenKey(record.tokenId), ttlMs)
        .sAdd(userKey(record.userId), record.tokenId)
        .pExpire(userKey(record.userId), ttlMs, "NX")
        .pExpire(userKey(record.userId), ttlMs, "GT")
        .exec();
    },

    get,

    async revoke(tokenId, change) {
      const reply = await redis.sendCommand([
        "EVAL",
        REVOKE_SCRIPT,
        "1",
        tokenKey(tokenId),
        String(change.at),
        change.reason,
        change.replacedBy ?? "",
      ]);
      return readRevokeReply(reply);
    },

    async listForUser(userId) {
      const ids = await redis.sMembers(userKey(userId));
      const records: RefreshTokenRecord[] = [];
      const gone: string[] = [];

      for (const id of ids) {
        const record = await get(id);
        if (record) {
          records.push(record);
        } else {
          gone.push(id);
        }
      }

      // Ids whose hash already expired.
      if (gone.length > 0) {
        await redis.sRem(userKey(userId), gone);
      }
      return records;
    },
  };
}
