/**
 * Auth Types
 * ==========
 */

export type RevokeReason = "rotated" | "logout" | "logout_all";

/**
 * Server-side state of one refresh token. Times are epoch ms.
 */
export type RefreshTokenRecord = {
  tokenId: string;
  userId: string;
  issuedAt: number;
  expiresAt: number;
  revoked: boolean;
  revokedAt: number | null;
  revokedReason: RevokeReason | null;
  replacedBy: string | null;
  createdByIp: string | null;
  userAgent: string | null;
};

export type RevokeOutcome = "revoked" | "already_revoked" | "not_found";

/**
 * Refresh-token state keyed by token id. Entries expire on their own after
 * the ttl given to `put`.
 *
 * `revoke` must be a compare-and-set: it only reports "revoked" to the one
 * caller that flipped the flag.
 */
export interface TokenStore {
  put(record: RefreshTokenRecord, ttlSeconds: number): Promise<void>;
  get(tokenId: string): Promise<RefreshTokenRecord | null>;
  revoke(
    tokenId: string,
    change: { reason: RevokeReason; replacedBy?: string | null; at: number }
  ): Promise<RevokeOutcome>;
  listForUser(userId: string): Promise<RefreshTokenRecord[]>;
}

export type UserIdentity = {
  userId: string;
  email: string;
  roles: string[];
};

export type TokenPair = {
  accessToken: string;
  refreshToken: string;
  tokenType: "Bearer";
  accessExpiresIn: number;
  refreshExpiresIn: number;
};

export type SessionSummary = {
  session_id: string;
  issued_at: string;
  expires_at: string;
  created_by_ip: string | null;
  user_agent: string | null;
};
