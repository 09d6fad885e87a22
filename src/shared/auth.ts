import { randomUUID } from "node:crypto";

import { errors as joseErrors, type JWTPayload, jwtVerify, SignJWT } from "jose";

import type { AuthConfig } from "../config/env.js";
import { AuthenticationError } from "./errors.js";

export type TokenUse = "access" | "refresh";

export type SignedToken = {
  token: string;
  tokenId: string;
  /** epoch ms */
  issuedAt: number;
  /** epoch ms */
  expiresAt: number;
};

export type VerifiedToken = {
  subject: string;
  tokenId: string;
  tokenUse: TokenUse;
  issuedAt: number;
  expiresAt: number;
  claims: JWTPayload;
};

function signingKey(cfg: AuthConfig): Uint8Array {
  return new TextEncoder().encode(cfg.jwtSecret);
}

function ttlFor(cfg: AuthConfig, use: TokenUse): number {
  return use === "access" ? cfg.accessTtlSeconds : cfg.refreshTtlSeconds;
}

export async function signToken(
  cfg: AuthConfig,
  params: {
    use: TokenUse;
    subject: string;
    claims?: Record<string, unknown>;
    nowMs: number;
  }
): Promise<SignedToken> {
  const tokenId = randomUUID();
  const iat = Math.floor(params.nowMs / 1000);
  const exp = iat + ttlFor(cfg, params.use);

  const token = await new SignJWT({ ...params.claims, token_use: params.use })
    .setProtectedHeader({ alg: "HS256", typ: "JWT" })
    .setIssuer(cfg.issuer)
    .setAudience(cfg.audience)
    .setSubject(params.subject)
    .setJti(tokenId)
    .setIssuedAt(iat)
    .setExpirationTime(exp)
    .sign(signingKey(cfg));

  return { token, tokenId, issuedAt: iat * 1000, expiresAt: exp * 1000 };
}

function readTokenUse(value: unknown): TokenUse | null {
  return value === "access" ? "access" : value === "refresh" ? "refresh" : null;
}

/**
 * Verifies signature, issuer, audience and expiry at `nowMs`, then checks the
 * token is meant for `expected`.
 *
 * Throws `AuthenticationError` with reason `TokenExpired` or `TokenInvalid`.
 */
export async function verifyToken(
  cfg: AuthConfig,
  token: string,
  expected: TokenUse,
  nowMs: number
): Promise<VerifiedToken> {
  let payload: JWTPayload;
  try {
    const result = await jwtVerify(token, signingKey(cfg), {
      issuer: cfg.issuer,
      audience: cfg.audience,
      algorithms: ["HS256"],
      currentDate: new Date(nowMs),
    });
    payload = result.payload;
  } catch (err: unknown) {
    if (err instanceof joseErrors.JWTExpired) {
      throw new AuthenticationError("TokenExpired", `${expected} token expired`);
    }
    const detail = err instanceof Error ? err.message : String(err);
    throw new AuthenticationError("TokenInvalid", detail);
  }

  const subject = typeof payload.sub === "string" ? payload.sub.trim() : "";
  const tokenId = typeof payload.jti === "string" ? payload.jti.trim() : "";
  const tokenUse = readTokenUse(payload.token_use);
  if (!subject || !tokenId || typeof payload.iat !== "number" || typeof payload.exp !== "number") {
    throw new AuthenticationError("TokenInvalid", "missing registered claims");
  }
  if (tokenUse !== expected) {
    throw new AuthenticationError("TokenInvalid", `expected ${expected} token, got ${tokenUse ?? "unknown"}`);
  }

  return {
    subject,
    tokenId,
    tokenUse,
    issuedAt: payload.iat * 1000,
    expiresAt: payload.exp * 1000,
    claims: payload,
  };
}

export function readStringArray(payloadValue: unknown): string[] {
  if (!Array.isArray(payloadValue)) {return [];}
  const out: string[] = [];
  for (const v of payloadValue) {
    if (typeof v === "string" && v.trim()) {out.push(v.trim());}
  }
  return out;
}

export function extractBearerToken(value: unknown): string | null {
  if (typeof value !== "string") {return null;}
  const v = value.trim();
  if (!v) {return null;}
  const m = /^Bearer\s+(.+)$/i.exec(v);
  if (!m) {return null;}
  const token = m[1]?.trim();
  return token ? token : null;
}

export function parseCookieHeader(header: unknown): Record<string, string> {
  if (typeof header !== "string" || header.trim().length === 0) {return {};}
  const out: Record<string, string> = {};
  const parts = header.split(";");
  for (const part of parts) {
    const idx = part.indexOf("=");
    if (idx === -1) {continue;}
    const rawKey = part.slice(0, idx).trim();
    const rawVal = part.slice(idx + 1).trim();
    if (!rawKey) {continue;}
    try {
      out[rawKey] = decodeURIComponent(rawVal);
    } catch {
      out[rawKey] = rawVal;
    }
  }
  return out;
}

export function getCookieValue(cookieHeader: unknown, name: string): string | null {
  const cookies = parseCookieHeader(cookieHeader);
  const v = cookies[name];
  return typeof v === "string" && v.length > 0 ? v : null;
}
