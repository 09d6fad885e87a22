import type { UserIdentity } from "../modules/auth/auth.types.js";
import { AuthenticationError } from "./errors.js";

export type AuthContext = UserIdentity & {
  kind: "user";
};

// Keyed by request object; avoids global `Express.Request` augmentation.
const contexts = new WeakMap<object, AuthContext>();

export function getRequestAuth(req: object): AuthContext | undefined {
  return contexts.get(req);
}

export function setRequestAuth(req: object, ctx: AuthContext | undefined): void {
  if (ctx) {
    contexts.set(req, ctx);
  } else {
    contexts.delete(req);
  }
}

/**
 * Auth context of a request that went through `requireAuth`.
 */
export function requireRequestAuth(req: object): AuthContext {
  const ctx = getRequestAuth(req);
  if (!ctx) {throw new AuthenticationError("MissingToken", "route not guarded");}
  return ctx;
}
