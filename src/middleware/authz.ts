import type { RequestHandler } from "express";

import type { AuthService } from "../modules/auth/auth.service.js";
import { extractBearerToken } from "../shared/auth.js";
import { setRequestAuth } from "../shared/auth-context.js";
import { AuthenticationError } from "../shared/errors.js";

/**
 * Guard for protected routes: requires `Authorization: Bearer <access_token>`
 * and attaches the verified identity (see `requireRequestAuth`).
 */
export function requireAuth(auth: Pick<AuthService, "verify">): RequestHandler {
  return (req, _res, next) => {
    setRequestAuth(req, undefined);

    const bearer = extractBearerToken(req.headers.authorization);
    if (!bearer) {return next(new AuthenticationError("MissingToken", "bearer header"));}

    void auth
      .verify(bearer)
      .then((identity) => {
        setRequestAuth(req, { kind: "user", ...identity });
        next();
      })
      .catch(next);
  };
}

