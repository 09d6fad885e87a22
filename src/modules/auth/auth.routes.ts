/**
 * Auth Routes
 * ===========
 * JWT login/refresh/logout, session listing and "me" endpoint.
 */

import { type Request, type Response, Router } from "express";

import type { AuthConfig } from "../../config/env.js";
import { asyncHandler } from "../../middleware/async-handler.js";
import { requireAuth } from "../../middleware/authz.js";
import { getCookieValue } from "../../shared/auth.js";
import { requireRequestAuth } from "../../shared/auth-context.js";
import { noContent, ok } from "../../shared/http.js";
import { readRefreshInput, validateLoginInput } from "./auth.schemas.js";
import type { AuthService } from "./auth.service.js";
import type { TokenPair } from "./auth.types.js";

const COOKIE_PATH = "/auth";

function tokenBody(pair: TokenPair) {
  return {
    access_token: pair.accessToken,
    refresh_token: pair.refreshToken,
    token_type: pair.tokenType,
    expires_in: pair.accessExpiresIn,
    refresh_expires_in: pair.refreshExpiresIn,
  };
}

export function createAuthRouter(authService: AuthService, cfg: AuthConfig): Router {
  const router = Router();

  function setRefreshCookie(res: Response, refreshToken: string) {
    res.cookie(cfg.refreshCookieName, refreshToken, {
      httpOnly: true,
      secure: cfg.cookieSecure,
      sameSite: cfg.cookieSameSite,
      path: COOKIE_PATH,
      maxAge: cfg.refreshTtlSeconds * 1000,
    });
  }

  function clearRefreshCookie(res: Response) {
    res.clearCookie(cfg.refreshCookieName, {
      httpOnly: true,
      secure: cfg.cookieSecure,
      sameSite: cfg.cookieSameSite,
      path: COOKIE_PATH,
    });
  }

  // Body wins over cookie: non-browser clients send it explicitly.
  function presentedRefreshToken(req: Request): string {
    const input = readRefreshInput(req.body);
    const cookieToken = getCookieValue(req.headers.cookie, cfg.refreshCookieName);
    return input.refresh_token || cookieToken || "";
  }

  /**
   * @swagger
   * /auth/login:
   *   post:
   *     tags: [Auth]
   *     summary: Exchange email + password for an access/refresh token pair
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [email, password]
   *             properties:
   *               email: { type: string }
   *               password: { type: string }
   *     responses:
   *       200:
   *         description: Token pair
   *       401:
   *         description: Invalid credentials
   */
  router.post(
    "/login",
    asyncHandler(async (req: Request, res: Response) => {
      const input = validateLoginInput(req.body);

      const pair = await authService.login({
        email: input.email,
        password: input.password,
        ip: req.ip,
        userAgent: req.get("user-agent"),
      });

      setRefreshCookie(res, pair.refreshToken);
      return ok(res, tokenBody(pair));
    })
  );

  /**
   * @swagger
   * /auth/refresh_token:
   *   post:
   *     tags: [Auth]
   *     summary: Rotate a refresh token into a new token pair
   *     requestBody:
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             properties:
   *               refresh_token: { type: string }
   *     responses:
   *       200:
   *         description: New token pair; the presented refresh token is revoked
   *       401:
   *         description: Refresh token invalid, expired, revoked or unknown
   */
  router.post(
    "/refresh_token",
    asyncHandler(async (req: Request, res: Response) => {
      const pair = await authService.refresh({
        refreshToken: presentedRefreshToken(req),
        ip: req.ip,
        userAgent: req.get("user-agent"),
      });

      setRefreshCookie(res, pair.refreshToken);
      return ok(res, tokenBody(pair));
    })
  );

  /**
   * @swagger
   * /auth/logout:
   *   post:
   *     tags: [Auth]
   *     summary: Revoke a refresh token (idempotent)
   *     responses:
   *       204:
   *         description: Logged out
   */
  router.post(
    "/logout",
    asyncHandler(async (req: Request, res: Response) => {
      await authService.logout({ refreshToken: presentedRefreshToken(req) });
      clearRefreshCookie(res);
      return noContent(res);
    })
  );

  /**
   * @swagger
   * /auth/logout_all:
   *   post:
   *     tags: [Auth]
   *     summary: Revoke every refresh token of the current user
   *     security: [{ bearerAuth: [] }]
   *     responses:
   *       204:
   *         description: All sessions revoked
   */
  router.post(
    "/logout_all",
    requireAuth(authService),
    asyncHandler(async (req: Request, res: Response) => {
      const auth = requireRequestAuth(req);
      await authService.logoutAll(auth.userId);
      clearRefreshCookie(res);
      return noContent(res);
    })
  );

  /**
   * @swagger
   * /auth/me:
   *   get:
   *     tags: [Auth]
   *     summary: Current user
   *     security: [{ bearerAuth: [] }]
   *     responses:
   *       200:
   *         description: User profile
   */
  router.get(
    "/me",
    requireAuth(authService),
    asyncHandler(async (req: Request, res: Response) => {
      const auth = requireRequestAuth(req);
      const user = await authService.getProfile(auth.userId);
      return ok(res, { user });
    })
  );

  /**
   * @swagger
   * /auth/sessions:
   *   get:
   *     tags: [Auth]
   *     summary: Live refresh-token sessions of the current user
   *     security: [{ bearerAuth: [] }]
   *     responses:
   *       200:
   *         description: Sessions, newest first
   */
  router.get(
    "/sessions",
    requireAuth(authService),
    asyncHandler(async (req: Request, res: Response) => {
      const auth = requireRequestAuth(req);
      const sessions = await authService.listSessions(auth.userId);
      return ok(res, { sessions });
    })
  );

  return router;
}
