/**
 * HTTP Response Helpers
 * =====================
 * Small helpers to keep routes consistent and reduce boilerplate.
 */

import type { Response } from "express";

import { AppError, AuthenticationError } from "./errors.js";
import { logger } from "./logger.js";

function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {return error.message;}
  try {
    return String(error);
  } catch {
    return "Unknown error";
  }
}

/**
 * Send a success response. `data` fields sit next to `success: true`.
 */
export function ok<T extends object>(res: Response, data: T, statusCode = 200) {
  return res.status(statusCode).json({ success: true, ...data });
}

export function noContent(res: Response) {
  return res.status(204).end();
}

/**
 * Send a standard error response.
 *
 * - Supports AppError for statusCode/code.
 * - Authentication failures keep their reason in the log only.
 * - Avoids leaking stack traces outside development by default.
 */
export function fail(
  res: Response,
  error: unknown,
  statusCode = 500,
  meta: Record<string, unknown> = {}
) {
  const msg = getErrorMessage(error);
  const app = error instanceof AppError ? error : null;
  const finalStatus = app?.statusCode ?? statusCode;

  const logPayload: Record<string, unknown> = {
    status: finalStatus,
    code: app?.code,
    error: msg,
    ...meta,
  };
  if (error instanceof AuthenticationError) {
    logPayload.reason = error.reason;
    if (error.detail) {logPayload.detail = error.detail;}
  }

  // Keep ERROR level for 5xx only.
  if (finalStatus >= 500) {
    logger.error("API error", logPayload);
  } else if (finalStatus === 401 || finalStatus === 403 || finalStatus === 404) {
    logger.info("API error", logPayload);
  } else {
    logger.warn("API error", logPayload);
  }

  const payload: Record<string, unknown> = {
    success: false,
    error: finalStatus >= 500 && !app ? "Internal server error" : msg || "Internal server error",
  };

  if (app?.code) {payload.code = app.code;}
  if (process.env.NODE_ENV === "development" && error instanceof Error) {
    payload.stack = error.stack;
  }

  return res.status(finalStatus).json(payload);
}
