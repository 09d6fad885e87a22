/**
 * JSON Body Parser
 * ================
 * `express.json` with a list of paths where a malformed body is treated as
 * an empty one instead of a 400 `INVALID_JSON`.
 */

import express, { type RequestHandler } from "express";

import { logger } from "../shared/logger.js";
import { isBodyParserSyntaxError } from "./error-handler.js";

export function jsonBody(options: { limit: string; lenientPaths?: string[] }): RequestHandler {
  const parse = express.json({ limit: options.limit });
  const lenient = new Set(options.lenientPaths ?? []);

  return (req, res, next) => {
    parse(req, res, (err?: unknown) => {
      if (err !== undefined && isBodyParserSyntaxError(err) && lenient.has(req.path)) {
        logger.debug("Malformed JSON body ignored", { path: req.path });
        req.body = {};
        next();
        return;
      }
      next(err);
    });
  };
}
