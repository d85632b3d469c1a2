// web-backend/middleware/errorHandler.ts
//
// Single conversion point from thrown errors to HTTP responses.
//
// Response shape: { error: <summary>, message: <short text> }
// - InvalidRequestError (and body-parser 4xx errors) -> 400-class, our own message
// - everything else -> 500, fixed generic message
// Internal error text goes to the log only.

import type { NextFunction, Request, Response } from "express";

import { Logger } from "../../depthcore/utils/logger";
import { InvalidRequestError, ProfileError } from "../../depthcore/profile/ProfileTypes";

const log = Logger.scope("WEB");

export const GENERIC_FAILURE_MESSAGE = "The depth profile could not be generated.";

type BodyParserError = Error & { type: string; status: number };

function isBodyParserError(err: unknown): err is BodyParserError {
  if (!(err instanceof Error)) return false;
  const rec: Record<string, unknown> = { ...err };
  return typeof rec.type === "string" && typeof rec.status === "number";
}

export function toProfileError(err: unknown): ProfileError {
  if (err instanceof ProfileError) return err;

  if (isBodyParserError(err) && err.status >= 400 && err.status < 500) {
    const message =
      err.type === "entity.parse.failed" ? "Request body is not valid JSON." : "Request body could not be read.";
    return new InvalidRequestError(message, { cause: err });
  }

  const detail = err instanceof Error ? err.message : String(err);
  return new ProfileError(`unexpected failure: ${detail}`, { cause: err });
}

export function errorHandler(err: unknown, req: Request, res: Response, next: NextFunction): void {
  const e = toProfileError(err);

  if (e.status >= 500) {
    log.error(`${req.method} ${req.path} failed`, e.cause ?? e);
  } else {
    log.warn(`${req.method} ${req.path} rejected: ${e.message}`);
  }

  if (res.headersSent) {
    next(err);
    return;
  }

  const message = e instanceof InvalidRequestError ? e.message : GENERIC_FAILURE_MESSAGE;
  res.status(e.status).json({ error: e.summary, message });
}
