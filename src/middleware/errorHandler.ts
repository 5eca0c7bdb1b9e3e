// src/middleware/errorHandler.ts

import type { NextFunction, Request, Response } from "express";
import { sendError } from "../http/sendError";
import { describeError, logEvent } from "../utils/logger";

// body-parser and friends tag their errors with an http status
function clientErrorStatus(err: unknown): number | null {
  if (!(err instanceof Error) || !("status" in err)) return null;
  const status = err.status;
  return typeof status === "number" && Number.isInteger(status) && status >= 400 && status < 500 ? status : null;
}

function clientErrorMessage(status: number): string {
  if (status === 400) return "Malformed JSON body";
  if (status === 413) return "Request body too large";
  return "Invalid request";
}

export function errorHandler(err: unknown, _req: Request, res: Response, next: NextFunction) {
  const requestId = typeof res.locals?.requestId === "string" ? res.locals.requestId : undefined;
  const status = clientErrorStatus(err);

  if (status !== null) {
    logEvent("warn", "request_rejected", { requestId, status, error: describeError(err) });
  } else {
    logEvent("error", "unhandled_error", { requestId, error: describeError(err) });
  }

  if (res.headersSent) return next(err);
  return status !== null
    ? sendError(res, status, clientErrorMessage(status), "INVALID_REQUEST")
    : sendError(res, 500, "Server error", "SERVER_ERROR");
}
