// src/http/sendError.ts

import type { Response } from "express";

export type ErrorCode = "INVALID_REQUEST" | "NOT_FOUND" | "CONFLICT" | "SERVER_ERROR";

export function sendError(res: Response, status: number, message: string, code?: ErrorCode): Response {
  const rid: unknown = res.locals?.requestId;
  const requestId = typeof rid === "string" && rid ? rid : undefined;

  return res.status(status).json({
    error: message,
    ...(code ? { code } : {}),
    ...(requestId ? { requestId } : {}),
  });
}
