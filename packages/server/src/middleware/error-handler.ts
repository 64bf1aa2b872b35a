import type { Request, Response, NextFunction } from "express";
import { ZodError } from "zod";
import { RoutePlanningError } from "@surface-route/routing";
import type { ErrorResponse } from "../models/responses.js";

export interface ErrorReply {
  status: number;
  body: ErrorResponse;
}

/** HTTP status and body for a failed request; null for non-Error values */
export function toErrorReply(err: unknown): ErrorReply | null {
  if (err instanceof ZodError) {
    console.warn(`[validation] ${JSON.stringify(err.issues)}`);
    return {
      status: 422,
      body: { message: "Validation failed", details: err.issues },
    };
  }

  if (err instanceof RoutePlanningError) {
    console.error(`[error] ${err.name}: ${err.message}`);
    return { status: err.status, body: { message: err.message } };
  }

  if (err instanceof Error) {
    console.error(`[error] ${err.message}`);
    return { status: 500, body: { message: err.message } };
  }

  return null;
}

export function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  next: NextFunction,
): void {
  const reply = toErrorReply(err);
  if (!reply) {
    next(err);
    return;
  }
  res.status(reply.status).json(reply.body);
}
