import type { ErrorRequestHandler, Request, Response } from "express";
import type { ApiError } from "@keyprint/core";
import { describeError, type Logger } from "./logger";

export class UsernameTakenError extends Error {
  constructor(readonly username: string) {
    super(`Username "${username}" is already registered.`);
    this.name = "UsernameTakenError";
  }
}

function makeError(error: ApiError): { error: ApiError } {
  return { error };
}

export function sendError(
  res: Response,
  status: number,
  code: string,
  message: string,
  details?: unknown
): void {
  const payload: ApiError = details === undefined ? { code, message } : { code, message, details };
  res.status(status).json(makeError(payload));
}

function isBodyParseError(error: unknown): boolean {
  return (
    error instanceof SyntaxError &&
    "type" in error &&
    error.type === "entity.parse.failed"
  );
}

export function notFoundHandler(req: Request, res: Response): void {
  sendError(res, 404, "NOT_FOUND", `No route for ${req.method} ${req.path}.`);
}

/** Last in the chain: anything a handler threw ends here. */
export function createErrorHandler(logger: Logger): ErrorRequestHandler {
  return (error: unknown, req, res, next) => {
    if (res.headersSent) {
      next(error);
      return;
    }

    if (isBodyParseError(error)) {
      sendError(res, 400, "INVALID_JSON", "Request body is not valid JSON.");
      return;
    }

    logger.error("unhandled request error", {
      method: req.method,
      path: req.path,
      ...describeError(error),
    });
    sendError(res, 500, "INTERNAL_ERROR", "Internal server error");
  };
}
