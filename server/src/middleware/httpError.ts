import type { NextFunction, Request, Response } from "express";

export class HttpError extends Error {
  status: number;
  code: string;
  details?: unknown;

  constructor(status: number, message: string, details?: unknown, code?: string) {
    super(message);
    this.name = "HttpError";
    this.status = status;
    this.code = code ?? (status >= 500 ? "INTERNAL_ERROR" : "REQUEST_ERROR");
    this.details = details;
  }
}

function resolveStatus(err: unknown): number {
  if (err instanceof HttpError) {
    return err.status;
  }
  // body-parser and friends attach a numeric status to their own errors
  if (typeof err === "object" && err !== null && "status" in err && Number.isInteger(err.status)) {
    return Number(err.status);
  }
  return 500;
}

export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction) {
  const status = resolveStatus(err);
  const message = err instanceof Error && err.message ? err.message : "Unexpected error";
  const body = {
    message,
    error: {
      code: err instanceof HttpError ? err.code : status >= 500 ? "INTERNAL_ERROR" : "REQUEST_ERROR",
      message,
      details: err instanceof HttpError ? err.details : undefined
    }
  };
  if (status === 500) {
    // eslint-disable-next-line no-console
    console.error(err);
  }
  res.status(status).json(body);
}
