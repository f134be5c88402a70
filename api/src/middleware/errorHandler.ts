// Централизованная обработка ошибок
import { Request, Response, NextFunction, RequestHandler } from "express";

export class AppError extends Error {
  statusCode: number;
  isOperational: boolean;
  code: string | null;
  details: unknown;

  constructor(
    message: string,
    statusCode: number = 500,
    options?: { isOperational?: boolean; code?: string; details?: unknown }
  ) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.isOperational = options?.isOperational ?? true;
    this.code = options?.code ?? null;
    this.details = options?.details ?? null;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * The journal returned something the view cannot fold safely. The entity is
 * dropped and rebuilt from scratch on the next request.
 */
export class ReplayInconsistencyError extends AppError {
  constructor(message: string, details?: { persistenceId: string; offset?: number; [key: string]: unknown }) {
    super(message, 500, { code: "replay_inconsistency", details, isOperational: false });
  }
}

export const asyncHandler =
  (fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>): RequestHandler =>
  (req, res, next) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };

export const errorHandler = (err: Error, _req: Request, res: Response, next: NextFunction) => {
  if (res.headersSent) {
    return next(err);
  }

  if (process.env.NODE_ENV === "development") {
    console.error("Error:", err);
  } else if (process.env.NODE_ENV !== "test" || !(err instanceof AppError)) {
    // В production логируем только message
    console.error("Error:", err.message);
  }

  if (err instanceof AppError) {
    const payload: Record<string, unknown> = {
      error: err.message,
    };
    if (err.code) payload.code = err.code;
    if (err.details) payload.details = err.details;
    if (process.env.NODE_ENV === "development" && err.stack) {
      payload.stack = err.stack;
    }
    return res.status(err.statusCode).json(payload);
  }

  res.status(500).json({
    error: process.env.NODE_ENV === "production" ? "Internal server error" : err.message,
    ...(process.env.NODE_ENV === "development" && { stack: err.stack }),
  });
};
