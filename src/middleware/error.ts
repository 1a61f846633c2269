import type { Request, Response, NextFunction } from "express";
import { ZodError } from "zod";
import { CatalogError } from "../services/catalog/sqliteFoodCatalog.js";
import { logger } from "../utils/logger.js";

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly code?: string;

  constructor(message: string, statusCode: number, code?: string) {
    super(message);
    this.statusCode = statusCode;
    this.isOperational = true;
    this.code = code;
    Error.captureStackTrace(this, this.constructor);
  }
}

export function errorHandler(
  err: Error,
  _req: Request,
  res: Response,
  _next: NextFunction
) {
  if (err instanceof ZodError) {
    logger.warn({
      msg: "Validation error",
      errors: err.errors,
    });

    return res.status(400).json({
      error: "validation_error",
      message: "Invalid request data",
      details: err.errors.map((e) => ({
        path: e.path.join("."),
        message: e.message,
      })),
    });
  }

  const operational = err instanceof CatalogError
    ? new AppError(err.message, err.code === "food_not_found" ? 404 : 400, err.code)
    : err;

  if (operational instanceof AppError) {
    logger.warn({
      msg: "Operational error",
      code: operational.code,
      statusCode: operational.statusCode,
      message: operational.message,
    });

    return res.status(operational.statusCode).json({
      error: operational.code ?? "error",
      message: operational.message,
    });
  }

  if (err instanceof SyntaxError && "body" in err) {
    return res.status(400).json({
      error: "invalid_json",
      message: "Request body is not valid JSON",
    });
  }

  logger.error({
    msg: "Internal server error",
    error: err.message,
    stack: err.stack,
  });

  return res.status(500).json({
    error: "internal_error",
    message: "An unexpected error occurred",
  });
}

export function notFoundHandler(_req: Request, res: Response) {
  res.status(404).json({
    error: "not_found",
    message: "The requested resource was not found",
  });
}
