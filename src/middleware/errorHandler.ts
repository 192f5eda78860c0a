import { Request, Response, NextFunction } from "express";
import { logger } from "../config/logger";
import { AppError } from "../errors";
import { monitoringService } from "../services/monitoringService";

/** Express error shape for body-parser failures and the like. */
interface HttpishError extends Error {
  status?: number;
  statusCode?: number;
}

function errorHandler(
  err: HttpishError,
  req: Request,
  res: Response,
  _next: NextFunction,
): void {
  const appError = err instanceof AppError ? err : null;
  const statusCode = appError?.statusCode ?? err.statusCode ?? err.status ?? 500;
  const code = appError?.code ?? (statusCode === 500 ? "INTERNAL_ERROR" : "BAD_REQUEST");
  const message = statusCode === 500 ? "Internal server error" : err.message;
  const requestId = req.requestId;

  monitoringService.recordError();

  if (statusCode >= 500) {
    logger.error("server", "Unhandled error", {
      requestId,
      statusCode,
      error: err.message,
      ...(process.env.NODE_ENV === "development" && { stack: err.stack }),
    });
  } else {
    logger.warn("server", `${statusCode} - ${err.message}`, {
      requestId,
      statusCode,
      code,
    });
  }

  res.status(statusCode).json({
    error: {
      message,
      code,
      requestId,
      ...(appError?.details && { details: appError.details }),
      ...(process.env.NODE_ENV === "development" && { stack: err.stack }),
    },
  });
}

export { errorHandler };
