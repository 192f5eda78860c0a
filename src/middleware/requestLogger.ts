import crypto from "crypto";
import { Request, Response, NextFunction } from "express";
import { logger } from "../config/logger";
import { monitoringService } from "../services/monitoringService";

/**
 * Request logging with request-id correlation.
 *
 * Each request gets a UUID (req.requestId and the X-Request-Id response
 * header). When the response finishes, method, path, status and duration
 * are logged and fed to the monitoring counters.
 */
function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const requestId = crypto.randomUUID();
  const start = Date.now();

  req.requestId = requestId;
  res.setHeader("X-Request-Id", requestId);

  res.on("finish", () => {
    const durationMs = Date.now() - start;
    monitoringService.recordRequest(durationMs);

    logger.info("http", `${req.method} ${req.originalUrl} ${res.statusCode}`, {
      requestId,
      member: req.member ? `${req.member.scopeId}/${req.member.subjectId}` : undefined,
      statusCode: res.statusCode,
      durationMs,
    });
  });

  next();
}

export { requestLogger };
