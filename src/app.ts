import "express-async-errors"; // Must be imported before any route handlers
import express, { Express, Request, Response } from "express";
import cors from "cors";
import helmet from "helmet";
import { env } from "./config/env";
import type { AppContext } from "./context";
import { errorHandler } from "./middleware/errorHandler";
import { generalLimiter } from "./middleware/rateLimiter";
import { requestLogger } from "./middleware/requestLogger";
import { sanitizeBody } from "./middleware/sanitize";
import { createApiRouter } from "./routes/index";

export function createApp(ctx: AppContext): Express {
  const app = express();

  // Trust proxy headers (X-Forwarded-For, etc.) when running behind a reverse proxy.
  // Required for accurate IP detection in rate limiting and request logging.
  if (env.TRUST_PROXY) {
    app.set("trust proxy", 1);
  }

  // Security headers
  app.use(helmet());

  app.use(
    cors({
      origin: env.CORS_ORIGIN,
      credentials: true,
    }),
  );

  // Body parsing
  app.use(express.json());

  // Input sanitization (trim, strip HTML, enforce field length limits)
  app.use(sanitizeBody);

  // Request logging
  app.use(requestLogger);

  // General rate limiting
  app.use("/api", generalLimiter);

  // API routes
  app.use("/api", createApiRouter(ctx));

  // Catch-all 404 for any /api route that was not matched above
  app.use("/api", (_req: Request, res: Response) => {
    res.status(404).json({
      error: {
        message: "Not found",
        code: "NOT_FOUND",
      },
    });
  });

  // Error handling middleware (must be last)
  app.use(errorHandler);

  return app;
}
