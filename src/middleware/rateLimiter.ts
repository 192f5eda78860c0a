/**
 * Rate limiting middleware using express-rate-limit.
 *
 *   - generalLimiter — every /api route, RATE_LIMIT_MAX per RATE_LIMIT_WINDOW_MS per IP
 *   - tradeLimiter   — purchases (loyalty buys, stock trades), 30 per minute per IP
 *
 * In-memory store; fine for the single-process deployment this server runs as.
 */

import rateLimit, { ipKeyGenerator } from "express-rate-limit";
import { Request } from "express";
import { env } from "../config/env";

const isTest = process.env.NODE_ENV === "test";

/** High enough that test suites never trip it. */
const testMax = 10000;

export const generalLimiter = rateLimit({
  windowMs: env.RATE_LIMIT_WINDOW_MS,
  max: isTest ? testMax : env.RATE_LIMIT_MAX,
  standardHeaders: true,
  legacyHeaders: false,
  // ipKeyGenerator collapses IPv6 addresses to /56 subnets.
  keyGenerator: (req: Request) => ipKeyGenerator(req.ip || "unknown"),
  message: {
    error: {
      message: "Too many requests, please try again later.",
      code: "RATE_LIMIT_EXCEEDED",
    },
  },
});

export const tradeLimiter = rateLimit({
  windowMs: 60 * 1000,
  max: isTest ? testMax : 30,
  standardHeaders: true,
  legacyHeaders: false,
  keyGenerator: (req: Request) => ipKeyGenerator(req.ip || "unknown"),
  message: {
    error: {
      message: "Too many purchases, please slow down.",
      code: "TRADE_RATE_LIMIT_EXCEEDED",
    },
  },
});
