/**
 * Centralized environment configuration.
 * Validates required variables at import time and exports a typed config,
 * so a misconfigured server fails before it opens any data file.
 */

import dotenv from "dotenv";
import * as path from "path";

dotenv.config({ path: path.resolve(__dirname, "../../.env") });

interface EnvConfig {
  /** Secret used to verify member tokens issued by the chat gateway */
  JWT_SECRET: string;
  /** Server port (default: 3001) */
  PORT: number;
  /** Node environment (default: development) */
  NODE_ENV: string;
  /** Directory holding the JSON data files (default: ./data) */
  DATA_DIR: string;
  /** CORS origin for a dashboard front end (default: http://localhost:5173) */
  CORS_ORIGIN: string;
  /** Minimum log level: debug, info, warn, error (default: info) */
  LOG_LEVEL: string;
  /** Whether to trust X-Forwarded-For when running behind a proxy (default: false) */
  TRUST_PROXY: boolean;
  /** Rate limit window duration in milliseconds (default: 900000 = 15 minutes) */
  RATE_LIMIT_WINDOW_MS: number;
  /** Maximum number of requests per window per IP (default: 300) */
  RATE_LIMIT_MAX: number;
  /** Key expected in X-Admin-Key. Admin routes are closed while it is empty. */
  ADMIN_API_KEY: string;
  /** Credits granted when a member opens a bank account (default: 100) */
  STARTING_BALANCE: number;
  /** Seconds between stock price updates (default: 60) */
  STOCK_UPDATE_INTERVAL_SECONDS: number;
}

const REQUIRED_VARS = ["JWT_SECRET"] as const;

function validateEnv(): void {
  const missing = REQUIRED_VARS.filter((name) => {
    const value = process.env[name];
    return value === undefined || value.trim() === "";
  });

  if (missing.length > 0) {
    const message = [
      "",
      "=== Missing Required Environment Variables ===",
      "",
      ...missing.map((v) => `  - ${v}`),
      "",
      "Please set these variables in your .env file or environment.",
      "See .env.example for reference.",
      "",
    ].join("\n");

    throw new Error(message);
  }
}

function intVar(name: string, fallback: number): number {
  const parsed = parseInt(process.env[name] || "", 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function flagVar(name: string): boolean {
  return process.env[name] === "true" || process.env[name] === "1";
}

function loadEnvConfig(): EnvConfig {
  validateEnv();

  return {
    JWT_SECRET: process.env.JWT_SECRET || "",
    PORT: intVar("PORT", 3001),
    NODE_ENV: process.env.NODE_ENV || "development",
    DATA_DIR: path.resolve(process.env.DATA_DIR || "data"),
    CORS_ORIGIN: process.env.CORS_ORIGIN || "http://localhost:5173",
    LOG_LEVEL: (process.env.LOG_LEVEL || "info").toLowerCase(),
    TRUST_PROXY: flagVar("TRUST_PROXY"),
    RATE_LIMIT_WINDOW_MS: intVar("RATE_LIMIT_WINDOW_MS", 900000),
    RATE_LIMIT_MAX: intVar("RATE_LIMIT_MAX", 300),
    ADMIN_API_KEY: process.env.ADMIN_API_KEY || "",
    STARTING_BALANCE: intVar("STARTING_BALANCE", 100),
    STOCK_UPDATE_INTERVAL_SECONDS: intVar("STOCK_UPDATE_INTERVAL_SECONDS", 60),
  };
}

const env = loadEnvConfig();

export { env };
export type { EnvConfig };
