/**
 * Input sanitization middleware.
 *
 * Trims and strips HTML tags from every string in `req.body` (recursively),
 * then truncates the fields that end up in announcements or data files:
 *     name        -> 64 chars
 *     description -> 200 chars
 *     command     -> 64 chars
 *
 * Apply after body parsing and before route handlers.
 */

import { Request, Response, NextFunction } from "express";

const FIELD_MAX_LENGTHS: Record<string, number> = {
  name: 64,
  description: 200,
  command: 64,
};

function stripHtmlTags(value: string): string {
  return value.replace(/<[^>]*>/g, "");
}

function sanitizeValue(key: string, value: unknown): unknown {
  if (typeof value === "string") {
    const sanitized = stripHtmlTags(value.trim());
    const maxLen = FIELD_MAX_LENGTHS[key];
    return maxLen && sanitized.length > maxLen ? sanitized.slice(0, maxLen) : sanitized;
  }

  if (Array.isArray(value)) {
    return value.map((item, index) => sanitizeValue(String(index), item));
  }

  if (value !== null && typeof value === "object") {
    const result: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      result[k] = sanitizeValue(k, v);
    }
    return result;
  }

  return value;
}

function sanitizeBody(req: Request, _res: Response, next: NextFunction): void {
  if (req.body && typeof req.body === "object") {
    req.body = sanitizeValue("", req.body);
  }
  next();
}

export { sanitizeBody, stripHtmlTags };
