import { Request } from "express";
import { ValidationError } from "../errors";
import { isRecord } from "../services/jsonStore";

/** The parsed JSON body as a plain record (empty when there is none). */
export function bodyOf(req: Request): Record<string, unknown> {
  const body: unknown = req.body;
  return isRecord(body) ? body : {};
}

export function optionalString(body: Record<string, unknown>, field: string): string | undefined {
  const value = body[field];
  if (value === undefined) return undefined;
  if (typeof value !== "string" || value === "") {
    throw new ValidationError(`${field} must be a non-empty string`, { field });
  }
  return value;
}

export function requireString(body: Record<string, unknown>, field: string): string {
  const value = optionalString(body, field);
  if (value === undefined) {
    throw new ValidationError(`${field} is required`, { field });
  }
  return value;
}
