/**
 * Flat JSON file persistence.
 *
 * Every save rewrites the whole file: the data is written to a temp file next
 * to the target and renamed over it, so a crash mid-write leaves the previous
 * version in place. Reads and writes are synchronous; callers rely on that to
 * finish a read-modify-write within one turn of the event loop.
 */

import * as fs from "fs";
import * as path from "path";
import { logger } from "../config/logger";

/** Plain object guard for parsed JSON. */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Read and parse a JSON file. A missing file yields `fallback`; a file that
 * exists but does not parse is an error.
 */
export function loadJson(filePath: string, fallback: unknown = {}): unknown {
  if (!fs.existsSync(filePath)) {
    return fallback;
  }
  const raw = fs.readFileSync(filePath, "utf8");
  if (raw.trim() === "") {
    return fallback;
  }
  return JSON.parse(raw);
}

export function saveJson(filePath: string, data: unknown): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  const tmpPath = `${filePath}.${process.pid}.tmp`;
  fs.writeFileSync(tmpPath, JSON.stringify(data, null, 2) + "\n", "utf8");
  fs.renameSync(tmpPath, filePath);
}

/** Create the file with `initial` content when it does not exist yet. */
export function ensureJsonFile(filePath: string, initial: unknown = {}): void {
  if (fs.existsSync(filePath)) {
    return;
  }
  logger.info("storage", `Creating ${path.basename(filePath)}`, { path: filePath });
  saveJson(filePath, initial);
}
