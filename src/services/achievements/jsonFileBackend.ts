/**
 * Achievement backend persisted to a single JSON file.
 *
 * The file holds `{ scopeId: { subjectId: { definitionName: level } } }`. It
 * is read once at construction and rewritten in full after every change.
 * Write failures are not caught: they reach the caller of the mutation while
 * the in-memory state already holds the new level.
 */

import { logger } from "../../config/logger";
import { isRecord, loadJson, saveJson } from "../jsonStore";
import { InMemoryAchievementBackend, type ProgressTree } from "./backend";

/** Keep only integer levels; anything else in the file is dropped with a warning. */
function parseProgressTree(raw: unknown, filePath: string): ProgressTree {
  if (!isRecord(raw)) {
    logger.warn("achievements", "Progress file is not an object, starting empty", { filePath });
    return {};
  }

  const scopes: [string, Record<string, Record<string, number>>][] = [];
  for (const [scopeId, subjects] of Object.entries(raw)) {
    if (!isRecord(subjects)) continue;
    const members: [string, Record<string, number>][] = [];
    for (const [subjectId, levels] of Object.entries(subjects)) {
      if (!isRecord(levels)) continue;
      const parsed: [string, number][] = [];
      for (const [name, level] of Object.entries(levels)) {
        if (typeof level === "number" && Number.isInteger(level)) {
          parsed.push([name, level]);
        } else {
          logger.warn("achievements", "Skipping non-integer stored level", {
            scopeId,
            subjectId,
            name,
          });
        }
      }
      members.push([subjectId, Object.fromEntries(parsed)]);
    }
    scopes.push([scopeId, Object.fromEntries(members)]);
  }
  // fromEntries defines own keys, so "__proto__" ids survive
  return Object.fromEntries(scopes);
}

export class JsonFileAchievementBackend extends InMemoryAchievementBackend {
  readonly filePath: string;

  constructor(filePath: string) {
    super();
    this.filePath = filePath;
    this.reload();
  }

  /** Re-read the file, discarding in-memory state. */
  reload(): void {
    this.restore(parseProgressTree(loadJson(this.filePath), this.filePath));
  }

  protected override persist(): void {
    saveJson(this.filePath, this.snapshot());
  }
}
