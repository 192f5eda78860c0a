/**
 * Ordered goal thresholds for one achievement definition.
 *
 * Records stay sorted ascending by level and levels are unique: adding a goal
 * at a level that is already taken replaces the existing record. The set is
 * shared by reference with every Achievement of its definition, so edits show
 * up in progress that was loaded before the edit. `version` counts edits.
 */

import { ValidationError } from "../../errors";
import type { GoalRecord } from "./types";

function byLevel(a: GoalRecord, b: GoalRecord): number {
  return a.level - b.level;
}

function validateGoal(goal: GoalRecord): GoalRecord {
  if (!Number.isInteger(goal.level) || goal.level < 0) {
    throw new ValidationError(`Goal level must be a non-negative integer, got ${goal.level}`, {
      field: "level",
    });
  }
  if (typeof goal.name !== "string" || goal.name.trim() === "") {
    throw new ValidationError("Goal name is required", { field: "name" });
  }
  return {
    level: goal.level,
    name: goal.name,
    description: typeof goal.description === "string" ? goal.description : "",
  };
}

export class GoalSet {
  private goals: GoalRecord[] = [];
  private revision = 0;

  constructor(initial: readonly GoalRecord[] = []) {
    this.load(initial);
  }

  /** Number of edits applied since construction. */
  get version(): number {
    return this.revision;
  }

  get size(): number {
    return this.goals.length;
  }

  /** Sorted snapshot; mutating it does not touch the set. */
  records(): GoalRecord[] {
    return this.goals.map((goal) => ({ ...goal }));
  }

  /** Read-only view used by the derived Achievement properties. */
  view(): readonly GoalRecord[] {
    return this.goals;
  }

  add(level: number, name: string, description: string): GoalRecord {
    const goal = validateGoal({ level, name, description });
    this.goals = this.goals.filter((g) => g.level !== goal.level);
    this.goals.push(goal);
    this.goals.sort(byLevel);
    this.revision++;
    return { ...goal };
  }

  /**
   * Removes every goal whose name OR level matches. A goal that merely shares
   * the level of the one being targeted is removed as well; use removeExact
   * to match on both.
   */
  remove(name?: string, level?: number): GoalRecord[] {
    return this.removeWhere((g) => g.name === name || g.level === level);
  }

  /** Removes the goal matching both name and level. */
  removeExact(name: string, level: number): GoalRecord[] {
    return this.removeWhere((g) => g.name === name && g.level === level);
  }

  /** Replaces the whole set, e.g. from a persisted override. */
  replaceAll(records: readonly GoalRecord[]): void {
    this.load(records);
    this.revision++;
  }

  private load(records: readonly GoalRecord[]): void {
    const byLevelMap = new Map<number, GoalRecord>();
    for (const record of records) {
      const goal = validateGoal(record);
      byLevelMap.set(goal.level, goal);
    }
    this.goals = [...byLevelMap.values()].sort(byLevel);
  }

  private removeWhere(match: (goal: GoalRecord) => boolean): GoalRecord[] {
    const removed = this.goals.filter(match);
    if (removed.length > 0) {
      this.goals = this.goals.filter((g) => !match(g));
      this.revision++;
    }
    return removed.map((goal) => ({ ...goal }));
  }
}
