/**
 * Shared types for the achievement tracking engine.
 */

import type { Achievement } from "./achievement";
import type { AchievementDefinition } from "./definition";

/** One level threshold of a definition. */
export interface GoalRecord {
  /** Progress that must be reached (>=) for the goal to count as met */
  level: number;
  name: string;
  description: string;
}

/**
 * Identity of a tracked subject: a community (server) and a member inside it.
 * The engine only ever compares these ids.
 */
export interface SubjectKey {
  scopeId: string;
  subjectId: string;
}

/** Free-form input passed through increment/evaluate to definition hooks. */
export type EvaluationInput = Readonly<Record<string, unknown>>;

/** Computes the new level for an increment. Defaults to `current + amount`. */
export type IncrementHook = (current: number, amount: number, input: EvaluationInput) => number;

/** Computes the new level from arbitrary input. Defaults to leaving it unchanged. */
export type EvaluateHook = (current: number, input: EvaluationInput) => number;

/** Progress level plus the next goal to reach (null once every goal is met). */
export interface CurrentProgress {
  level: number;
  goal: GoalRecord | null;
}

/** A definition given either by registered name or by handle. */
export type DefinitionRef = string | AchievementDefinition;

export interface DefinitionFilter {
  /** Exact category match */
  category?: string;
  /** Every keyword must be present on the definition */
  keywords?: readonly string[];
}

// ---------------------------------------------------------------------------
// Signal payloads
// ---------------------------------------------------------------------------

export interface ProgressEvent {
  subject: SubjectKey;
  achievement: Achievement;
}

export interface GoalsAchievedEvent extends ProgressEvent {
  /** Goals reached by this mutation only */
  goals: GoalRecord[];
}
