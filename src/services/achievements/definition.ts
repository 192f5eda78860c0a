/**
 * Achievement definitions: the template a subject's progress is measured
 * against. A definition is identified by its unique name, which is also the
 * key its progress is stored under.
 */

import { GoalSet } from "./goalSet";
import type { EvaluateHook, GoalRecord, IncrementHook } from "./types";

export interface AchievementDefinitionOptions {
  /** Unique name; used as the storage key */
  name: string;
  /** Display title (defaults to the name) */
  title?: string;
  /** Required for registration with a tracker */
  category: string;
  keywords?: readonly string[];
  goals?: readonly GoalRecord[];
  /** Replaces the default `current + amount` increment */
  increment?: IncrementHook;
  /** Computes the level from evaluate() input; without it evaluate leaves the level alone */
  evaluate?: EvaluateHook;
}

export class AchievementDefinition {
  readonly name: string;
  readonly title: string;
  readonly category: string;
  readonly keywords: ReadonlySet<string>;
  readonly goals: GoalSet;
  readonly incrementHook?: IncrementHook;
  readonly evaluateHook?: EvaluateHook;

  constructor(options: AchievementDefinitionOptions) {
    this.name = options.name;
    this.title = options.title ?? options.name;
    this.category = options.category;
    this.keywords = new Set(options.keywords ?? []);
    this.goals = new GoalSet(options.goals ?? []);
    this.incrementHook = options.increment;
    this.evaluateHook = options.evaluate;
  }

  hasKeywords(keywords: readonly string[]): boolean {
    return keywords.every((keyword) => this.keywords.has(keyword));
  }
}

export function defineAchievement(options: AchievementDefinitionOptions): AchievementDefinition {
  return new AchievementDefinition(options);
}
