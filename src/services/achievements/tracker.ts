/**
 * Achievement tracker.
 *
 * Owns a registry of definitions and runs every progress mutation through
 * the backend:
 *
 *   1. resolve the definition (by name or handle) and fetch the achievement
 *   2. snapshot the level and the achieved goals
 *   3. mutate (increment / evaluate / setLevel)
 *   4. persist the new level through the backend
 *   5. emit signals for what changed
 *
 * Signals go out with fault-tolerant delivery and the tracker as sender.
 * A failing receiver is logged and never fails the mutation.
 */

import { logger } from "../../config/logger";
import { ValidationError } from "../../errors";
import type { Achievement } from "./achievement";
import type { AchievementBackend } from "./backend";
import { AchievementDefinition } from "./definition";
import { AlreadyRegisteredError, NotRegisteredError } from "./errors";
import {
  createAchievementSignals,
  type AchievementSignals,
  type RobustSignalResult,
} from "./signals";
import type {
  CurrentProgress,
  DefinitionFilter,
  DefinitionRef,
  EvaluationInput,
  GoalRecord,
  SubjectKey,
} from "./types";

export interface AchievementTrackerOptions {
  backend: AchievementBackend;
  /** Signals to emit on; a fresh set is created when omitted */
  signals?: AchievementSignals;
}

function sameGoal(a: GoalRecord, b: GoalRecord): boolean {
  return a.level === b.level && a.name === b.name && a.description === b.description;
}

function asList(
  definitions: AchievementDefinition | readonly AchievementDefinition[],
): readonly AchievementDefinition[] {
  return definitions instanceof AchievementDefinition ? [definitions] : definitions;
}

export class AchievementTracker {
  readonly backend: AchievementBackend;
  readonly signals: AchievementSignals;
  private readonly registry: AchievementDefinition[] = [];

  constructor(options: AchievementTrackerOptions) {
    this.backend = options.backend;
    this.signals = options.signals ?? createAchievementSignals();
  }

  // -------------------------------------------------------------------------
  // Registry
  // -------------------------------------------------------------------------

  /**
   * Register one or more definitions. The whole list is checked before any
   * of it is registered.
   */
  register(definitions: AchievementDefinition | readonly AchievementDefinition[]): void {
    const list = asList(definitions);
    const seen = new Set<string>();

    for (const definition of list) {
      if (!definition.category || definition.category.trim() === "") {
        throw new ValidationError(
          `Achievements must specify a category, could not register ${definition.name}`,
          { field: "category", name: definition.name },
        );
      }
      if (seen.has(definition.name) || this.registry.some((d) => d.name === definition.name)) {
        throw new AlreadyRegisteredError(definition.name);
      }
      seen.add(definition.name);
    }

    this.registry.push(...list);
    logger.debug("tracker", "Registered achievements", { names: list.map((d) => d.name) });
  }

  unregister(definitions: AchievementDefinition | readonly AchievementDefinition[]): void {
    const list = asList(definitions);
    for (const definition of list) {
      if (!this.isRegistered(definition)) {
        throw new NotRegisteredError(definition.name);
      }
    }
    for (const definition of list) {
      this.registry.splice(this.registry.indexOf(definition), 1);
    }
  }

  isRegistered(definition: AchievementDefinition): boolean {
    return this.registry.includes(definition);
  }

  /** Registered definitions matching the category exactly and carrying every keyword. */
  achievements(filter: DefinitionFilter = {}): AchievementDefinition[] {
    const { category, keywords = [] } = filter;
    return this.registry.filter(
      (d) => (category === undefined || d.category === category) && d.hasKeywords(keywords),
    );
  }

  /** Resolve a name or handle to a registered definition. */
  resolve(ref: DefinitionRef): AchievementDefinition {
    const definition =
      typeof ref === "string"
        ? this.registry.find((d) => d.name === ref)
        : this.registry.find((d) => d === ref);
    if (!definition) {
      throw new NotRegisteredError(typeof ref === "string" ? ref : ref.name);
    }
    return definition;
  }

  // -------------------------------------------------------------------------
  // Progress
  // -------------------------------------------------------------------------

  achievementForId(subject: SubjectKey, ref: DefinitionRef): Achievement {
    return this.backend.achievementFor(subject, this.resolve(ref));
  }

  achievementsForId(subject: SubjectKey, filter: DefinitionFilter = {}): Achievement[] {
    return this.backend.achievementsFor(subject, this.achievements(filter));
  }

  /** Returns the goals this increment reached, or false when there were none. */
  increment(
    subject: SubjectKey,
    ref: DefinitionRef,
    amount = 1,
    input: EvaluationInput = {},
  ): GoalRecord[] | false {
    return this.mutate(subject, ref, (achievement) => achievement.increment(amount, input))
      .newGoals;
  }

  /** Returns every achieved goal after evaluation, whether new or not. */
  evaluate(subject: SubjectKey, ref: DefinitionRef, input: EvaluationInput = {}): GoalRecord[] {
    return this.mutate(subject, ref, (achievement) => achievement.evaluate(input)).result;
  }

  setLevel(subject: SubjectKey, ref: DefinitionRef, level: number): void {
    this.mutate(subject, ref, (achievement) => achievement.setLevel(level));
  }

  current(subject: SubjectKey, ref: DefinitionRef): CurrentProgress {
    return this.achievementForId(subject, ref).current;
  }

  currentName(subject: SubjectKey, ref: DefinitionRef): string | null {
    return this.achievementForId(subject, ref).currentName;
  }

  currentDescription(subject: SubjectKey, ref: DefinitionRef): string | null {
    return this.achievementForId(subject, ref).currentDescription;
  }

  achieved(subject: SubjectKey, ref: DefinitionRef): GoalRecord[] {
    return this.achievementForId(subject, ref).achieved;
  }

  unachieved(subject: SubjectKey, ref: DefinitionRef): GoalRecord[] {
    return this.achievementForId(subject, ref).unachieved;
  }

  getTrackedIds(scopeId?: string): SubjectKey[] {
    return this.backend.getTrackedIds(scopeId);
  }

  removeId(subject: SubjectKey): boolean {
    return this.backend.removeId(subject);
  }

  wipeScope(scopeId: string): void {
    this.backend.wipeScope(scopeId);
  }

  // -------------------------------------------------------------------------
  // Goals (not persisted here; callers save any external copy)
  // -------------------------------------------------------------------------

  addGoal(ref: DefinitionRef, level: number, name: string, description: string): GoalRecord {
    return this.resolve(ref).goals.add(level, name, description);
  }

  /** Removes goals matching the name OR the level. */
  removeGoal(ref: DefinitionRef, name?: string, level?: number): GoalRecord[] {
    return this.resolve(ref).goals.remove(name, level);
  }

  /** Removes the goal matching both the name AND the level. */
  removeGoalExact(ref: DefinitionRef, name: string, level: number): GoalRecord[] {
    return this.resolve(ref).goals.removeExact(name, level);
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private mutate<T>(
    subject: SubjectKey,
    ref: DefinitionRef,
    change: (achievement: Achievement) => T,
  ): { result: T; newGoals: GoalRecord[] | false } {
    const definition = this.resolve(ref);
    const achievement = this.backend.achievementFor(subject, definition);
    const oldLevel = achievement.current.level;
    const oldAchieved = achievement.achieved;

    const result = change(achievement);
    this.backend.setLevelFor(subject, definition, achievement.current.level);

    const newGoals = this.checkSignals(subject, achievement, oldLevel, oldAchieved);
    return { result, newGoals };
  }

  private checkSignals(
    subject: SubjectKey,
    achievement: Achievement,
    oldLevel: number,
    oldAchieved: GoalRecord[],
  ): GoalRecord[] | false {
    if (achievement.current.level > oldLevel) {
      this.report(this.signals.levelIncreased.sendRobust(this, { subject, achievement }));
    }

    const goals = achievement.achieved.filter(
      (goal) => !oldAchieved.some((old) => sameGoal(old, goal)),
    );
    if (goals.length === 0) {
      return false;
    }

    logger.info("tracker", `${subject.subjectId} reached ${goals.length} goal(s)`, {
      scopeId: subject.scopeId,
      subjectId: subject.subjectId,
      achievement: achievement.name,
      goals: goals.map((g) => g.name),
    });

    this.report(this.signals.goalAchieved.sendRobust(this, { subject, achievement, goals }));
    if (achievement.unachieved.length === 0) {
      this.report(this.signals.highestLevelAchieved.sendRobust(this, { subject, achievement }));
    }
    return goals;
  }

  private report<TArgs extends object>(results: RobustSignalResult<TArgs>[]): void {
    for (const outcome of results) {
      if (!outcome.ok) {
        logger.warn("tracker", "Signal receiver failed", {
          receiver: outcome.receiver.name || "anonymous",
          error: outcome.error.message,
        });
      }
    }
  }
}
