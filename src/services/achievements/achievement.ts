/**
 * One subject's progress against one definition.
 *
 * Only the integer level is state. The current goal and the achieved and
 * unachieved lists are derived from it and from the definition's goal set on
 * every read, so they always partition the goal set.
 *
 * There are two ways to move the level:
 *   - increment: the caller knows an event happened ("one more message")
 *   - evaluate:  the level is recomputed from input the definition understands
 * Both, as well as setLevel, may lower the level. Every path must land on a
 * finite integer; anything else is a ValidationError and leaves the level as
 * it was.
 */

import { ValidationError } from "../../errors";
import type { AchievementDefinition } from "./definition";
import type { CurrentProgress, EvaluationInput, GoalRecord } from "./types";

function checkedLevel(name: string, level: number): number {
  if (!Number.isInteger(level)) {
    throw new ValidationError(`Level of ${name} must be an integer, got ${level}`, {
      field: "level",
      name,
    });
  }
  return level;
}

export class Achievement {
  readonly definition: AchievementDefinition;
  private level: number;

  constructor(definition: AchievementDefinition, current = 0) {
    this.definition = definition;
    this.level = current;
  }

  get name(): string {
    return this.definition.name;
  }

  get current(): CurrentProgress {
    const next = this.nextGoal();
    return { level: this.level, goal: next ? { ...next } : null };
  }

  get currentName(): string | null {
    return this.nextGoal()?.name ?? null;
  }

  get currentDescription(): string | null {
    return this.nextGoal()?.description ?? null;
  }

  get achieved(): GoalRecord[] {
    return this.definition.goals
      .view()
      .filter((goal) => goal.level <= this.level)
      .map((goal) => ({ ...goal }));
  }

  get unachieved(): GoalRecord[] {
    return this.definition.goals
      .view()
      .filter((goal) => goal.level > this.level)
      .map((goal) => ({ ...goal }));
  }

  increment(amount = 1, input: EvaluationInput = {}): void {
    const hook = this.definition.incrementHook;
    this.level = checkedLevel(
      this.name,
      hook ? hook(this.level, amount, input) : this.level + amount,
    );
  }

  /** Recomputes the level from `input`; returns the achieved goals afterwards. */
  evaluate(input: EvaluationInput = {}): GoalRecord[] {
    const hook = this.definition.evaluateHook;
    if (hook) {
      this.level = checkedLevel(this.name, hook(this.level, input));
    }
    return this.achieved;
  }

  setLevel(level: number): void {
    this.level = checkedLevel(this.name, level);
  }

  private nextGoal(): GoalRecord | undefined {
    return this.definition.goals.view().find((goal) => goal.level > this.level);
  }
}
