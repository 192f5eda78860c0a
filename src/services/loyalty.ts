/**
 * Chat loyalty: members spend bank credits to climb loyalty ranks.
 *
 * Progress is tracked by the "ChatLoyalty" achievement. Its goals are the
 * ranks; admins can edit them, and the edited set is written to the goal
 * override file so it survives a restart. When that file is missing or has
 * no goals, DEFAULT_LOYALTY_GOALS apply.
 */

import { logger } from "../config/logger";
import {
  AccountNotFoundError,
  InsufficientFundsError,
  ValidationError,
  assertCount,
} from "../errors";
import {
  defineAchievement,
  type AchievementDefinition,
  type AchievementTracker,
  type EvaluationInput,
  type GoalRecord,
  type SubjectKey,
} from "./achievements";
import type { CurrencyLedger } from "./bank";
import { isRecord, loadJson, saveJson } from "./jsonStore";

export const LOYALTY_ACHIEVEMENT = "ChatLoyalty";

export const DEFAULT_LOYALTY_GOALS: readonly GoalRecord[] = [
  { level: 1, name: "First Words", description: "Every regular starts somewhere." },
  { level: 100, name: "Familiar Face", description: "People are starting to recognise you." },
  { level: 1000, name: "Regular", description: "The server would feel quieter without you." },
  { level: 10000, name: "Pillar", description: "Newcomers ask you for directions." },
  { level: 100000, name: "Legend", description: "Stories are told about your dedication." },
  { level: 200000, name: "Founder's Circle", description: "Loyalty beyond measure." },
];

/** Rank reported before the first goal is reached. */
export const UNRANKED: GoalRecord = {
  level: 0,
  name: "Unranked",
  description: "Earn loyalty to climb the ranks.",
};

export interface LoyaltyStanding {
  points: number;
  rank: GoalRecord;
  next: GoalRecord | null;
}

function readCount(input: EvaluationInput, key: string): number {
  const value = input[key] ?? 0;
  return assertCount(key, value);
}

/** Net loyalty change: points gained minus points lost. */
function evaluateLoyalty(current: number, input: EvaluationInput): number {
  return current + readCount(input, "gained") - readCount(input, "lost");
}

function parseGoals(raw: unknown): GoalRecord[] {
  if (!isRecord(raw) || !Array.isArray(raw.goals)) {
    return [];
  }
  const goals: GoalRecord[] = [];
  for (const item of raw.goals) {
    if (isRecord(item) && typeof item.level === "number" && typeof item.name === "string") {
      goals.push({
        level: item.level,
        name: item.name,
        description: typeof item.description === "string" ? item.description : "",
      });
    }
  }
  return goals;
}

/** Build the loyalty definition, taking goals from the override file when it has any. */
export function createLoyaltyAchievement(settingsFile: string): AchievementDefinition {
  const saved = parseGoals(loadJson(settingsFile));
  return defineAchievement({
    name: LOYALTY_ACHIEVEMENT,
    title: "Chat Loyalty",
    category: "chat",
    keywords: ["loyalty"],
    goals: saved.length > 0 ? saved : DEFAULT_LOYALTY_GOALS,
    evaluate: evaluateLoyalty,
  });
}

export interface LoyaltyServiceOptions {
  tracker: AchievementTracker;
  bank: CurrencyLedger;
  definition: AchievementDefinition;
  settingsFile: string;
}

export class LoyaltyService {
  private readonly tracker: AchievementTracker;
  private readonly bank: CurrencyLedger;
  readonly definition: AchievementDefinition;
  private readonly settingsFile: string;

  constructor(options: LoyaltyServiceOptions) {
    this.tracker = options.tracker;
    this.bank = options.bank;
    this.definition = options.definition;
    this.settingsFile = options.settingsFile;
  }

  get goals(): GoalRecord[] {
    return this.definition.goals.records();
  }

  getLevel(subject: SubjectKey): LoyaltyStanding {
    const achievement = this.tracker.achievementForId(subject, this.definition);
    const achieved = achievement.achieved;
    const { level, goal } = achievement.current;
    return {
      points: level,
      rank: achieved.length > 0 ? achieved[achieved.length - 1] : UNRANKED,
      next: goal,
    };
  }

  /** Spend `points` credits for the same amount of loyalty. */
  buyLevel(subject: SubjectKey, points: number): LoyaltyStanding & { newGoals: GoalRecord[] } {
    assertCount("points", points, { positive: true });
    if (!this.bank.accountExists(subject)) {
      throw new AccountNotFoundError(subject.scopeId, subject.subjectId);
    }
    if (!this.bank.canSpend(subject, points)) {
      throw new InsufficientFundsError(this.bank.getBalance(subject), points);
    }

    const before = this.tracker.achieved(subject, this.definition).length;
    this.bank.withdrawCredits(subject, points);
    let achieved: GoalRecord[];
    try {
      achieved = this.tracker.evaluate(subject, this.definition, { gained: points, lost: 0 });
    } catch (err) {
      // Progress was not recorded: give the credits back before failing.
      this.bank.depositCredits(subject, points);
      throw err;
    }

    logger.info("loyalty", `${subject.subjectId} bought ${points} loyalty`, { ...subject, points });
    return { ...this.getLevel(subject), newGoals: achieved.slice(before) };
  }

  addGoal(level: number, name: string, description: string): GoalRecord {
    const goal = this.tracker.addGoal(this.definition, level, name, description);
    this.saveGoals();
    return goal;
  }

  /**
   * Remove goals. With `exact` only the goal matching both name and level
   * goes; otherwise any goal matching either.
   */
  removeGoal(options: { level?: number; name?: string; exact?: boolean }): GoalRecord[] {
    const { level, name, exact = false } = options;
    if (level === undefined && name === undefined) {
      throw new ValidationError("A goal level or name is required");
    }

    let removed: GoalRecord[];
    if (exact) {
      if (level === undefined || name === undefined) {
        throw new ValidationError("Exact removal needs both level and name");
      }
      removed = this.tracker.removeGoalExact(this.definition, name, level);
    } else {
      removed = this.tracker.removeGoal(this.definition, name, level);
    }

    if (removed.length > 0) {
      this.saveGoals();
    }
    return removed;
  }

  private saveGoals(): void {
    saveJson(this.settingsFile, { goals: this.definition.goals.records() });
  }
}
