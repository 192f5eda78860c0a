import * as path from "path";
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { createContext, dataFiles, type AppContext } from "../context";
import { DEFAULT_LOYALTY_GOALS, LOYALTY_ACHIEVEMENT, UNRANKED } from "../services/loyalty";
import { saveJson } from "../services/jsonStore";
import { AccountNotFoundError, InsufficientFundsError, ValidationError } from "../errors";
import { makeTempDir, readJsonFile, removeDir } from "./helpers";

const carol = { scopeId: "guild-1", subjectId: "carol" };

function buildContext(dataDir: string): AppContext {
  return createContext({ dataDir, startingBalance: 500, stockUpdateIntervalSeconds: 60 });
}

describe("LoyaltyService", () => {
  let dir: string;
  let ctx: AppContext;

  beforeEach(() => {
    dir = makeTempDir();
    ctx = buildContext(dir);
  });

  afterEach(() => {
    removeDir(dir);
  });

  it("registers the loyalty achievement with the default goals", () => {
    const definition = ctx.tracker.resolve(LOYALTY_ACHIEVEMENT);

    expect(definition.title).toBe("Chat Loyalty");
    expect(definition.category).toBe("chat");
    expect(ctx.loyalty.goals).toEqual(DEFAULT_LOYALTY_GOALS);
  });

  it("reports Unranked before the first purchase", () => {
    expect(ctx.loyalty.getLevel(carol)).toEqual({
      points: 0,
      rank: UNRANKED,
      next: DEFAULT_LOYALTY_GOALS[0],
    });
  });

  it("buys loyalty with credits and reports new goals", () => {
    ctx.bank.register(carol);

    const result = ctx.loyalty.buyLevel(carol, 150);

    expect(result.points).toBe(150);
    expect(result.rank.name).toBe("Familiar Face");
    expect(result.next?.name).toBe("Regular");
    expect(result.newGoals.map((g) => g.name)).toEqual(["First Words", "Familiar Face"]);
    expect(ctx.bank.getBalance(carol)).toBe(350);

    expect(ctx.loyalty.buyLevel(carol, 10).newGoals).toEqual([]);
  });

  it("needs an account and enough credits", () => {
    expect(() => ctx.loyalty.buyLevel(carol, 1)).toThrow(AccountNotFoundError);

    ctx.bank.register(carol);
    expect(() => ctx.loyalty.buyLevel(carol, 501)).toThrow(InsufficientFundsError);
    expect(() => ctx.loyalty.buyLevel(carol, 501)).toThrow(
      "You have 500 credits, but that costs 501",
    );
    expect(() => ctx.loyalty.buyLevel(carol, 0)).toThrow(ValidationError);
    expect(ctx.loyalty.getLevel(carol).points).toBe(0);
  });

  it("returns the credits when recording progress fails", () => {
    ctx.bank.register(carol);
    const evaluate = vi.spyOn(ctx.tracker, "evaluate").mockImplementation(() => {
      throw new Error("disk full");
    });

    expect(() => ctx.loyalty.buyLevel(carol, 40)).toThrow("disk full");

    expect(ctx.bank.getBalance(carol)).toBe(500);
    evaluate.mockRestore();
    expect(ctx.loyalty.getLevel(carol).points).toBe(0);
  });

  it("rejects negative loyalty input on evaluate", () => {
    expect(() =>
      ctx.tracker.evaluate(carol, LOYALTY_ACHIEVEMENT, { gained: -5 }),
    ).toThrow("gained must be a non-negative integer");
  });

  it("evaluate subtracts lost points", () => {
    ctx.tracker.evaluate(carol, LOYALTY_ACHIEVEMENT, { gained: 120 });
    ctx.tracker.evaluate(carol, LOYALTY_ACHIEVEMENT, { lost: 30 });

    expect(ctx.loyalty.getLevel(carol).points).toBe(90);
    expect(ctx.loyalty.getLevel(carol).rank.name).toBe("First Words");
  });

  it("persists goal edits to the settings file and reloads them", () => {
    ctx.loyalty.addGoal(50, "Halfway", "Fifty points in");

    expect(ctx.loyalty.removeGoal({ level: 1 }).map((g) => g.name)).toEqual(["First Words"]);
    expect(ctx.loyalty.removeGoal({ name: "Halfway", level: 51, exact: true })).toEqual([]);

    const saved = readJsonFile(dataFiles(dir).loyaltySettings);
    expect(saved).toEqual({
      goals: [
        { level: 50, name: "Halfway", description: "Fifty points in" },
        ...DEFAULT_LOYALTY_GOALS.slice(1),
      ],
    });

    const restarted = buildContext(dir);
    expect(restarted.loyalty.goals.map((g) => g.level)).toEqual([
      50, 100, 1000, 10000, 100000, 200000,
    ]);
  });

  it("validates removal arguments", () => {
    expect(() => ctx.loyalty.removeGoal({})).toThrow("A goal level or name is required");
    expect(() => ctx.loyalty.removeGoal({ name: "Regular", exact: true })).toThrow(
      "Exact removal needs both level and name",
    );
  });

  it("uses goals from an existing settings file", () => {
    const other = makeTempDir();
    try {
      saveJson(path.join(other, "loyalty", "settings.json"), {
        goals: [{ level: 5, name: "Five", description: "Five points" }],
      });

      expect(buildContext(other).loyalty.goals).toEqual([
        { level: 5, name: "Five", description: "Five points" },
      ]);
    } finally {
      removeDir(other);
    }
  });

  it("restores member progress after a restart", () => {
    ctx.bank.register(carol);
    ctx.loyalty.buyLevel(carol, 120);

    const restarted = buildContext(dir);

    expect(restarted.loyalty.getLevel(carol).points).toBe(120);
    expect(restarted.bank.getBalance(carol)).toBe(380);
  });
});

describe("AnnouncementFeed", () => {
  let dir: string;
  let ctx: AppContext;

  beforeEach(() => {
    dir = makeTempDir();
    ctx = buildContext(dir);
    ctx.bank.register(carol);
  });

  afterEach(() => {
    removeDir(dir);
  });

  it("records level-ups and goals newest first", () => {
    ctx.loyalty.buyLevel(carol, 100);

    const feed = ctx.announcements.recent("guild-1");

    expect(feed.map((a) => a.kind)).toEqual([
      "goal_achieved",
      "goal_achieved",
      "level_increased",
    ]);
    expect(feed.map((a) => a.message)).toEqual([
      "carol reached Familiar Face: People are starting to recognise you.",
      "carol reached First Words: Every regular starts somewhere.",
      "carol is now at 100 Chat Loyalty",
    ]);
    expect(feed[0]).toMatchObject({ serverId: "guild-1", memberId: "carol", level: 100 });
  });

  it("announces completing every goal", () => {
    ctx.bank.depositCredits(carol, 200000);
    ctx.loyalty.buyLevel(carol, 200000);

    const [latest] = ctx.announcements.recent("guild-1", 1);

    expect(latest.kind).toBe("highest_level_achieved");
    expect(latest.message).toBe("carol completed every Chat Loyalty goal");
  });

  it("keeps feeds per server and stops after detach", () => {
    ctx.announcements.detach(ctx.tracker);
    ctx.loyalty.buyLevel(carol, 1);

    expect(ctx.announcements.recent("guild-1")).toEqual([]);
    expect(ctx.announcements.recent("guild-2")).toEqual([]);
  });

  it("throws AccountNotFound for a member without an account on withdraw", () => {
    expect(() => ctx.bank.withdrawCredits({ scopeId: "guild-1", subjectId: "dave" }, 1)).toThrow(
      AccountNotFoundError,
    );
  });
});
