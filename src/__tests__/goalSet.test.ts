import { describe, it, expect } from "vitest";
import { GoalSet } from "../services/achievements";
import { ValidationError } from "../errors";

const goal = (level: number, name: string) => ({ level, name, description: `${name} goal` });

describe("GoalSet", () => {
  it("keeps records sorted by level", () => {
    const goals = new GoalSet([goal(100, "B"), goal(1, "A"), goal(10, "C")]);

    expect(goals.records().map((g) => g.level)).toEqual([1, 10, 100]);
    expect(goals.size).toBe(3);
    expect(goals.version).toBe(0);
  });

  it("collapses duplicate levels in the initial records to the last one", () => {
    const goals = new GoalSet([goal(5, "First"), goal(5, "Second")]);

    expect(goals.records()).toEqual([goal(5, "Second")]);
  });

  it("add inserts in order and replaces a goal at the same level", () => {
    const goals = new GoalSet([goal(1, "A"), goal(100, "C")]);

    goals.add(50, "B", "B goal");
    expect(goals.records().map((g) => g.name)).toEqual(["A", "B", "C"]);

    const replaced = goals.add(50, "B2", "new");
    expect(replaced).toEqual({ level: 50, name: "B2", description: "new" });
    expect(goals.records().map((g) => g.name)).toEqual(["A", "B2", "C"]);
    expect(goals.version).toBe(2);
  });

  it("records() returns copies", () => {
    const goals = new GoalSet([goal(1, "A")]);
    const copy = goals.records();
    copy[0].name = "changed";
    copy.pop();

    expect(goals.records()).toEqual([goal(1, "A")]);
  });

  it("remove matches name OR level", () => {
    const goals = new GoalSet([goal(1, "A"), goal(10, "B"), goal(100, "C")]);

    const removed = goals.remove("A", 100);

    expect(removed.map((g) => g.name)).toEqual(["A", "C"]);
    expect(goals.records().map((g) => g.name)).toEqual(["B"]);
  });

  it("removeExact needs both name and level to match", () => {
    const goals = new GoalSet([goal(1, "A"), goal(10, "B")]);

    expect(goals.removeExact("A", 10)).toEqual([]);
    expect(goals.version).toBe(0);

    expect(goals.removeExact("B", 10)).toEqual([goal(10, "B")]);
    expect(goals.records()).toEqual([goal(1, "A")]);
    expect(goals.version).toBe(1);
  });

  it("rejects negative or fractional levels and empty names", () => {
    const goals = new GoalSet();

    expect(() => goals.add(-1, "A", "")).toThrow(ValidationError);
    expect(() => goals.add(1.5, "A", "")).toThrow(ValidationError);
    expect(() => goals.add(1, "  ", "")).toThrow("Goal name is required");
    expect(goals.size).toBe(0);
  });

  it("replaceAll swaps the whole set", () => {
    const goals = new GoalSet([goal(1, "A")]);
    goals.replaceAll([goal(2, "B"), goal(3, "C")]);

    expect(goals.records().map((g) => g.name)).toEqual(["B", "C"]);
    expect(goals.version).toBe(1);
  });
});
