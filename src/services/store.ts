/**
 * Command store: a currency cost per command.
 *
 * Costs live in one JSON file ({ "stocks buy": 5 }). Commands without an
 * entry are free. Names are normalized (lowercase, single spaces) so
 * "Stocks  Buy" and "stocks buy" are the same command.
 */

import { logger } from "../config/logger";
import { ValidationError, assertCount } from "../errors";
import { isRecord, loadJson, saveJson } from "./jsonStore";

export function normalizeCommand(command: string): string {
  return command.trim().replace(/\s+/g, " ").toLowerCase();
}

/** Read side of the store, as used by the command-cost gate. */
export interface CommandCostRegistry {
  getCosts(): Record<string, number>;
  getCost(command: string): number | null;
}

export class CommandStore implements CommandCostRegistry {
  private costs = new Map<string, number>();

  constructor(private readonly filePath: string) {
    const raw = loadJson(filePath);
    if (isRecord(raw)) {
      for (const [command, cost] of Object.entries(raw)) {
        if (typeof cost === "number" && Number.isInteger(cost) && cost >= 0) {
          this.costs.set(normalizeCommand(command), cost);
        }
      }
    }
  }

  getCosts(): Record<string, number> {
    return Object.fromEntries(this.costs);
  }

  getCost(command: string): number | null {
    return this.costs.get(normalizeCommand(command)) ?? null;
  }

  setCost(command: string, cost: number): number {
    const name = normalizeCommand(command);
    if (name === "") {
      throw new ValidationError("Command name is required", { field: "command" });
    }
    assertCount("cost", cost);
    this.costs.set(name, cost);
    this.save();
    logger.info("store", `${name} now costs ${cost}`, { command: name, cost });
    return cost;
  }

  /** Returns false when the command had no cost. */
  removeCost(command: string): boolean {
    const removed = this.costs.delete(normalizeCommand(command));
    if (removed) {
      this.save();
    }
    return removed;
  }

  private save(): void {
    saveJson(this.filePath, this.getCosts());
  }
}
