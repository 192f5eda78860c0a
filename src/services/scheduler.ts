/**
 * Stock price scheduler.
 *
 * Reprices the market on a fixed interval (STOCK_UPDATE_INTERVAL_SECONDS).
 * Uses setInterval; a failing update is logged and the next tick still runs.
 * start() is idempotent and stop() clears the timer so the process can exit.
 */

import { errorMessage, logger } from "../config/logger";
import type { StockMarket } from "./stocks";

export interface PriceScheduler {
  start(): void;
  stop(): void;
  /** Run one update now. Returns false if it failed. */
  tick(): boolean;
  isRunning(): boolean;
  getNextUpdateTime(): Date | null;
}

export function createPriceScheduler(
  market: StockMarket,
  intervalSeconds: number,
  random: () => number = Math.random,
): PriceScheduler {
  let intervalId: ReturnType<typeof setInterval> | null = null;
  let nextUpdateTime: Date | null = null;
  const intervalMs = intervalSeconds * 1000;

  function tick(): boolean {
    try {
      const quotes = market.updatePrices(random);
      logger.info("scheduler", "Stock prices updated", {
        prices: Object.fromEntries(quotes.map((q) => [q.symbol, q.price])),
      });
      return true;
    } catch (err) {
      logger.error("scheduler", "Stock price update failed", { error: errorMessage(err) });
      return false;
    } finally {
      if (intervalId !== null) {
        nextUpdateTime = new Date(Date.now() + intervalMs);
      }
    }
  }

  function start(): void {
    if (intervalId !== null) {
      logger.info("scheduler", "Scheduler is already running.");
      return;
    }
    logger.info("scheduler", "Starting price scheduler", { intervalSeconds });
    intervalId = setInterval(tick, intervalMs);
    nextUpdateTime = new Date(Date.now() + intervalMs);
  }

  function stop(): void {
    if (intervalId === null) return;
    clearInterval(intervalId);
    intervalId = null;
    nextUpdateTime = null;
    logger.info("scheduler", "Price scheduler stopped.");
  }

  return {
    start,
    stop,
    tick,
    isRunning: () => intervalId !== null,
    getNextUpdateTime: () => nextUpdateTime,
  };
}
