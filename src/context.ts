/**
 * Composition root: builds the tracker, its backend and every service on top
 * of one data directory. The server builds one context at startup; tests
 * build one per temporary directory.
 *
 * Data layout under dataDir:
 *   loyalty/loyalty.json    progress  (server -> member -> achievement -> level)
 *   loyalty/settings.json   loyalty goal override
 *   economy/bank.json       bank accounts
 *   store/costs.json        command costs
 *   stocks/stocks.json      market
 *   stocks/portfolios.json  holdings
 */

import * as path from "path";
import { AchievementTracker, JsonFileAchievementBackend } from "./services/achievements";
import { AnnouncementFeed } from "./services/announcements";
import { Bank } from "./services/bank";
import { ensureJsonFile } from "./services/jsonStore";
import { LoyaltyService, createLoyaltyAchievement } from "./services/loyalty";
import { createPriceScheduler, type PriceScheduler } from "./services/scheduler";
import { StockMarket } from "./services/stocks";
import { CommandStore } from "./services/store";

export interface ContextOptions {
  dataDir: string;
  startingBalance: number;
  stockUpdateIntervalSeconds: number;
  /** Random source for stock prices */
  random?: () => number;
}

export interface AppContext {
  tracker: AchievementTracker;
  bank: Bank;
  store: CommandStore;
  stocks: StockMarket;
  loyalty: LoyaltyService;
  announcements: AnnouncementFeed;
  scheduler: PriceScheduler;
}

export function dataFiles(dataDir: string) {
  return {
    progress: path.join(dataDir, "loyalty", "loyalty.json"),
    loyaltySettings: path.join(dataDir, "loyalty", "settings.json"),
    bank: path.join(dataDir, "economy", "bank.json"),
    costs: path.join(dataDir, "store", "costs.json"),
    stocks: path.join(dataDir, "stocks", "stocks.json"),
    portfolios: path.join(dataDir, "stocks", "portfolios.json"),
  };
}

export function createContext(options: ContextOptions): AppContext {
  const files = dataFiles(options.dataDir);
  for (const file of Object.values(files)) {
    ensureJsonFile(file);
  }

  const tracker = new AchievementTracker({
    backend: new JsonFileAchievementBackend(files.progress),
  });
  const loyaltyAchievement = createLoyaltyAchievement(files.loyaltySettings);
  tracker.register(loyaltyAchievement);

  const announcements = new AnnouncementFeed();
  announcements.attach(tracker);

  const bank = new Bank(files.bank, options.startingBalance);
  const stocks = new StockMarket({
    stocksFile: files.stocks,
    portfoliosFile: files.portfolios,
    bank,
  });

  return {
    tracker,
    bank,
    store: new CommandStore(files.costs),
    stocks,
    loyalty: new LoyaltyService({
      tracker,
      bank,
      definition: loyaltyAchievement,
      settingsFile: files.loyaltySettings,
    }),
    announcements,
    scheduler: createPriceScheduler(stocks, options.stockUpdateIntervalSeconds, options.random),
  };
}
