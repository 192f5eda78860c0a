import * as path from "path";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { Bank } from "../services/bank";
import { createPriceScheduler } from "../services/scheduler";
import {
  InsufficientSharesError,
  PRICE_FLOOR,
  StockMarket,
  UnknownStockError,
  newPrice,
} from "../services/stocks";
import { InsufficientFundsError } from "../errors";
import { makeTempDir, readJsonFile, removeDir } from "./helpers";

const bob = { scopeId: "guild-1", subjectId: "bob" };

describe("newPrice", () => {
  it("applies only the random factor when nothing traded", () => {
    // 100 * (0.5 / 2 + 0.75) = 100
    expect(newPrice({ price: 100, bought: 0, sold: 0 }, 0.5)).toBe(100);
    // 100 * (0.9 / 2 + 0.75) = 120
    expect(newPrice({ price: 100, bought: 0, sold: 0 }, 0.9)).toBe(120);
  });

  it("raises the price under buy pressure", () => {
    // buy factor (10 / 10) / 2 + 1 = 1.5
    expect(newPrice({ price: 100, bought: 10, sold: 0 }, 0.5)).toBe(150);
  });

  it("lowers the price under sell pressure", () => {
    // sell factor 1 / ((10 / 10) / 2 + 1) = 2/3, truncated
    expect(newPrice({ price: 100, bought: 0, sold: 10 }, 0.5)).toBe(66);
  });

  it("combines buy and sell pressure", () => {
    // buy 1.25, sell 1 / 1.25 = 0.8
    expect(newPrice({ price: 100, bought: 5, sold: 5 }, 0.5)).toBe(100);
  });

  it("crashes below 0.05 and spikes above 0.95", () => {
    expect(newPrice({ price: 100, bought: 0, sold: 0 }, 0.01)).toBe(50);
    expect(newPrice({ price: 100, bought: 0, sold: 0 }, 0.99)).toBe(200);
  });

  it("never goes below the floor", () => {
    expect(newPrice({ price: 15, bought: 0, sold: 0 }, 0.01)).toBe(PRICE_FLOOR);
    expect(newPrice({ price: 11, bought: 0, sold: 20 }, 0.5)).toBe(PRICE_FLOOR);
  });
});

describe("StockMarket", () => {
  let dir: string;
  let bank: Bank;
  let market: StockMarket;
  let files: { stocksFile: string; portfoliosFile: string };

  beforeEach(() => {
    dir = makeTempDir();
    bank = new Bank(path.join(dir, "bank.json"), 1000);
    bank.register(bob);
    files = {
      stocksFile: path.join(dir, "stocks.json"),
      portfoliosFile: path.join(dir, "portfolios.json"),
    };
    market = new StockMarket({ ...files, bank });
  });

  afterEach(() => {
    removeDir(dir);
  });

  it("opens with thirteen stocks at 100", () => {
    const stocks = market.list();

    expect(stocks).toHaveLength(13);
    expect(stocks.every((s) => s.price === 100)).toBe(true);
    expect(stocks[0]).toEqual({ symbol: "CHATR", price: 100 });
  });

  it("buys shares with bank credits", () => {
    const result = market.buy(bob, "PIXEL", 3);

    expect(result).toEqual({ symbol: "PIXEL", shares: 3, price: 100, total: 300, balance: 700 });
    expect(market.portfolio(bob)).toEqual([{ symbol: "PIXEL", shares: 3 }]);
    expect(market.quote("PIXEL")).toEqual({ price: 100, bought: 3, sold: 0 });
  });

  it("refuses a purchase the member cannot afford", () => {
    expect(() => market.buy(bob, "PIXEL", 11)).toThrow(InsufficientFundsError);
    expect(market.portfolio(bob)).toEqual([]);
    expect(bank.getBalance(bob)).toBe(1000);
  });

  it("sells shares and drops empty holdings", () => {
    market.buy(bob, "GUILD", 2);

    const result = market.sell(bob, "GUILD", 2);

    expect(result).toEqual({ symbol: "GUILD", shares: 0, price: 100, total: 200, balance: 1000 });
    expect(market.portfolio(bob)).toEqual([]);
    expect(market.quote("GUILD").sold).toBe(2);
  });

  it("refuses to sell shares the member does not own", () => {
    market.buy(bob, "GUILD", 1);

    expect(() => market.sell(bob, "GUILD", 2)).toThrow(InsufficientSharesError);
    expect(() => market.sell(bob, "GUILD", 2)).toThrow(
      "You don't have enough GUILD stocks to sell 2",
    );
  });

  it("rejects unknown symbols and non-positive amounts", () => {
    expect(() => market.buy(bob, "NOPE", 1)).toThrow(UnknownStockError);
    expect(() => market.buy(bob, "PIXEL", 0)).toThrow("amount must be greater than zero");
  });

  it("updatePrices reprices every stock and resets the counters", () => {
    market.buy(bob, "PIXEL", 4);

    const quotes = market.updatePrices(() => 0.5);

    expect(quotes.find((q) => q.symbol === "PIXEL")?.price).toBe(150);
    expect(quotes.find((q) => q.symbol === "CHATR")?.price).toBe(100);
    expect(market.quote("PIXEL")).toEqual({ price: 150, bought: 0, sold: 0 });
    expect(market.lastUpdatedAt).toBeInstanceOf(Date);
  });

  it("persists market and portfolios", () => {
    market.buy(bob, "REACT", 2);
    market.updatePrices(() => 0.5);

    const reloaded = new StockMarket({ ...files, bank });

    expect(reloaded.quote("REACT").price).toBe(150);
    expect(reloaded.portfolio(bob)).toEqual([{ symbol: "REACT", shares: 2 }]);
    expect(readJsonFile(files.portfoliosFile)).toEqual({ "guild-1": { bob: { REACT: 2 } } });
  });

  it("keeps portfolios of members whose ids collide with Object.prototype keys", () => {
    const odd = { scopeId: "__proto__", subjectId: "__proto__" };
    bank.register(odd);
    market.buy(odd, "EMOJI", 1);

    const reloaded = new StockMarket({ ...files, bank });

    expect(reloaded.portfolio(odd)).toEqual([{ symbol: "EMOJI", shares: 1 }]);
    expect(reloaded.portfolio(bob)).toEqual([]);
  });
});

describe("price scheduler", () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  it("tick updates prices with the injected random source", () => {
    const market = new StockMarket({
      stocksFile: path.join(dir, "stocks.json"),
      portfoliosFile: path.join(dir, "portfolios.json"),
      bank: new Bank(path.join(dir, "bank.json"), 0),
    });
    const scheduler = createPriceScheduler(market, 60, () => 0.99);

    expect(scheduler.isRunning()).toBe(false);
    expect(scheduler.tick()).toBe(true);
    expect(market.quote("CHATR").price).toBe(200);
    expect(scheduler.getNextUpdateTime()).toBeNull();
  });

  it("start and stop manage the timer", () => {
    const market = new StockMarket({
      stocksFile: path.join(dir, "stocks.json"),
      portfoliosFile: path.join(dir, "portfolios.json"),
      bank: new Bank(path.join(dir, "bank.json"), 0),
    });
    const scheduler = createPriceScheduler(market, 60);

    scheduler.start();
    expect(scheduler.isRunning()).toBe(true);
    expect(scheduler.getNextUpdateTime()).toBeInstanceOf(Date);

    scheduler.stop();
    expect(scheduler.isRunning()).toBe(false);
    expect(scheduler.getNextUpdateTime()).toBeNull();
  });
});
