/**
 * Simulated stock market.
 *
 * Prices move on every update from three factors:
 *   - buy pressure:  (bought / total) / 2 + 1
 *   - sell pressure: 1 / ((sold / total) / 2 + 1)
 *   - noise:         r / 2 + 0.75, with a 5% chance each of a crash (x0.5)
 *                    or a spike (x2)
 * where total = bought + sold since the last update (1 when nothing traded).
 * Prices never drop below PRICE_FLOOR.
 *
 * Members buy and sell with bank credits. Portfolios are kept per member per
 * server; market state is shared.
 */

import { logger } from "../config/logger";
import { AppError, InsufficientFundsError, assertCount } from "../errors";
import type { SubjectKey } from "./achievements";
import type { CurrencyLedger } from "./bank";
import { isRecord, loadJson, saveJson } from "./jsonStore";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface StockState {
  price: number;
  /** Shares bought since the last price update */
  bought: number;
  /** Shares sold since the last price update */
  sold: number;
}

export interface StockQuote {
  symbol: string;
  price: number;
}

export interface Holding {
  symbol: string;
  shares: number;
}

export interface TradeResult {
  symbol: string;
  shares: number;
  price: number;
  total: number;
  balance: number;
}

/** scope -> member -> symbol -> shares */
type PortfolioTree = Map<string, Map<string, Map<string, number>>>;

export const PRICE_FLOOR = 10;

const DEFAULT_SYMBOLS = [
  "CHATR",
  "EMOJI",
  "PIXEL",
  "GUILD",
  "BYTES",
  "MODS",
  "VOICE",
  "REACT",
  "EMOTE",
  "THRED",
  "BOOST",
  "RAIDS",
  "LURKR",
];

export class UnknownStockError extends AppError {
  constructor(symbol: string) {
    super(`${symbol} isn't a valid stock`, 404, "UNKNOWN_STOCK", { symbol });
  }
}

export class InsufficientSharesError extends AppError {
  constructor(symbol: string, owned: number, requested: number) {
    super(
      `You don't have enough ${symbol} stocks to sell ${requested}`,
      409,
      "INSUFFICIENT_SHARES",
      { symbol, owned, requested },
    );
  }
}

// ---------------------------------------------------------------------------
// Pricing
// ---------------------------------------------------------------------------

/**
 * Next price for a stock given a random draw in [0, 1).
 * Pure; the market applies it to every stock on update.
 */
export function newPrice(stock: StockState, r: number): number {
  const traded = stock.bought + stock.sold;
  const total = traded === 0 ? 1 : traded;

  const buyFactor = stock.bought / total / 2 + 1;
  const sellFactor = 1 / (stock.sold / total / 2 + 1);
  let randomFactor = r / 2 + 0.75;
  if (r < 0.05) randomFactor = 0.5;
  if (r > 0.95) randomFactor = 2.0;

  const price = Math.trunc(stock.price * randomFactor * buyFactor * sellFactor);
  return price <= PRICE_FLOOR ? PRICE_FLOOR : price;
}

export function defaultMarket(): Record<string, StockState> {
  return Object.fromEntries(
    DEFAULT_SYMBOLS.map((symbol) => [symbol, { price: 100, bought: 0, sold: 0 }]),
  );
}

function parseMarket(raw: unknown): Map<string, StockState> {
  const market = new Map<string, StockState>();
  if (!isRecord(raw)) return market;
  for (const [symbol, value] of Object.entries(raw)) {
    if (!isRecord(value) || typeof value.price !== "number") continue;
    market.set(symbol, {
      price: value.price,
      bought: typeof value.bought === "number" ? value.bought : 0,
      sold: typeof value.sold === "number" ? value.sold : 0,
    });
  }
  return market;
}

function parsePortfolios(raw: unknown): PortfolioTree {
  const tree: PortfolioTree = new Map();
  if (!isRecord(raw)) return tree;
  for (const [scopeId, members] of Object.entries(raw)) {
    if (!isRecord(members)) continue;
    const scope = new Map<string, Map<string, number>>();
    for (const [subjectId, holdings] of Object.entries(members)) {
      if (!isRecord(holdings)) continue;
      const parsed = new Map<string, number>();
      for (const [symbol, shares] of Object.entries(holdings)) {
        if (typeof shares === "number" && Number.isInteger(shares) && shares > 0) {
          parsed.set(symbol, shares);
        }
      }
      scope.set(subjectId, parsed);
    }
    tree.set(scopeId, scope);
  }
  return tree;
}

function serializePortfolios(tree: PortfolioTree): Record<string, unknown> {
  return Object.fromEntries(
    [...tree].map(([scopeId, members]) => [
      scopeId,
      Object.fromEntries(
        [...members].map(([subjectId, holdings]) => [subjectId, Object.fromEntries(holdings)]),
      ),
    ]),
  );
}

// ---------------------------------------------------------------------------
// Market
// ---------------------------------------------------------------------------

export interface StockMarketOptions {
  stocksFile: string;
  portfoliosFile: string;
  bank: CurrencyLedger;
}

export class StockMarket {
  private readonly stocks: Map<string, StockState>;
  private readonly portfolios: PortfolioTree;
  private readonly bank: CurrencyLedger;
  private lastUpdate: Date | null = null;

  constructor(private readonly options: StockMarketOptions) {
    this.bank = options.bank;
    const stored = parseMarket(loadJson(options.stocksFile));
    this.stocks = stored.size > 0 ? stored : parseMarket(defaultMarket());
    this.portfolios = parsePortfolios(loadJson(options.portfoliosFile));
  }

  get lastUpdatedAt(): Date | null {
    return this.lastUpdate;
  }

  list(): StockQuote[] {
    return [...this.stocks].map(([symbol, stock]) => ({ symbol, price: stock.price }));
  }

  quote(symbol: string): StockState {
    return { ...this.stock(symbol) };
  }

  portfolio(subject: SubjectKey): Holding[] {
    return [...this.holdingsOf(subject)].map(([symbol, shares]) => ({ symbol, shares }));
  }

  buy(subject: SubjectKey, symbol: string, amount: number): TradeResult {
    const stock = this.stock(symbol);
    assertCount("amount", amount, { positive: true });

    const cost = stock.price * amount;
    if (!this.bank.canSpend(subject, cost)) {
      throw new InsufficientFundsError(this.bank.getBalance(subject), cost);
    }
    const balance = this.bank.withdrawCredits(subject, cost);

    const holdings = this.holdingsOf(subject);
    const shares = (holdings.get(symbol) ?? 0) + amount;
    holdings.set(symbol, shares);
    stock.bought += amount;
    this.save();

    logger.info("stocks", `Bought ${amount} ${symbol}`, { ...subject, symbol, amount, cost });
    return { symbol, shares, price: stock.price, total: cost, balance };
  }

  sell(subject: SubjectKey, symbol: string, amount: number): TradeResult {
    const stock = this.stock(symbol);
    assertCount("amount", amount, { positive: true });

    const holdings = this.holdingsOf(subject);
    const owned = holdings.get(symbol) ?? 0;
    if (owned < amount) {
      throw new InsufficientSharesError(symbol, owned, amount);
    }

    const proceeds = stock.price * amount;
    const balance = this.bank.depositCredits(subject, proceeds);

    const remaining = owned - amount;
    if (remaining === 0) {
      holdings.delete(symbol);
    } else {
      holdings.set(symbol, remaining);
    }
    stock.sold += amount;
    this.save();

    logger.info("stocks", `Sold ${amount} ${symbol}`, { ...subject, symbol, amount, proceeds });
    return { symbol, shares: remaining, price: stock.price, total: proceeds, balance };
  }

  /** Reprice every stock and reset the trade counters. */
  updatePrices(random: () => number = Math.random): StockQuote[] {
    for (const stock of this.stocks.values()) {
      stock.price = newPrice(stock, random());
      stock.bought = 0;
      stock.sold = 0;
    }
    this.lastUpdate = new Date();
    saveJson(this.options.stocksFile, Object.fromEntries(this.stocks));
    return this.list();
  }

  private stock(symbol: string): StockState {
    const stock = this.stocks.get(symbol);
    if (!stock) {
      throw new UnknownStockError(symbol);
    }
    return stock;
  }

  private holdingsOf(subject: SubjectKey): Map<string, number> {
    let members = this.portfolios.get(subject.scopeId);
    if (!members) {
      members = new Map();
      this.portfolios.set(subject.scopeId, members);
    }
    let holdings = members.get(subject.subjectId);
    if (!holdings) {
      holdings = new Map();
      members.set(subject.subjectId, holdings);
    }
    return holdings;
  }

  private save(): void {
    saveJson(this.options.stocksFile, Object.fromEntries(this.stocks));
    saveJson(this.options.portfoliosFile, serializePortfolios(this.portfolios));
  }
}
