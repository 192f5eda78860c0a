/**
 * Stock market routes.
 *
 * GET  /api/stocks                — Current prices and next update time (requireMember)
 * GET  /api/stocks/portfolio      — Member's holdings with their current value (requireMember)
 * POST /api/stocks/:symbol/buy    — Buy { amount } shares (requireMember)
 * POST /api/stocks/:symbol/sell   — Sell { amount } shares (requireMember)
 */

import { Router, Request, Response } from "express";
import { assertCount } from "../errors";
import { memberOf, requireMember } from "../middleware/auth";
import { commandCost } from "../middleware/commandCost";
import { tradeLimiter } from "../middleware/rateLimiter";
import type { AppContext } from "../context";
import { bodyOf } from "./body";

function readAmount(req: Request): number {
  return assertCount("amount", bodyOf(req).amount, { positive: true });
}

export function stocksRouter(ctx: AppContext): Router {
  const router = Router();

  router.use(requireMember);

  // ---------------------------------------------------------------------------
  // GET / — Market prices
  // ---------------------------------------------------------------------------

  router.get("/", commandCost(ctx, "stocks"), (_req: Request, res: Response) => {
    res.status(200).json({
      stocks: ctx.stocks.list(),
      lastUpdatedAt: ctx.stocks.lastUpdatedAt?.toISOString() ?? null,
      nextUpdateAt: ctx.scheduler.getNextUpdateTime()?.toISOString() ?? null,
    });
  });

  // ---------------------------------------------------------------------------
  // GET /portfolio — Holdings
  // ---------------------------------------------------------------------------

  router.get(
    "/portfolio",
    commandCost(ctx, "stocks portfolio"),
    (req: Request, res: Response) => {
      const holdings = ctx.stocks.portfolio(memberOf(req)).map((holding) => ({
        ...holding,
        value: holding.shares * ctx.stocks.quote(holding.symbol).price,
      }));
      const totalValue = holdings.reduce((sum, h) => sum + h.value, 0);
      res.status(200).json({ holdings, totalValue });
    },
  );

  // ---------------------------------------------------------------------------
  // POST /:symbol/buy and /:symbol/sell — Trades
  // ---------------------------------------------------------------------------

  router.post(
    "/:symbol/buy",
    tradeLimiter,
    commandCost(ctx, "stocks buy"),
    (req: Request, res: Response) => {
      const symbol = req.params.symbol.toUpperCase();
      res.status(200).json(ctx.stocks.buy(memberOf(req), symbol, readAmount(req)));
    },
  );

  router.post(
    "/:symbol/sell",
    tradeLimiter,
    commandCost(ctx, "stocks sell"),
    (req: Request, res: Response) => {
      const symbol = req.params.symbol.toUpperCase();
      res.status(200).json(ctx.stocks.sell(memberOf(req), symbol, readAmount(req)));
    },
  );

  return router;
}
