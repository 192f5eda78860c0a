/**
 * API Route Index
 *
 * All routes are mounted under the /api prefix (set in app.ts).
 *
 * ┌───────────────────────────────────────────────┬────────┬──────────────────────────────────────┐
 * │ Endpoint                                      │ Method │ Description                          │
 * ├───────────────────────────────────────────────┼────────┼──────────────────────────────────────┤
 * │ /api/health                                   │ GET    │ Health, scheduler and memory status  │
 * ├───────────────────────────────────────────────┼────────┼──────────────────────────────────────┤
 * │ /api/bank/register                            │ POST   │ Open a bank account (member)         │
 * │ /api/bank/balance                             │ GET    │ Current balance (member)             │
 * ├───────────────────────────────────────────────┼────────┼──────────────────────────────────────┤
 * │ /api/loyalty                                  │ GET    │ Points, rank, next goal (member)     │
 * │ /api/loyalty/buy                              │ POST   │ Buy loyalty with credits (member)    │
 * │ /api/loyalty/achievements                     │ GET    │ Achieved / remaining goals (member)  │
 * │ /api/loyalty/announcements                    │ GET    │ Recent server level-ups (member)     │
 * ├───────────────────────────────────────────────┼────────┼──────────────────────────────────────┤
 * │ /api/store/costs                              │ GET    │ Every command cost                   │
 * │ /api/store/costs/:command                     │ GET    │ One command's cost                   │
 * ├───────────────────────────────────────────────┼────────┼──────────────────────────────────────┤
 * │ /api/stocks                                   │ GET    │ Market prices (member)               │
 * │ /api/stocks/portfolio                         │ GET    │ Holdings and value (member)          │
 * │ /api/stocks/:symbol/buy                       │ POST   │ Buy shares (member)                  │
 * │ /api/stocks/:symbol/sell                      │ POST   │ Sell shares (member)                 │
 * ├───────────────────────────────────────────────┼────────┼──────────────────────────────────────┤
 * │ /api/admin/*                                  │ *      │ Goals, costs, prices, progress (key) │
 * └───────────────────────────────────────────────┴────────┴──────────────────────────────────────┘
 *
 * Member: Authorization: Bearer <JWT> whose payload carries serverId and memberId.
 * Key: X-Admin-Key header matching ADMIN_API_KEY.
 * Error responses follow the shape: { error: { message, code, details? } }
 */

import { Router } from "express";
import type { AppContext } from "../context";
import { adminRouter } from "./admin";
import { bankRouter } from "./bank";
import { healthRouter } from "./health";
import { loyaltyRouter } from "./loyalty";
import { stocksRouter } from "./stocks";
import { storeRouter } from "./store";

export function createApiRouter(ctx: AppContext): Router {
  const router = Router();

  // Health check
  router.use("/health", healthRouter(ctx));

  // Currency
  router.use("/bank", bankRouter(ctx));

  // Plugins
  router.use("/loyalty", loyaltyRouter(ctx));
  router.use("/store", storeRouter(ctx));
  router.use("/stocks", stocksRouter(ctx));

  // Admin (X-Admin-Key)
  router.use("/admin", adminRouter(ctx));

  return router;
}
