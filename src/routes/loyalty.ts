/**
 * Loyalty routes.
 *
 * GET  /api/loyalty               — Points, rank and next goal (requireMember)
 * POST /api/loyalty/buy           — Spend credits on loyalty points { points } (requireMember)
 * GET  /api/loyalty/achievements  — Achieved and remaining goals (requireMember)
 * GET  /api/loyalty/announcements — Recent level-ups in the member's server (requireMember)
 *
 * Every route goes through the command-cost gate under its command name.
 */

import { Router, Request, Response } from "express";
import { assertCount } from "../errors";
import { memberOf, requireMember } from "../middleware/auth";
import { commandCost } from "../middleware/commandCost";
import { tradeLimiter } from "../middleware/rateLimiter";
import type { AppContext } from "../context";
import { bodyOf } from "./body";

export function loyaltyRouter(ctx: AppContext): Router {
  const router = Router();

  router.use(requireMember);

  // ---------------------------------------------------------------------------
  // GET / — Current standing
  // ---------------------------------------------------------------------------

  router.get("/", commandCost(ctx, "loyalty"), (req: Request, res: Response) => {
    res.status(200).json(ctx.loyalty.getLevel(memberOf(req)));
  });

  // ---------------------------------------------------------------------------
  // POST /buy — Buy loyalty points with credits
  // ---------------------------------------------------------------------------

  router.post(
    "/buy",
    tradeLimiter,
    commandCost(ctx, "loyalty buy"),
    (req: Request, res: Response) => {
      const { points } = bodyOf(req);
      const member = memberOf(req);
      const result = ctx.loyalty.buyLevel(member, assertCount("points", points, { positive: true }));
      res.status(200).json({ ...result, balance: ctx.bank.getBalance(member) });
    },
  );

  // ---------------------------------------------------------------------------
  // GET /achievements — Achieved and unachieved goals
  // ---------------------------------------------------------------------------

  router.get(
    "/achievements",
    commandCost(ctx, "loyalty achievements"),
    (req: Request, res: Response) => {
      const achievement = ctx.tracker.achievementForId(memberOf(req), ctx.loyalty.definition);
      res.status(200).json({
        achievement: achievement.name,
        title: achievement.definition.title,
        level: achievement.current.level,
        achieved: achievement.achieved,
        unachieved: achievement.unachieved,
      });
    },
  );

  // ---------------------------------------------------------------------------
  // GET /announcements — Recent announcements for the member's server
  // ---------------------------------------------------------------------------

  router.get("/announcements", (req: Request, res: Response) => {
    const limit = Math.min(parseInt(String(req.query.limit ?? "20"), 10) || 20, 50);
    const announcements = ctx.announcements.recent(memberOf(req).scopeId, limit);
    res.status(200).json({ announcements });
  });

  return router;
}
