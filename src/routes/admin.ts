/**
 * Admin routes. Every endpoint requires the X-Admin-Key header.
 *
 * Endpoints:
 *   GET    /api/admin/metrics                                         -- In-memory application metrics
 *   GET    /api/admin/achievements                                    -- Registered definitions (?category, ?keywords=a,b)
 *   POST   /api/admin/loyalty/goals                                   -- Add or replace a loyalty goal
 *   DELETE /api/admin/loyalty/goals                                   -- Remove goals by level and/or name ({ exact } for both)
 *   PUT    /api/admin/store/costs                                     -- Set a command cost
 *   DELETE /api/admin/store/costs/:command                            -- Make a command free again
 *   POST   /api/admin/stocks/update                                   -- Reprice the market now
 *   GET    /api/admin/servers/:serverId/members                       -- Tracked members of a server
 *   PUT    /api/admin/servers/:serverId/members/:memberId/achievements/:name -- Set a member's level
 *   DELETE /api/admin/servers/:serverId/members/:memberId/achievements -- Forget a member's progress
 *   DELETE /api/admin/servers/:serverId/achievements                   -- Forget a whole server's progress
 *   POST   /api/admin/bank/deposit                                    -- Credit a member's account
 */

import { Router, Request, Response } from "express";
import { logger } from "../config/logger";
import { assertCount } from "../errors";
import { requireAdminKey } from "../middleware/auth";
import type { AppContext } from "../context";
import { monitoringService } from "../services/monitoringService";
import { normalizeCommand } from "../services/store";
import { bodyOf, optionalString, requireString } from "./body";

export function adminRouter(ctx: AppContext): Router {
  const router = Router();

  router.use(requireAdminKey);

  /**
   * GET /api/admin/metrics
   *
   * Request and error counters since the last restart.
   */
  router.get("/metrics", (_req: Request, res: Response) => {
    res.json(monitoringService.getMetrics());
  });

  // ---------------------------------------------------------------------------
  // Achievements
  // ---------------------------------------------------------------------------

  router.get("/achievements", (req: Request, res: Response) => {
    const category = typeof req.query.category === "string" ? req.query.category : undefined;
    const keywords =
      typeof req.query.keywords === "string"
        ? req.query.keywords.split(",").map((k) => k.trim()).filter(Boolean)
        : [];

    const achievements = ctx.tracker.achievements({ category, keywords }).map((d) => ({
      name: d.name,
      title: d.title,
      category: d.category,
      keywords: [...d.keywords],
      goals: d.goals.records(),
    }));
    res.json({ achievements });
  });

  // ---------------------------------------------------------------------------
  // Loyalty goals
  // ---------------------------------------------------------------------------

  router.post("/loyalty/goals", (req: Request, res: Response) => {
    const body = bodyOf(req);
    const level = assertCount("level", body.level);
    const name = requireString(body, "name");
    const description = optionalString(body, "description") ?? "";

    const goal = ctx.loyalty.addGoal(level, name, description);
    logger.info("admin", `Loyalty goal ${name} set at ${level}`);
    res.status(201).json({ goal, goals: ctx.loyalty.goals });
  });

  router.delete("/loyalty/goals", (req: Request, res: Response) => {
    const body = bodyOf(req);
    const level = body.level === undefined ? undefined : assertCount("level", body.level);
    const name = optionalString(body, "name");
    const exact = body.exact === true;

    const removed = ctx.loyalty.removeGoal({ level, name, exact });
    if (removed.length > 0) {
      logger.info("admin", `Removed ${removed.length} loyalty goal(s)`, {
        goals: removed.map((g) => g.name),
      });
    }
    res.json({ removed, goals: ctx.loyalty.goals });
  });

  // ---------------------------------------------------------------------------
  // Store
  // ---------------------------------------------------------------------------

  router.put("/store/costs", (req: Request, res: Response) => {
    const body = bodyOf(req);
    const command = requireString(body, "command");
    const cost = ctx.store.setCost(command, assertCount("cost", body.cost));
    res.json({ command: normalizeCommand(command), cost, costs: ctx.store.getCosts() });
  });

  router.delete("/store/costs/:command", (req: Request, res: Response) => {
    const removed = ctx.store.removeCost(req.params.command);
    res.json({ removed, costs: ctx.store.getCosts() });
  });

  // ---------------------------------------------------------------------------
  // Stocks
  // ---------------------------------------------------------------------------

  router.post("/stocks/update", (_req: Request, res: Response) => {
    if (!ctx.scheduler.tick()) {
      throw new Error("Stock price update failed");
    }
    res.json({
      stocks: ctx.stocks.list(),
      nextUpdateAt: ctx.scheduler.getNextUpdateTime()?.toISOString() ?? null,
    });
  });

  // ---------------------------------------------------------------------------
  // Member progress
  // ---------------------------------------------------------------------------

  router.get("/servers/:serverId/members", (req: Request, res: Response) => {
    const members = ctx.tracker
      .getTrackedIds(req.params.serverId)
      .map((subject) => subject.subjectId);
    res.json({ serverId: req.params.serverId, members });
  });

  router.put(
    "/servers/:serverId/members/:memberId/achievements/:name",
    (req: Request, res: Response) => {
      const subject = { scopeId: req.params.serverId, subjectId: req.params.memberId };
      const level = assertCount("level", bodyOf(req).level);

      ctx.tracker.setLevel(subject, req.params.name, level);
      const achievement = ctx.tracker.achievementForId(subject, req.params.name);
      res.json({
        achievement: achievement.name,
        current: achievement.current,
        achieved: achievement.achieved,
      });
    },
  );

  router.delete(
    "/servers/:serverId/members/:memberId/achievements",
    (req: Request, res: Response) => {
      const removed = ctx.tracker.removeId({
        scopeId: req.params.serverId,
        subjectId: req.params.memberId,
      });
      res.json({ removed });
    },
  );

  router.delete("/servers/:serverId/achievements", (req: Request, res: Response) => {
    ctx.tracker.wipeScope(req.params.serverId);
    logger.info("admin", `Wiped progress for server ${req.params.serverId}`);
    res.status(204).end();
  });

  // ---------------------------------------------------------------------------
  // Bank
  // ---------------------------------------------------------------------------

  router.post("/bank/deposit", (req: Request, res: Response) => {
    const body = bodyOf(req);
    const serverId = requireString(body, "serverId");
    const memberId = requireString(body, "memberId");
    const amount = assertCount("amount", body.amount, { positive: true });

    const balance = ctx.bank.depositCredits({ scopeId: serverId, subjectId: memberId }, amount);
    res.json({ serverId, memberId, balance });
  });

  return router;
}
