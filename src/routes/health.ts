/**
 * Health check endpoint.
 *
 * Response shape:
 *   {
 *     status: "ok",
 *     timestamp: string,
 *     uptime: number,
 *     achievements: number,           registered definitions
 *     scheduler: { running: boolean, nextUpdate: string | null },
 *     memory: { rss, heapUsed, heapTotal, external } (all in MB)
 *   }
 */

import { Router, Request, Response } from "express";
import type { AppContext } from "../context";

export function healthRouter(ctx: AppContext): Router {
  const router = Router();

  router.get("/", (_req: Request, res: Response) => {
    const nextUpdate = ctx.scheduler.getNextUpdateTime();
    const mem = process.memoryUsage();
    const toMB = (bytes: number) => Math.round((bytes / 1024 / 1024) * 100) / 100;

    res.status(200).json({
      status: "ok",
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      achievements: ctx.tracker.achievements().length,
      scheduler: {
        running: ctx.scheduler.isRunning(),
        nextUpdate: nextUpdate?.toISOString() ?? null,
      },
      memory: {
        rss: toMB(mem.rss),
        heapUsed: toMB(mem.heapUsed),
        heapTotal: toMB(mem.heapTotal),
        external: toMB(mem.external),
      },
    });
  });

  return router;
}
