/**
 * Store routes (read side; admins set costs under /api/admin/store).
 *
 * GET /api/store/costs          — Every command with a cost
 * GET /api/store/costs/:command — Cost of one command (0 when free)
 */

import { Router, Request, Response } from "express";
import type { AppContext } from "../context";
import { normalizeCommand } from "../services/store";

export function storeRouter(ctx: AppContext): Router {
  const router = Router();

  router.get("/costs", (_req: Request, res: Response) => {
    res.status(200).json({ costs: ctx.store.getCosts() });
  });

  router.get("/costs/:command", (req: Request, res: Response) => {
    const command = normalizeCommand(req.params.command);
    const cost = ctx.store.getCost(command);
    res.status(200).json({ command, cost: cost ?? 0, free: cost === null || cost === 0 });
  });

  return router;
}
