/**
 * Bank routes.
 *
 * POST /api/bank/register — Open an account with the starting balance (requireMember)
 * GET  /api/bank/balance  — Current balance (requireMember)
 */

import { Router, Request, Response } from "express";
import { memberOf, requireMember } from "../middleware/auth";
import type { AppContext } from "../context";

export function bankRouter(ctx: AppContext): Router {
  const router = Router();

  router.use(requireMember);

  // ---------------------------------------------------------------------------
  // POST /register — Open an account
  // ---------------------------------------------------------------------------

  router.post("/register", (req: Request, res: Response) => {
    const account = ctx.bank.register(memberOf(req));
    res.status(201).json(account);
  });

  // ---------------------------------------------------------------------------
  // GET /balance — Current balance
  // ---------------------------------------------------------------------------

  router.get("/balance", (req: Request, res: Response) => {
    const member = memberOf(req);
    res.status(200).json({ balance: ctx.bank.getBalance(member) });
  });

  return router;
}
