/**
 * Command-cost gate.
 *
 * `commandCost(ctx, "stocks buy")` returns middleware that charges the
 * member the store price of that command:
 *   - before the handler: a command without a price passes; otherwise the
 *     member needs a bank account (403 ACCOUNT_REQUIRED) and enough credits
 *     (402 INSUFFICIENT_FUNDS), and the price is withdrawn right away so
 *     whatever the handler spends comes out of what is left
 *   - after the handler: a response of 400 or above refunds the price. A
 *     failed command is never charged.
 *
 * Mount after requireMember.
 */

import { Request, Response, NextFunction } from "express";
import { errorMessage, logger } from "../config/logger";
import { AccountNotFoundError, InsufficientFundsError } from "../errors";
import type { CurrencyLedger } from "../services/bank";
import type { CommandCostRegistry } from "../services/store";
import { memberOf } from "./auth";

export interface CommandCostDeps {
  bank: CurrencyLedger;
  store: CommandCostRegistry;
}

export function commandCost(deps: CommandCostDeps, command: string) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const cost = deps.store.getCost(command);
    if (cost === null || cost === 0) {
      next();
      return;
    }

    const member = memberOf(req);
    if (!deps.bank.accountExists(member)) {
      throw new AccountNotFoundError(member.scopeId, member.subjectId);
    }
    if (!deps.bank.canSpend(member, cost)) {
      throw new InsufficientFundsError(deps.bank.getBalance(member), cost);
    }

    deps.bank.withdrawCredits(member, cost);
    logger.info("store", `Charged ${cost} for ${command}`, { ...member, command, cost });

    res.on("finish", () => {
      if (res.statusCode < 400) return;
      try {
        deps.bank.depositCredits(member, cost);
        logger.info("store", `Refunded ${cost} for failed ${command}`, {
          ...member,
          command,
          cost,
          statusCode: res.statusCode,
        });
      } catch (err) {
        logger.error("store", `Failed to refund ${command}`, {
          ...member,
          command,
          cost,
          error: errorMessage(err),
        });
      }
    });

    next();
  };
}
