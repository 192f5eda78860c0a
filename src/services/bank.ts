/**
 * Bank: the currency ledger other services charge against.
 *
 * Accounts are per member per server and live in one JSON file:
 *   { serverId: { memberId: { balance, createdAt } } }
 * Every change rewrites the file.
 */

import { logger } from "../config/logger";
import {
  AccountExistsError,
  AccountNotFoundError,
  InsufficientFundsError,
  assertCount,
} from "../errors";
import type { SubjectKey } from "./achievements";
import { isRecord, loadJson, saveJson } from "./jsonStore";

export interface BankAccount {
  balance: number;
  createdAt: string;
}

type AccountTree = Map<string, Map<string, BankAccount>>;

/** The subset of the bank that charging code depends on. */
export interface CurrencyLedger {
  accountExists(subject: SubjectKey): boolean;
  getBalance(subject: SubjectKey): number;
  canSpend(subject: SubjectKey, amount: number): boolean;
  withdrawCredits(subject: SubjectKey, amount: number): number;
  depositCredits(subject: SubjectKey, amount: number): number;
}

function parseAccounts(raw: unknown): AccountTree {
  const tree: AccountTree = new Map();
  if (!isRecord(raw)) return tree;

  for (const [scopeId, members] of Object.entries(raw)) {
    if (!isRecord(members)) continue;
    const scope = new Map<string, BankAccount>();
    for (const [subjectId, account] of Object.entries(members)) {
      if (!isRecord(account) || typeof account.balance !== "number") continue;
      scope.set(subjectId, {
        balance: account.balance,
        createdAt: typeof account.createdAt === "string" ? account.createdAt : new Date(0).toISOString(),
      });
    }
    tree.set(scopeId, scope);
  }
  return tree;
}

export class Bank implements CurrencyLedger {
  private readonly accounts: AccountTree;

  constructor(
    private readonly filePath: string,
    private readonly startingBalance: number,
  ) {
    this.accounts = parseAccounts(loadJson(filePath));
  }

  register(subject: SubjectKey): BankAccount {
    if (this.accountExists(subject)) {
      throw new AccountExistsError();
    }
    const account: BankAccount = {
      balance: this.startingBalance,
      createdAt: new Date().toISOString(),
    };
    const scope = this.accounts.get(subject.scopeId) ?? new Map<string, BankAccount>();
    scope.set(subject.subjectId, account);
    this.accounts.set(subject.scopeId, scope);
    this.save();
    logger.info("bank", "Opened account", { ...subject, balance: account.balance });
    return { ...account };
  }

  accountExists(subject: SubjectKey): boolean {
    return this.find(subject) !== undefined;
  }

  getAccount(subject: SubjectKey): BankAccount {
    return { ...this.require(subject) };
  }

  getBalance(subject: SubjectKey): number {
    return this.require(subject).balance;
  }

  /** False (not an error) for members without an account. */
  canSpend(subject: SubjectKey, amount: number): boolean {
    const account = this.find(subject);
    return account !== undefined && account.balance >= amount;
  }

  withdrawCredits(subject: SubjectKey, amount: number): number {
    assertCount("amount", amount);
    const account = this.require(subject);
    if (account.balance < amount) {
      throw new InsufficientFundsError(account.balance, amount);
    }
    account.balance -= amount;
    this.save();
    return account.balance;
  }

  depositCredits(subject: SubjectKey, amount: number): number {
    assertCount("amount", amount);
    const account = this.require(subject);
    account.balance += amount;
    this.save();
    return account.balance;
  }

  setBalance(subject: SubjectKey, amount: number): number {
    assertCount("amount", amount);
    const account = this.require(subject);
    account.balance = amount;
    this.save();
    return account.balance;
  }

  private find(subject: SubjectKey): BankAccount | undefined {
    return this.accounts.get(subject.scopeId)?.get(subject.subjectId);
  }

  private require(subject: SubjectKey): BankAccount {
    const account = this.find(subject);
    if (!account) {
      throw new AccountNotFoundError(subject.scopeId, subject.subjectId);
    }
    return account;
  }

  private save(): void {
    saveJson(
      this.filePath,
      Object.fromEntries(
        [...this.accounts].map(([scopeId, members]) => [scopeId, Object.fromEntries(members)]),
      ),
    );
  }
}
