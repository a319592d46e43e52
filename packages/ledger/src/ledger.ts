/**
 * @cadence/ledger — Core TokenLedger class.
 *
 * Append-only double-entry token ledger. Every committed transaction is a
 * balanced set of entries; a transfer debits the sender's holder account
 * and credits the receiver's. Minting debits the token's issuance account,
 * so the trial balance proves that every unit held was issued exactly once.
 *
 * API surface:
 * - mint() — Issue new supply to a holder
 * - transfer() — Atomically execute a batch of transfer instructions
 * - balanceOf() / totalSupply() — Point queries
 * - getTrialBalance() — Full trial balance
 * - getEntries() / getTransactions() — Audit queries
 * - snapshot() / fromSnapshot() — Persistence
 *
 * There is NO update(), delete(), or reversal helper. Corrections are
 * new transfers.
 */

import { isAccountId } from "@cadence/types";
import type {
  AccountId,
  LedgerEntry,
  TokenId,
  TransferInstruction,
} from "@cadence/types";
import { AccountRegistry } from "./accounts.js";
import { computeTokenBalance, computeTrialBalance } from "./balance-calculator.js";
import { assertPositiveAmount } from "./amount-math.js";
import type {
  AccountKind,
  EntryFilter,
  LedgerAccount,
  LedgerSnapshot,
  LedgerTransaction,
  TokenBalance,
  TransferOptions,
  TransferResult,
  TrialBalance,
} from "./types.js";
import { ISSUANCE_PREFIX, LedgerError, issuanceAccountId } from "./types.js";

/**
 * Append-only double-entry token ledger.
 *
 * Holder accounts can never go negative. A batch of instructions is
 * validated against running balances as a whole before any entry is
 * written, so a batch either commits entirely or leaves no trace.
 */
export class TokenLedger {
  private readonly _accounts: AccountRegistry = new AccountRegistry();
  private readonly _entries: LedgerEntry[] = [];
  private readonly _transactions: LedgerTransaction[] = [];
  private readonly _correlationIds: Set<string> = new Set();
  /** Running net balance per `${account}::${token}` in normal direction. */
  private readonly _balances: Map<string, bigint> = new Map();
  private _mintSequence = 0;

  // ─── Accounts ────────────────────────────────────────────────────────

  getAccount(id: AccountId): LedgerAccount | undefined {
    return this._accounts.get(id);
  }

  hasAccount(id: AccountId): boolean {
    return this._accounts.has(id);
  }

  getAccounts(): readonly LedgerAccount[] {
    return this._accounts.getAll();
  }

  // ─── Writes ──────────────────────────────────────────────────────────

  /**
   * Issue `amount` new units of `token` to `to`.
   */
  mint(
    to: AccountId,
    token: TokenId,
    amount: bigint,
    correlationId?: string,
  ): TransferResult {
    assertPositiveAmount(amount, `mint of ${token} to ${to}`);
    this._assertHolder(to);
    const corrId = correlationId ?? `mint:${String(++this._mintSequence)}`;
    this._assertFreshCorrelation(corrId);

    const timestamp = new Date().toISOString();
    const issuance = issuanceAccountId(token);
    this._accounts.ensure(issuance, "issuance", timestamp);
    this._accounts.ensure(to, "holder", timestamp);

    return this._commit(
      corrId,
      [
        this._entry(corrId, 0, issuance, "debit", token, amount, timestamp),
        this._entry(corrId, 0, to, "credit", token, amount, timestamp),
      ],
      timestamp,
      `Mint ${amount.toString()} ${token} to ${to}`,
    );
  }

  /**
   * Execute a batch of transfers atomically.
   *
   * Validation rules (fail-closed — all must pass before anything is written):
   * 1. The batch is non-empty
   * 2. The correlation ID has not been used before
   * 3. Every amount is a positive i128
   * 4. No instruction moves value from an account to itself
   * 5. No holder balance goes negative at any step of the batch
   */
  transfer(
    instructions: readonly TransferInstruction[],
    correlationId: string,
    options?: TransferOptions,
  ): TransferResult {
    if (instructions.length === 0) {
      throw new LedgerError("EMPTY_TRANSACTION", "Cannot transfer an empty batch");
    }
    this._assertFreshCorrelation(correlationId);

    const pending = new Map<string, bigint>();
    for (const ix of instructions) {
      assertPositiveAmount(ix.amount, `transfer ${ix.from} → ${ix.to}`);
      if (ix.from === ix.to) {
        throw new LedgerError(
          "SELF_TRANSFER",
          `Cannot transfer from "${ix.from}" to itself`,
        );
      }
      this._assertHolder(ix.from);
      this._assertHolder(ix.to);

      const fromKey = balanceKey(ix.from, ix.token);
      const available = pending.get(fromKey) ?? this._balanceByKey(fromKey);
      if (available < ix.amount) {
        throw new LedgerError(
          "INSUFFICIENT_BALANCE",
          `Account "${ix.from}" holds ${available.toString()} ${ix.token}, needs ${ix.amount.toString()}`,
        );
      }
      pending.set(fromKey, available - ix.amount);

      const toKey = balanceKey(ix.to, ix.token);
      pending.set(toKey, (pending.get(toKey) ?? this._balanceByKey(toKey)) + ix.amount);
    }

    const timestamp = new Date().toISOString();
    const entries: LedgerEntry[] = [];
    instructions.forEach((ix, i) => {
      this._accounts.ensure(ix.from, "holder", timestamp);
      this._accounts.ensure(ix.to, "holder", timestamp);
      entries.push(
        this._entry(correlationId, i, ix.from, "debit", ix.token, ix.amount, timestamp),
        this._entry(correlationId, i, ix.to, "credit", ix.token, ix.amount, timestamp),
      );
    });

    return this._commit(correlationId, entries, timestamp, options?.description);
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  /**
   * Current balance of a holder account (0 for unknown accounts).
   */
  balanceOf(account: AccountId, token: TokenId): bigint {
    return this._balanceByKey(balanceKey(account, token));
  }

  /**
   * Units of `token` ever minted.
   */
  totalSupply(token: TokenId): bigint {
    return this._balanceByKey(balanceKey(issuanceAccountId(token), token));
  }

  /**
   * Balance with debit/credit totals, recomputed from the entry log.
   */
  getBalance(account: AccountId, token: TokenId): TokenBalance {
    return computeTokenBalance(account, token, this._entries, this._accounts);
  }

  getTrialBalance(timestamp?: string): TrialBalance {
    return computeTrialBalance(
      this._entries,
      this._accounts,
      timestamp ?? new Date().toISOString(),
    );
  }

  getEntries(filter?: EntryFilter): readonly LedgerEntry[] {
    if (filter === undefined) {
      return [...this._entries];
    }

    return this._entries.filter((entry) => {
      if (filter.accountId !== undefined && entry.accountId !== filter.accountId) {
        return false;
      }
      if (filter.correlationId !== undefined && entry.correlationId !== filter.correlationId) {
        return false;
      }
      if (filter.token !== undefined && entry.token !== filter.token) {
        return false;
      }
      if (filter.fromTimestamp !== undefined && entry.timestamp < filter.fromTimestamp) {
        return false;
      }
      if (filter.toTimestamp !== undefined && entry.timestamp > filter.toTimestamp) {
        return false;
      }
      return true;
    });
  }

  getTransactions(): readonly LedgerTransaction[] {
    return [...this._transactions];
  }

  hasTransaction(correlationId: string): boolean {
    return this._correlationIds.has(correlationId);
  }

  get transactionCount(): number {
    return this._transactions.length;
  }

  // ─── Snapshot (Persistence) ──────────────────────────────────────────

  snapshot(): LedgerSnapshot {
    return {
      version: 1,
      accounts: this._accounts.getAll(),
      transactions: [...this._transactions],
      createdAt: new Date().toISOString(),
    };
  }

  /**
   * Restore a ledger from a snapshot, re-checking that every
   * transaction balances per token.
   */
  static fromSnapshot(snapshot: LedgerSnapshot): TokenLedger {
    const ledger = new TokenLedger();

    for (const account of snapshot.accounts) {
      ledger._accounts.register(account.id, account.kind, account.openedAt);
    }
    for (const tx of snapshot.transactions) {
      ledger._assertFreshCorrelation(tx.correlationId);
      ledger._assertBalanced(tx.entries);
      ledger._commit(tx.correlationId, tx.entries, tx.timestamp, tx.description);
    }
    ledger._mintSequence = snapshot.transactions.filter((tx) =>
      tx.correlationId.startsWith("mint:"),
    ).length;

    return ledger;
  }

  // ─── Internals ───────────────────────────────────────────────────────

  private _commit(
    correlationId: string,
    entries: readonly LedgerEntry[],
    timestamp: string,
    description: string | undefined,
  ): TransferResult {
    for (const entry of entries) {
      this._entries.push(entry);
      const kind: AccountKind = this._accounts.assertExists(entry.accountId).kind;
      const signed = (entry.type === "credit") === (kind === "holder")
        ? entry.amount
        : -entry.amount;
      const key = balanceKey(entry.accountId, entry.token);
      this._balances.set(key, this._balanceByKey(key) + signed);
    }

    this._correlationIds.add(correlationId);
    this._transactions.push({
      correlationId,
      entries: [...entries],
      timestamp,
      description,
    });

    return { correlationId, entryCount: entries.length, timestamp };
  }

  private _entry(
    correlationId: string,
    index: number,
    accountId: AccountId,
    type: "debit" | "credit",
    token: TokenId,
    amount: bigint,
    timestamp: string,
  ): LedgerEntry {
    return {
      id: `${correlationId}:${String(index)}:${type}`,
      accountId,
      type,
      token,
      amount,
      timestamp,
      correlationId,
    };
  }

  private _assertFreshCorrelation(correlationId: string): void {
    if (this._correlationIds.has(correlationId)) {
      throw new LedgerError(
        "DUPLICATE_CORRELATION_ID",
        `Transaction already recorded: "${correlationId}"`,
      );
    }
  }

  private _assertHolder(id: AccountId): void {
    if (!isAccountId(id)) {
      throw new LedgerError("INVALID_ACCOUNT", `Invalid account id: "${id}"`);
    }
    const existing = this._accounts.get(id);
    if (existing !== undefined ? existing.kind !== "holder" : id.startsWith(ISSUANCE_PREFIX)) {
      throw new LedgerError(
        "INVALID_ACCOUNT",
        `Account "${id}" cannot take part in transfers`,
      );
    }
  }

  private _assertBalanced(entries: readonly LedgerEntry[]): void {
    const totals = new Map<TokenId, bigint>();
    for (const entry of entries) {
      const delta = entry.type === "debit" ? entry.amount : -entry.amount;
      totals.set(entry.token, (totals.get(entry.token) ?? 0n) + delta);
    }
    for (const [token, net] of totals) {
      if (net !== 0n) {
        throw new LedgerError(
          "UNBALANCED_TRANSACTION",
          `Transaction is unbalanced for token "${token}" by ${net.toString()}`,
        );
      }
    }
  }

  private _balanceByKey(key: string): bigint {
    return this._balances.get(key) ?? 0n;
  }
}

function balanceKey(account: AccountId, token: TokenId): string {
  return `${account}::${token}`;
}
