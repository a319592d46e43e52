/**
 * @cadence/ledger — Account registry.
 *
 * Holder accounts are opened on first use; issuance accounts are opened
 * by the first mint of their token. Accounts are never modified or removed.
 */

import { isAccountId } from "@cadence/types";
import type { AccountId } from "@cadence/types";
import type { AccountKind, LedgerAccount, NormalBalance } from "./types.js";
import { ISSUANCE_PREFIX, LedgerError, NORMAL_BALANCE } from "./types.js";

/**
 * Append-only registry of accounts.
 */
export class AccountRegistry {
  private readonly _accounts: Map<AccountId, LedgerAccount> = new Map();

  /**
   * Register a new account. Throws if the id is taken or malformed.
   */
  register(id: AccountId, kind: AccountKind, timestamp: string): LedgerAccount {
    if (!isAccountId(id)) {
      throw new LedgerError("INVALID_ACCOUNT", `Invalid account id: "${id}"`);
    }
    if (this._accounts.has(id)) {
      throw new LedgerError(
        "DUPLICATE_ACCOUNT_ID",
        `Account already exists: "${id}"`,
      );
    }
    if (kind === "holder" && id.startsWith(ISSUANCE_PREFIX)) {
      throw new LedgerError(
        "INVALID_ACCOUNT",
        `Holder account ids cannot start with "${ISSUANCE_PREFIX}"`,
      );
    }

    const account: LedgerAccount = { id, kind, openedAt: timestamp };
    this._accounts.set(id, account);
    return account;
  }

  /**
   * Return the account, opening it with `kind` if it does not exist yet.
   */
  ensure(id: AccountId, kind: AccountKind, timestamp: string): LedgerAccount {
    const existing = this._accounts.get(id);
    if (existing !== undefined) {
      if (existing.kind !== kind) {
        throw new LedgerError(
          "INVALID_ACCOUNT",
          `Account "${id}" is a ${existing.kind} account, not ${kind}`,
        );
      }
      return existing;
    }
    return this.register(id, kind, timestamp);
  }

  get(id: AccountId): LedgerAccount | undefined {
    return this._accounts.get(id);
  }

  has(id: AccountId): boolean {
    return this._accounts.has(id);
  }

  assertExists(id: AccountId): LedgerAccount {
    const account = this._accounts.get(id);
    if (account === undefined) {
      throw new LedgerError("UNKNOWN_ACCOUNT", `Unknown account: "${id}"`);
    }
    return account;
  }

  getNormalBalance(id: AccountId): NormalBalance {
    return NORMAL_BALANCE[this.assertExists(id).kind];
  }

  getAll(): readonly LedgerAccount[] {
    return [...this._accounts.values()];
  }

  get count(): number {
    return this._accounts.size;
  }
}
