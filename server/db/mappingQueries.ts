/**
 * Account mapping queries
 *
 * Friendly names for transfer destination accounts. Internal (TEF) and
 * interbank (SINPE) accounts live in separate tables so the same number can
 * carry a different name per scheme.
 */

import type Database from "better-sqlite3";

export type TransferScheme = "internal" | "interbank";

const SCHEME_TABLES: Record<TransferScheme, string> = {
  internal: "account_mapping",
  interbank: "sinpe_account_mapping",
};

export interface AccountMappingRecord {
  account_number: string;
  friendly_name: string;
  created_at: string;
  last_used: string;
}

export interface AccountMappingStore {
  /** All mappings with timestamps, most recently used first */
  list(): AccountMappingRecord[];
  /** Snapshot of account number → friendly name, most recently used first */
  get(): Map<string, string>;
  /** Add or rename a mapping */
  put(accountNumber: string, friendlyName: string): void;
  delete(accountNumber: string): void;
}

export interface MappingStores {
  internal: AccountMappingStore;
  interbank: AccountMappingStore;
}

export class SqliteAccountMappingStore implements AccountMappingStore {
  private readonly table: string;

  constructor(
    private readonly db: Database.Database,
    readonly scheme: TransferScheme
  ) {
    this.table = SCHEME_TABLES[scheme];
  }

  list(): AccountMappingRecord[] {
    return this.db
      .prepare<[], AccountMappingRecord>(
        `SELECT account_number, friendly_name, created_at, last_used
         FROM ${this.table}
         ORDER BY last_used DESC, account_number`
      )
      .all();
  }

  get(): Map<string, string> {
    return new Map(this.list().map((record) => [record.account_number, record.friendly_name]));
  }

  /**
   * @throws Error if the account number or name is blank
   */
  put(accountNumber: string, friendlyName: string): void {
    const account = accountNumber.trim();
    const name = friendlyName.trim();
    if (!account || !name) {
      throw new Error("Account number and friendly name are required");
    }

    this.db
      .prepare(
        `INSERT INTO ${this.table} (account_number, friendly_name)
         VALUES (?, ?)
         ON CONFLICT(account_number) DO UPDATE SET
           friendly_name = excluded.friendly_name,
           last_used = datetime('now')`
      )
      .run(account, name);
  }

  delete(accountNumber: string): void {
    this.db.prepare(`DELETE FROM ${this.table} WHERE account_number = ?`).run(accountNumber);
  }
}

/**
 * Open both mapping stores on an initialized database
 */
export function createMappingStores(db: Database.Database): MappingStores {
  return {
    internal: new SqliteAccountMappingStore(db, "internal"),
    interbank: new SqliteAccountMappingStore(db, "interbank"),
  };
}

export function isTransferScheme(value: string): value is TransferScheme {
  return value === "internal" || value === "interbank";
}
