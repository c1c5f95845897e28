/**
 * Monarch Transformer
 *
 * Turns a parsed BAC statement into Monarch's eight import columns:
 * Date, Merchant, Category, Account, Original Statement, Notes, Amount, Tags.
 */

import { SchemaError } from "../errors.js";
import { bacFormat } from "../csv/formats/bac.js";
import {
  CANONICAL_COLUMNS,
  type CanonicalColumn,
  type ColumnAliases,
  type StatementFormat,
} from "../csv/statementFormat.js";
import type { StatementTable } from "../csv/statementParser.js";
import { applyMappings, type AccountMapping } from "./transferReferences.js";

export interface OutputRow {
  /** YYYY-MM-DD */
  date: string;
  merchant: string;
  category: string;
  account: string;
  originalStatement: string;
  notes: string;
  /** Credit minus debit, rounded to cents */
  amount: number;
  tags: string;
}

/** Output column order with Monarch's labels */
export const OUTPUT_COLUMNS: Array<{ key: keyof OutputRow; label: string }> = [
  { key: "date", label: "Date" },
  { key: "merchant", label: "Merchant" },
  { key: "category", label: "Category" },
  { key: "account", label: "Account" },
  { key: "originalStatement", label: "Original Statement" },
  { key: "notes", label: "Notes" },
  { key: "amount", label: "Amount" },
  { key: "tags", label: "Tags" },
];

export type ResolvedColumns = Partial<Record<CanonicalColumn, string>>;

const REQUIRED_COLUMNS: CanonicalColumn[] = ["Date", "Merchant"];

/**
 * Map each canonical column to the first alias present in the header
 */
export function resolveColumns(columns: string[], aliases: ColumnAliases): ResolvedColumns {
  const resolved: ResolvedColumns = {};
  for (const canonical of CANONICAL_COLUMNS) {
    const match = aliases[canonical].find((alias) => columns.includes(alias));
    if (match !== undefined) {
      resolved[canonical] = match;
    }
  }
  return resolved;
}

/**
 * Parse a DD/MM/YYYY date into YYYY-MM-DD.
 * Returns null for anything that is not a real calendar date.
 */
export function parseStatementDate(value: string | undefined): string | null {
  const match = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/.exec((value ?? "").trim());
  if (!match) return null;

  const day = Number(match[1]);
  const month = Number(match[2]);
  const year = Number(match[3]);

  const date = new Date(Date.UTC(year, month - 1, day));
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }

  return `${match[3]}-${String(month).padStart(2, "0")}-${String(day).padStart(2, "0")}`;
}

/**
 * Parse a debit or credit cell. Thousands separators are stripped;
 * blank or unparseable values count as zero.
 */
export function parseAmountValue(value: string | undefined): number {
  const cleaned = (value ?? "").replace(/,/g, "").trim();
  if (cleaned === "") return 0;

  const amount = Number(cleaned);
  return Number.isFinite(amount) ? amount : 0;
}

/**
 * Round to cents, halves away from zero
 */
export function roundCurrency(value: number): number {
  const rounded = Math.round(Math.abs(value) * 100) / 100;
  return value < 0 && rounded !== 0 ? -rounded : rounded;
}

/**
 * Convert a parsed statement into Monarch rows.
 * Rows with an invalid date or an empty description are dropped.
 * @throws SchemaError when the date or description column is missing
 */
export function transform(
  table: StatementTable,
  importId: number,
  internalMap: AccountMapping,
  interbankMap: AccountMapping,
  format: StatementFormat = bacFormat
): OutputRow[] {
  const columns = resolveColumns(table.columns, format.columnAliases);

  const missing = REQUIRED_COLUMNS.filter((canonical) => columns[canonical] === undefined);
  const dateColumn = columns.Date;
  const merchantColumn = columns.Merchant;
  if (dateColumn === undefined || merchantColumn === undefined) {
    throw new SchemaError(missing, table.columns);
  }

  const rows = applyMappings(table.rows, internalMap, interbankMap, merchantColumn);
  const output: OutputRow[] = [];

  for (const row of rows) {
    const date = parseStatementDate(row[dateColumn]);
    if (date === null) continue;

    const merchant = (row[merchantColumn] ?? "").trim();
    if (merchant === "") continue;

    const debit = columns.Debit === undefined ? 0 : parseAmountValue(row[columns.Debit]);
    const credit = columns.Credit === undefined ? 0 : parseAmountValue(row[columns.Credit]);
    const amount = roundCurrency(credit - debit);
    if (!Number.isFinite(amount)) continue;

    output.push({
      date,
      merchant,
      category: "",
      account: format.accountLabel,
      originalStatement: "",
      notes: `id=${importId}`,
      amount,
      tags: "",
    });
  }

  return output;
}
