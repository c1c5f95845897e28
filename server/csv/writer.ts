/**
 * Monarch CSV Writer
 *
 * Monarch imports take eight columns and no header row.
 */

import { formatCsvField } from "./csvLine.js";
import { OUTPUT_COLUMNS, type OutputRow } from "../services/transformer.js";

/** Amount with two fractional digits and a leading "-" for negatives */
export function formatAmount(amount: number): string {
  return amount.toFixed(2);
}

export function toMonarchLine(row: OutputRow): string {
  return OUTPUT_COLUMNS.map(({ key }) => {
    const value = row[key];
    return typeof value === "number" ? formatAmount(value) : formatCsvField(value);
  }).join(",");
}

export function toMonarchCsv(rows: OutputRow[]): string {
  return rows.map((row) => `${toMonarchLine(row)}\n`).join("");
}
