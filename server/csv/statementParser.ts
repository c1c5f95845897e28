/**
 * Statement Parser
 *
 * BAC exports are multi-section reports, not rectangular CSV: account details,
 * then the transaction header and rows, then a summary block. The transaction
 * section is located by content, never by fixed offsets.
 */

import { FormatError } from "../errors.js";
import { parseCsvLine, parseCsvRecords } from "./csvLine.js";
import { bacFormat } from "./formats/bac.js";
import type { StatementFormat } from "./statementFormat.js";

/** One transaction: header name → cell value */
export type TransactionRow = Record<string, string>;

export interface StatementTable {
  /** Header fields, trimmed, in file order */
  columns: string[];
  rows: TransactionRow[];
  /** Number of transaction records kept from the block */
  count: number;
}

/**
 * Strip a BOM and normalize line endings to Unix-style (\n)
 */
export function normalizeStatementText(content: string): string {
  return content.replace(/^\uFEFF/, "").replace(/\r\n/g, "\n").replace(/\r/g, "\n");
}

function isBlank(line: string): boolean {
  return line.trim().length === 0;
}

function startsWithAny(line: string, prefixes: string[]): boolean {
  const trimmed = line.trimStart();
  return prefixes.some((prefix) => trimmed.startsWith(prefix));
}

/**
 * Index of the first line containing a header marker, or -1.
 * First match wins, so a description containing the marker text above the
 * real header would be taken for it.
 */
export function findHeaderIndex(lines: string[], format: StatementFormat = bacFormat): number {
  return lines.findIndex((line) => format.headerMarkers.some((marker) => line.includes(marker)));
}

/**
 * Index one past the last line of the transaction block
 */
export function findBlockEnd(
  lines: string[],
  headerIndex: number,
  format: StatementFormat = bacFormat
): number {
  let dataLinesSeen = 0;

  for (let i = headerIndex + 1; i < lines.length; i++) {
    const line = lines[i];

    if (format.summaryMarkers.some((marker) => line.includes(marker))) {
      return i;
    }

    if (isBlank(line)) {
      // An early blank line is incidental; only a later one ends the block
      if (dataLinesSeen >= format.minDataLinesBeforeBlank) {
        return i;
      }
      continue;
    }

    dataLinesSeen++;
  }

  return lines.length;
}

function toRow(columns: string[], values: string[]): TransactionRow {
  const row: TransactionRow = {};
  columns.forEach((column, i) => {
    if (column === "") return;
    row[column] = values[i] ?? "";
  });
  return row;
}

/**
 * Parse decoded statement text into a transaction table
 * @throws FormatError when no transaction header line is found
 */
export function parseStatement(rawText: string, format: StatementFormat = bacFormat): StatementTable {
  const lines = normalizeStatementText(rawText).split("\n");

  const headerIndex = findHeaderIndex(lines, format);
  if (headerIndex === -1) {
    throw new FormatError();
  }

  const columns = parseCsvLine(lines[headerIndex]).map((h) => h.trim());
  const blockEnd = findBlockEnd(lines, headerIndex, format);

  const dataLines = lines
    .slice(headerIndex + 1, blockEnd)
    .filter((line) => !isBlank(line) && !startsWithAny(line, format.summaryMarkers));

  // Parsed as one text so a quoted description can span lines
  const records = dataLines.length > 0 ? parseCsvRecords(dataLines.join("\n")) : [];
  const rows = records.map((values) => toRow(columns, values));

  return { columns, rows, count: rows.length };
}
