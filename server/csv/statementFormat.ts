/**
 * Statement Format
 *
 * Describes how a bank's multi-section CSV export is laid out: which line
 * starts the transaction block, which lines end it, and the spellings each
 * column goes by across exports.
 */

/** Canonical column names every export is resolved to */
export const CANONICAL_COLUMNS = ["Date", "Merchant", "Debit", "Credit"] as const;

export type CanonicalColumn = (typeof CANONICAL_COLUMNS)[number];

/** Known spellings per canonical column, in probe order */
export type ColumnAliases = Record<CanonicalColumn, string[]>;

export interface StatementFormat {
  /** Substrings that identify the transaction header line */
  headerMarkers: string[];
  /** Substrings that identify the summary section after the transactions */
  summaryMarkers: string[];
  /**
   * Data lines that must be seen before a blank line ends the
   * transaction block
   */
  minDataLinesBeforeBlank: number;
  columnAliases: ColumnAliases;
  /** Value written to the Account column of every output row */
  accountLabel: string;
}
