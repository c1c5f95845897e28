/**
 * Transfer References
 *
 * BAC descriptions embed the destination account of a transfer:
 *
 *   Internal (BAC to BAC):   "TEF A : 12345678"
 *   Interbank (SINPE):       "CD SINPE A 88887777 ALQUILER", "PIN-SINPE A:88887777"
 *
 * Detection collects the account numbers so the user can name them; rewriting
 * swaps each mapped reference for "<name> - BAC:<account>" or
 * "<name> - SINPE:<account>".
 */

import type { TransactionRow } from "../csv/statementParser.js";
import { bacFormat } from "../csv/formats/bac.js";

/** Account number → friendly name */
export type AccountMapping = ReadonlyMap<string, string>;

export const INTERNAL_REFERENCE_PATTERN = /TEF\s+A\s*:\s*(\d+)/g;

export const INTERBANK_PREFIXES = ["CD SINPE A ", "PIN-SINPE A:"];

/**
 * Find the description column among the known spellings, first match wins
 */
export function findDescriptionColumn(
  columns: string[],
  spellings: string[] = bacFormat.columnAliases.Merchant
): string | undefined {
  return spellings.find((spelling) => columns.includes(spelling));
}

function resolveDescriptionColumn(rows: TransactionRow[], descriptionColumn?: string): string | undefined {
  if (descriptionColumn !== undefined) {
    return descriptionColumn;
  }
  return findDescriptionColumn(Object.keys(rows[0] ?? {}));
}

/**
 * Collect every account number referenced by an internal transfer
 */
export function detectInternalRefs(rows: TransactionRow[], descriptionColumn?: string): Set<string> {
  const refs = new Set<string>();
  const column = resolveDescriptionColumn(rows, descriptionColumn);
  if (column === undefined) return refs;

  for (const row of rows) {
    const description = row[column] ?? "";
    for (const match of description.matchAll(INTERNAL_REFERENCE_PATTERN)) {
      refs.add(match[1]);
    }
  }

  return refs;
}

/**
 * Collect every account number referenced by a SINPE transfer.
 * Only descriptions that start with a SINPE prefix count.
 */
export function detectInterbankRefs(rows: TransactionRow[], descriptionColumn?: string): Set<string> {
  const refs = new Set<string>();
  const column = resolveDescriptionColumn(rows, descriptionColumn);
  if (column === undefined) return refs;

  for (const row of rows) {
    const description = row[column] ?? "";
    const prefix = INTERBANK_PREFIXES.find((p) => description.startsWith(p));
    if (!prefix) continue;

    const account = description.slice(prefix.length).split(" ")[0];
    if (account) {
      refs.add(account);
    }
  }

  return refs;
}

function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Rewrite internal transfer references that have a friendly name
 */
export function rewriteInternalRefs(description: string, mapping: AccountMapping): string {
  if (mapping.size === 0) return description;

  return description.replace(INTERNAL_REFERENCE_PATTERN, (match: string, account: string) => {
    const name = mapping.get(account);
    return name === undefined ? match : `${name} - BAC:${account}`;
  });
}

/**
 * Rewrite SINPE references that have a friendly name.
 * The account must end at a space or the end of the text, so a short account
 * never rewrites the start of a longer one.
 */
export function rewriteInterbankRefs(description: string, mapping: AccountMapping): string {
  let result = description;
  const prefixes = INTERBANK_PREFIXES.map((p) => escapeRegex(p)).join("|");

  for (const [account, name] of mapping) {
    const pattern = new RegExp(`(?:${prefixes})${escapeRegex(account)}(?= |$)`, "g");
    result = result.replace(pattern, () => `${name} - SINPE:${account}`);
  }

  return result;
}

/**
 * Return a copy of the rows with transfer references rewritten in the
 * description column. Internal references go first, then SINPE.
 */
export function applyMappings(
  rows: TransactionRow[],
  internalMap: AccountMapping,
  interbankMap: AccountMapping,
  descriptionColumn?: string
): TransactionRow[] {
  const column = resolveDescriptionColumn(rows, descriptionColumn);

  return rows.map((row) => {
    if (column === undefined || row[column] === undefined) {
      return { ...row };
    }
    const internal = rewriteInternalRefs(row[column], internalMap);
    return { ...row, [column]: rewriteInterbankRefs(internal, interbankMap) };
  });
}
