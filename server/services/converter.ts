/**
 * Converter
 *
 * Runs a statement through the whole pipeline:
 * bytes → text → transaction table → transfer references → Monarch rows.
 */

import { decodeStatement } from "../csv/decode.js";
import { parseStatement, type StatementTable } from "../csv/statementParser.js";
import type { MappingStores, TransferScheme } from "../db/mappingQueries.js";
import { detectInterbankRefs, detectInternalRefs, findDescriptionColumn } from "./transferReferences.js";
import { transform, type OutputRow } from "./transformer.js";

export interface PreparedStatement {
  statement: StatementTable;
  internalRefs: string[];
  interbankRefs: string[];
}

/**
 * Decode and parse an upload and find the accounts it transfers to
 * @throws DecodeError | FormatError
 */
export function prepareStatement(bytes: Uint8Array): PreparedStatement {
  const statement = parseStatement(decodeStatement(bytes));
  const descriptionColumn = findDescriptionColumn(statement.columns);

  if (descriptionColumn === undefined) {
    return { statement, internalRefs: [], interbankRefs: [] };
  }

  return {
    statement,
    internalRefs: [...detectInternalRefs(statement.rows, descriptionColumn)],
    interbankRefs: [...detectInterbankRefs(statement.rows, descriptionColumn)],
  };
}

/**
 * Transform a parsed statement with the names currently saved in the stores
 * @throws SchemaError
 */
export function convertStatement(
  statement: StatementTable,
  importId: number,
  stores: MappingStores
): OutputRow[] {
  return transform(statement, importId, stores.internal.get(), stores.interbank.get());
}

/** Form field holding the friendly name typed for an account */
export function friendlyNameField(scheme: TransferScheme, account: string): string {
  return `${scheme}_${account}`;
}

function readName(fields: Record<string, unknown> | undefined, name: string): string {
  const value = fields?.[name];
  return typeof value === "string" ? value.trim() : "";
}

/**
 * Save the names submitted for a statement's detected accounts.
 * Blank fields are skipped, so they never clear a saved name.
 * Returns the number of names saved.
 */
export function saveFriendlyNames(
  accounts: Pick<PreparedStatement, "internalRefs" | "interbankRefs">,
  fields: Record<string, unknown> | undefined,
  stores: MappingStores
): number {
  const submitted: Array<[TransferScheme, string[]]> = [
    ["internal", accounts.internalRefs],
    ["interbank", accounts.interbankRefs],
  ];

  let saved = 0;
  for (const [scheme, refs] of submitted) {
    for (const account of refs) {
      const name = readName(fields, friendlyNameField(scheme, account));
      if (name) {
        stores[scheme].put(account, name);
        saved++;
      }
    }
  }
  return saved;
}
