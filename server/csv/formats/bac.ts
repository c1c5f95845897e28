/**
 * BAC Costa Rica Account Statement Format
 *
 * BAC CSV exports have:
 * - A few lines of account details at the top (count varies by export)
 * - Header row: Fecha de Transacción,Referencia,...,Descripción de Transacción,Débito de Transacción,Crédito de Transacción,...
 * - Transaction rows
 * - A summary block ("Resumen de Estado Bancario", opening/closing balances)
 *
 * Date format: DD/MM/YYYY
 * Amounts: unsigned, separate debit and credit columns, may have commas
 * Encoding: usually windows-1252, sometimes UTF-8; a mis-decoded file shows
 * "TransacciÃ³n" or a replacement character instead of "ó"
 */

import type { StatementFormat } from "../statementFormat.js";

export const bacFormat: StatementFormat = {
  headerMarkers: ["Fecha de Transacción", "Fecha de Transaccion"],

  summaryMarkers: ["Resumen de Estado Bancario", "Saldo Inicial"],

  minDataLinesBeforeBlank: 10,

  columnAliases: {
    Date: [
      "Fecha de Transacción",
      "Fecha de Transaccion",
      "Fecha de TransacciÃ³n",
      "Fecha de Transacci\uFFFDn",
    ],
    Merchant: [
      "Descripción de Transacción",
      "Descripcion de Transaccion",
      "DescripciÃ³n de TransacciÃ³n",
      "Descripci\uFFFDn de Transacci\uFFFDn",
    ],
    Debit: [
      "Débito de Transacción",
      "Debito de Transaccion",
      "DÃ©bito de TransacciÃ³n",
      "D\uFFFDbito de Transacci\uFFFDn",
    ],
    Credit: [
      "Crédito de Transacción",
      "Credito de Transaccion",
      "CrÃ©dito de TransacciÃ³n",
      "Cr\uFFFDdito de Transacci\uFFFDn",
    ],
  },

  accountLabel: "BAC",
};
