import { Router } from "express";
import multer from "multer";
import fs from "fs";
import { describeConversionError } from "../errors.js";
import { toMonarchCsv, formatAmount } from "../csv/writer.js";
import type { MappingStores, TransferScheme } from "../db/mappingQueries.js";
import {
  convertStatement,
  friendlyNameField,
  prepareStatement,
  saveFriendlyNames,
} from "../services/converter.js";
import {
  createImportId,
  createPendingConversion,
  getPendingConversion,
  type PendingConversion,
} from "../services/pendingConversions.js";
import type { OutputRow } from "../services/transformer.js";
import {
  layout,
  renderTable,
  renderButton,
  renderLinkButton,
  renderFormField,
  renderDatalist,
  renderHomePage,
  formatCurrency,
  escapeHtml,
} from "../templates/index.js";

const PREVIEW_ROW_COUNT = 20;

const NAME_SUGGESTIONS_ID = "saved-names";

export const DOWNLOAD_FILE_NAME = "bac_formatted.csv";

export function createConvertRouter(stores: MappingStores): Router {
  const router = Router();
  const upload = multer({ dest: "uploads/" });

  // POST /convert - Handle statement upload
  router.post("/", upload.single("file"), (req, res) => {
    const file = req.file;

    if (!file) {
      res.send(renderHomePage({
        error: { message: "Please select a CSV file to upload", hint: "Choose the CSV exported from BAC." },
      }));
      return;
    }

    const bytes = fs.readFileSync(file.path);
    fs.unlinkSync(file.path);

    try {
      const prepared = prepareStatement(bytes);
      const id = createPendingConversion({
        fileName: file.originalname,
        importId: createImportId(),
        ...prepared,
      });

      console.log(
        `Parsed ${file.originalname}: ${prepared.statement.count} transactions, ` +
          `${prepared.internalRefs.length} TEF and ${prepared.interbankRefs.length} SINPE accounts`
      );
      res.redirect(`/convert/${id}`);
    } catch (error) {
      console.error(`Failed to parse ${file.originalname}:`, error);
      res.send(renderHomePage({ error: describeConversionError(error) }));
    }
  });

  // GET /convert/:id - Show friendly-name form and output preview
  router.get("/:id", (req, res) => {
    const pending = getPendingConversion(req.params.id);
    if (!pending) {
      res.status(404).send(renderExpiredPage());
      return;
    }

    try {
      const rows = convertStatement(pending.statement, pending.importId, stores);
      res.send(renderConversionPage(req.params.id, pending, rows, stores));
    } catch (error) {
      console.error(`Failed to convert ${pending.fileName}:`, error);
      res.send(renderHomePage({ error: describeConversionError(error) }));
    }
  });

  // POST /convert/:id/mappings - Save friendly names for detected accounts
  router.post("/:id/mappings", (req, res) => {
    const pending = getPendingConversion(req.params.id);
    if (!pending) {
      res.status(404).send(renderExpiredPage());
      return;
    }

    const saved = saveFriendlyNames(pending, req.body, stores);
    console.log(`Saved ${saved} friendly name(s) for ${pending.fileName}`);
    res.redirect(`/convert/${req.params.id}`);
  });

  // GET /convert/:id/download - Download the Monarch CSV
  router.get("/:id/download", (req, res) => {
    const pending = getPendingConversion(req.params.id);
    if (!pending) {
      res.status(404).send(renderExpiredPage());
      return;
    }

    try {
      const rows = convertStatement(pending.statement, pending.importId, stores);
      res.setHeader("Content-Type", "text/csv; charset=utf-8");
      res.setHeader("Content-Disposition", `attachment; filename="${DOWNLOAD_FILE_NAME}"`);
      res.send(Buffer.from(toMonarchCsv(rows), "utf-8"));
    } catch (error) {
      console.error(`Failed to convert ${pending.fileName}:`, error);
      res.send(renderHomePage({ error: describeConversionError(error) }));
    }
  });

  return router;
}

function renderExpiredPage(): string {
  const content = `
    <h1 class="text-2xl font-semibold mb-4">Conversion not found</h1>
    <p class="text-gray-500 dark:text-gray-400 mb-6">
      Uploaded statements are kept for 30 minutes. Upload the file again to continue.
    </p>
    ${renderLinkButton({ label: "Upload Statement", href: "/", variant: "proceed" })}
  `;
  return layout({ title: "Conversion not found", content });
}

function renderNameFields(
  scheme: TransferScheme,
  accounts: string[],
  saved: Map<string, string>
): string {
  const label = scheme === "internal" ? "BAC" : "SINPE";
  return accounts
    .map((account) =>
      renderFormField({
        name: friendlyNameField(scheme, account),
        label: `${label} ${account}`,
        value: saved.get(account) ?? "",
        placeholder: "e.g., Mom",
        hint: saved.has(account) ? undefined : "No name saved yet",
        list: NAME_SUGGESTIONS_ID,
      })
    )
    .join("");
}

function renderConversionPage(
  id: string,
  pending: PendingConversion,
  rows: OutputRow[],
  stores: MappingStores
): string {
  const internalNames = stores.internal.get();
  const interbankNames = stores.interbank.get();
  const dropped = pending.statement.count - rows.length;
  const total = rows.reduce((sum, row) => sum + row.amount, 0);
  const hasRefs = pending.internalRefs.length + pending.interbankRefs.length > 0;

  const droppedHtml = dropped > 0
    ? `<p class="text-sm text-amber-600 dark:text-amber-400">${dropped} row(s) skipped: invalid date or empty description.</p>`
    : "";

  const namesForm = hasRefs
    ? `
      <h2 class="text-lg font-semibold mb-2">Transfer Accounts</h2>
      <p class="text-sm text-gray-500 dark:text-gray-400 mb-4">
        Name the accounts this statement transfers to. Names are saved for future statements.
      </p>
      <form method="POST" action="/convert/${escapeHtml(id)}/mappings" class="space-y-4 mb-10">
        ${renderNameFields("internal", pending.internalRefs, internalNames)}
        ${renderNameFields("interbank", pending.interbankRefs, interbankNames)}
        ${renderDatalist(NAME_SUGGESTIONS_ID, [...new Set([...internalNames.values(), ...interbankNames.values()])])}
        ${renderButton({ label: "Save Names", type: "submit" })}
      </form>
    `
    : "";

  const tableHtml = renderTable<OutputRow>({
    columns: [
      { key: "date", label: "Date" },
      { key: "merchant", label: "Merchant" },
      { key: "notes", label: "Notes" },
      {
        key: "amount",
        label: "Amount",
        numeric: true,
        render: (_value, row) => (row.amount < 0
          ? `<span class="text-red-600 dark:text-red-400">${formatAmount(row.amount)}</span>`
          : formatAmount(row.amount)),
      },
    ],
    rows: rows.slice(0, PREVIEW_ROW_COUNT),
    emptyMessage: "No transactions to export.",
  });

  const content = `
    <h1 class="text-2xl font-semibold mb-2">${escapeHtml(pending.fileName)}</h1>
    <div class="mb-8 space-y-1">
      <p class="text-sm text-gray-500 dark:text-gray-400">
        ${pending.statement.count} transactions read, ${rows.length} ready for Monarch. Net amount: ${formatCurrency(total)}
      </p>
      ${droppedHtml}
    </div>
    ${namesForm}
    <h2 class="text-lg font-semibold mb-4">Preview</h2>
    ${tableHtml}
    ${rows.length > PREVIEW_ROW_COUNT ? `<p class="mt-2 text-sm text-gray-400">Showing first ${PREVIEW_ROW_COUNT} of ${rows.length} rows.</p>` : ""}
    <div class="mt-8 flex items-center gap-3 justify-between">
      ${renderLinkButton({ label: "Convert Another", href: "/" })}
      ${renderLinkButton({
        label: "Download CSV",
        href: `/convert/${id}/download`,
        variant: "proceed",
        disabled: rows.length === 0,
      })}
    </div>
  `;

  return layout({ title: pending.fileName, content, activePath: "/" });
}
