import { Router } from "express";
import {
  isTransferScheme,
  type AccountMappingRecord,
  type MappingStores,
  type TransferScheme,
} from "../db/mappingQueries.js";
import { layout, renderTable, renderButton, escapeHtml } from "../templates/index.js";

const SCHEME_TITLES: Record<TransferScheme, string> = {
  internal: "BAC Transfers (TEF)",
  interbank: "SINPE Transfers",
};

export function createMappingsRouter(stores: MappingStores): Router {
  const router = Router();

  // GET /mappings - List saved friendly names
  router.get("/", (_req, res) => {
    res.send(renderMappingsPage(stores.internal.list(), stores.interbank.list()));
  });

  // POST /mappings/:scheme/:account/delete - Forget a friendly name
  router.post("/:scheme/:account/delete", (req, res) => {
    const { scheme, account } = req.params;
    if (!isTransferScheme(scheme)) {
      res.status(404).send("Unknown transfer type");
      return;
    }

    stores[scheme].delete(account);
    console.log(`Deleted ${scheme} mapping for ${account}`);
    res.redirect("/mappings");
  });

  return router;
}

function renderSchemeTable(scheme: TransferScheme, records: AccountMappingRecord[]): string {
  const tableHtml = renderTable<AccountMappingRecord>({
    columns: [
      { key: "account_number", label: "Account", render: (value) => `<span class="font-mono">${escapeHtml(String(value))}</span>` },
      { key: "friendly_name", label: "Name" },
      { key: "last_used", label: "Last Used" },
      {
        key: "account_number",
        label: "",
        align: "right",
        render: (_value, record) => `
          <form method="POST" action="/mappings/${scheme}/${encodeURIComponent(record.account_number)}/delete"
                onsubmit="return confirm('Forget this name?')">
            ${renderButton({ label: "Delete", variant: "danger", type: "submit" })}
          </form>
        `,
      },
    ],
    rows: records,
    emptyMessage: "No saved names yet.",
    emptyLink: { href: "/", label: "Convert a statement" },
  });

  return `
    <section class="mb-10">
      <h2 class="text-lg font-semibold mb-4">${escapeHtml(SCHEME_TITLES[scheme])}</h2>
      ${tableHtml}
    </section>
  `;
}

function renderMappingsPage(internal: AccountMappingRecord[], interbank: AccountMappingRecord[]): string {
  const content = `
    <h1 class="text-2xl font-semibold mb-2">Saved Names</h1>
    <p class="text-gray-500 dark:text-gray-400 mb-8">
      Friendly names replace account numbers in transfer descriptions.
    </p>
    ${renderSchemeTable("internal", internal)}
    ${renderSchemeTable("interbank", interbank)}
  `;

  return layout({ title: "Saved Names", content, activePath: "/mappings" });
}
