/**
 * Page shell shared by every screen: header with the two sections of the app
 * (converting a statement, managing saved names) and a privacy footer.
 */

import { escapeHtml } from "./table.js";

export const APP_NAME = "BAC → Monarch";

export interface LayoutOptions {
  title: string;
  content: string;
  /** Section to highlight in the header */
  activePath?: "/" | "/mappings";
}

const sections = [
  { label: "Convert", href: "/", description: "Statement to Monarch CSV" },
  { label: "Saved Names", href: "/mappings", description: "Transfer account names" },
] as const;

function renderHeader(activePath: LayoutOptions["activePath"]): string {
  const links = sections
    .map((section) => {
      const isActive = section.href === activePath;
      const stateClasses = isActive
        ? "border-emerald-600 text-gray-900 dark:text-gray-100"
        : "border-transparent text-gray-500 hover:text-gray-900 dark:text-gray-400 dark:hover:text-gray-100";
      return `
        <a href="${section.href}" title="${section.description}"${isActive ? ' aria-current="page"' : ""}
           class="px-3 py-2 text-sm font-medium border-b-2 ${stateClasses}">${section.label}</a>`;
    })
    .join("");

  return `
    <header class="flex items-end justify-between border-b border-gray-200 dark:border-gray-800 mb-8">
      <a href="/" class="pb-2 text-lg font-semibold tracking-tight">${APP_NAME}</a>
      <nav class="flex gap-2">${links}</nav>
    </header>
  `;
}

export function layout({ title, content, activePath }: LayoutOptions): string {
  return `<!DOCTYPE html>
<html lang="es">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>${escapeHtml(title)} - ${APP_NAME}</title>
  <script src="https://cdn.tailwindcss.com"></script>
</head>
<body class="bg-gray-50 dark:bg-gray-950 text-gray-900 dark:text-gray-100 font-sans antialiased">
  <div class="max-w-4xl mx-auto px-4 py-8">
    ${renderHeader(activePath)}
    <main>${content}</main>
    <footer class="mt-16 text-center text-xs text-gray-400 dark:text-gray-600">
      Statements are converted on this machine. Only friendly names are saved.
    </footer>
  </div>
</body>
</html>`;
}
