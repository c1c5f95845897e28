/**
 * Home page template: statement upload form
 */

import { layout } from "./layout.js";
import { renderButton } from "./button.js";
import { escapeHtml } from "./table.js";

export interface HomePageOptions {
  /** Error from the previous upload attempt */
  error?: { message: string; hint: string };
}

export function renderHomePage({ error }: HomePageOptions = {}): string {
  const errorHtml = error
    ? `<div class="px-4 py-3 mb-6 text-sm rounded-lg bg-red-50 text-red-700 border border-red-200 dark:bg-red-900/30 dark:text-red-400 dark:border-red-800">
        <p class="font-medium">${escapeHtml(error.message)}</p>
        <p class="mt-1">${escapeHtml(error.hint)}</p>
      </div>`
    : "";

  const inputClasses = "w-full px-4 py-2 text-base border border-gray-200 dark:border-gray-700 rounded-lg bg-white dark:bg-gray-800 text-gray-900 dark:text-gray-100 focus:outline-none focus:ring-2 focus:ring-gray-200 dark:focus:ring-gray-700 transition-colors";

  const content = `
    <div class="text-center mb-10">
      <h1 class="text-4xl font-semibold text-gray-900 dark:text-gray-100 mb-3">Conversor BAC a Monarch</h1>
      <p class="text-lg text-gray-500 dark:text-gray-400">
        Upload a BAC statement CSV and download it in Monarch Money's import format.
      </p>
    </div>
    ${errorHtml}
    <form method="POST" action="/convert" enctype="multipart/form-data" class="space-y-4">
      <div class="flex flex-col gap-1">
        <label class="text-sm font-medium text-gray-500 dark:text-gray-400" for="file">BAC CSV File</label>
        <input class="${inputClasses}" type="file" id="file" name="file" accept=".csv" required>
      </div>
      <div class="pt-4">
        ${renderButton({ label: "Upload & Convert", variant: "proceed", type: "submit" })}
      </div>
    </form>
  `;

  return layout({
    title: "Convert",
    content,
    activePath: "/",
  });
}
