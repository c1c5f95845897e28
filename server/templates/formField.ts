/**
 * Text input with label, hint and optional suggestions
 */

import { escapeHtml } from "./table.js";

export interface FormFieldOptions {
  /** Field name and id */
  name: string;
  label: string;
  value?: string;
  placeholder?: string;
  /** Helper text displayed below input */
  hint?: string;
  /** Id of a <datalist> offering suggestions */
  list?: string;
}

export function renderFormField({
  name,
  label,
  value = "",
  placeholder = "",
  hint,
  list,
}: FormFieldOptions): string {
  const listAttr = list ? ` list="${escapeHtml(list)}"` : "";

  return `
    <div class="space-y-1">
      <label for="${escapeHtml(name)}" class="block text-sm font-medium text-gray-700 dark:text-gray-300 font-mono">
        ${escapeHtml(label)}
      </label>
      <input
        type="text"
        id="${escapeHtml(name)}"
        name="${escapeHtml(name)}"
        value="${escapeHtml(value)}"
        placeholder="${escapeHtml(placeholder)}"
        autocomplete="off"${listAttr}
        class="w-full px-3 py-2 rounded-lg border border-gray-200 dark:border-gray-700 focus:ring-gray-300 bg-white dark:bg-gray-800
               text-gray-900 dark:text-gray-100 focus:outline-none focus:ring-2"
      />
      ${hint ? `<p class="text-sm text-gray-500 dark:text-gray-400">${escapeHtml(hint)}</p>` : ""}
    </div>
  `;
}

/**
 * Render a <datalist> of values for inputs to suggest
 */
export function renderDatalist(id: string, values: string[]): string {
  const options = values.map((value) => `<option value="${escapeHtml(value)}"></option>`).join("");
  return `<datalist id="${escapeHtml(id)}">${options}</datalist>`;
}
