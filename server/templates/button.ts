/**
 * Button styles shared by <button> and <a> elements
 *
 * Variants: normal (default), danger (red, for deleting saved names),
 * proceed (green, for upload and download)
 */

import { escapeHtml } from "./table.js";

export type ButtonVariant = "normal" | "danger" | "proceed";

export interface ButtonOptions {
  label: string;
  variant?: ButtonVariant;
}

export interface ButtonElementOptions extends ButtonOptions {
  type?: "button" | "submit";
}

export interface LinkButtonOptions extends ButtonOptions {
  href: string;
  /** Render as inert text, e.g. a download with no rows */
  disabled?: boolean;
}

const baseClasses = "inline-flex items-center justify-center px-4 py-2 text-sm font-medium rounded-lg border transition-colors focus:outline-none focus:ring-2 focus:ring-offset-2 dark:focus:ring-offset-gray-900";

const variantClasses: Record<ButtonVariant, { enabled: string; disabled: string }> = {
  normal: {
    enabled: "bg-white text-gray-700 border-gray-200 hover:bg-gray-50 hover:border-gray-300 focus:ring-gray-300 dark:bg-gray-800 dark:text-gray-300 dark:border-gray-700 dark:hover:bg-gray-700",
    disabled: "bg-gray-100 text-gray-400 border-gray-200 cursor-not-allowed dark:bg-gray-800 dark:text-gray-500 dark:border-gray-700",
  },
  danger: {
    enabled: "bg-white text-red-600 border-red-200 hover:bg-red-50 hover:border-red-300 focus:ring-red-300 dark:bg-gray-800 dark:text-red-400 dark:border-red-800 dark:hover:bg-red-900/20",
    disabled: "bg-gray-100 text-red-300 border-red-100 cursor-not-allowed dark:bg-gray-800 dark:text-red-800 dark:border-red-900",
  },
  proceed: {
    enabled: "bg-green-600 text-white border-green-600 hover:bg-green-700 hover:border-green-700 focus:ring-green-300",
    disabled: "bg-green-300 text-white border-green-300 cursor-not-allowed dark:bg-green-900 dark:text-green-700 dark:border-green-900",
  },
};

function buttonClasses(variant: ButtonVariant, disabled: boolean): string {
  const style = variantClasses[variant];
  return `${baseClasses} ${disabled ? style.disabled : style.enabled}`;
}

export function renderButton({ label, variant = "normal", type = "button" }: ButtonElementOptions): string {
  return `<button class="${buttonClasses(variant, false)}" type="${type}">${escapeHtml(label)}</button>`;
}

/**
 * Render an <a> styled as a button. Disabled links become a <span> so they
 * cannot be followed.
 */
export function renderLinkButton({ label, href, variant = "normal", disabled = false }: LinkButtonOptions): string {
  const classes = buttonClasses(variant, disabled);
  if (disabled) {
    return `<span class="${classes}" aria-disabled="true">${escapeHtml(label)}</span>`;
  }
  return `<a class="${classes}" href="${escapeHtml(href)}">${escapeHtml(label)}</a>`;
}
