/**
 * Template exports
 *
 * Usage:
 *   import { layout, renderTable, renderButton, renderLinkButton } from "../templates/index.js";
 */

export { layout } from "./layout.js";
export type { LayoutOptions } from "./layout.js";

export { renderTable, formatCurrency, escapeHtml } from "./table.js";
export type { TableColumn, TableOptions } from "./table.js";

export { renderButton, renderLinkButton } from "./button.js";
export type { ButtonVariant, ButtonOptions, ButtonElementOptions, LinkButtonOptions } from "./button.js";

export { renderFormField, renderDatalist } from "./formField.js";
export type { FormFieldOptions } from "./formField.js";

export { renderHomePage } from "./home.js";
export type { HomePageOptions } from "./home.js";
