/**
 * Record templates: loading the store override or the built-in default,
 * and placeholder substitution.
 */

import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { TEMPLATE_FILE, type TemplateValues } from "./models.js";
import { AdrError } from "./errors.js";
import { nodeFileOps, type StoreFileOps } from "./fileops.js";

/** Built-in template shipped with the package. */
export const DEFAULT_TEMPLATE_PATH = fileURLToPath(
  new URL("../../templates/adr.md", import.meta.url),
);

const PLACEHOLDER_REGEX = /\{\{(number|title|status|date)\}\}/g;

/**
 * Replace `{{number}}`, `{{title}}`, `{{status}}` and `{{date}}` in one pass.
 * Substituted values are not scanned again; other `{{...}}` tokens are left
 * as they are.
 */
export function renderTemplate(template: string, values: TemplateValues): string {
  return template.replace(
    PLACEHOLDER_REGEX,
    (_match, key: keyof TemplateValues) => values[key],
  );
}

/**
 * Read the built-in default template.
 */
export function loadDefaultTemplate(io: StoreFileOps = nodeFileOps): string {
  return io.readFile(DEFAULT_TEMPLATE_PATH);
}

/**
 * Load the store's template.md, or the built-in default when the store has
 * none.
 */
export function loadTemplate(storePath: string, io: StoreFileOps = nodeFileOps): string {
  const overridePath = path.join(storePath, TEMPLATE_FILE);
  if (!io.exists(overridePath)) {
    return loadDefaultTemplate(io);
  }

  try {
    return io.readFile(overridePath);
  } catch (err) {
    throw new AdrError("StoreUnavailable", `Cannot read template ${overridePath}`, {
      cause: err,
    });
  }
}

/**
 * Format a date as YYYY-MM-DD in local time.
 */
export function formatDate(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  return `${year}-${month}-${day}`;
}
