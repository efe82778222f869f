/**
 * adr-cli - Architecture Decision Record store.
 *
 * This is the library entry point for programmatic usage.
 * For CLI usage, see cli.ts.
 */

// Re-export models
export * from "./lib/models.js";

// Re-export errors
export { AdrError, isAdrError, formatCliError, exitCodeFor } from "./lib/errors.js";
export type { AdrErrorKind } from "./lib/errors.js";

// Re-export file operations
export { nodeFileOps } from "./lib/fileops.js";
export type { StoreFileOps, DirEntry } from "./lib/fileops.js";

// Re-export storage functions
export {
  loadConfig,
  serializeConfig,
  resolveStore,
  slugify,
  recordFilename,
  formatNumber,
  normalizeNumber,
  parseSequenceNumber,
  listRecordFiles,
  recordExists,
  findRecordByNumber,
  nextSequenceNumber,
  extractDisplayTitle,
} from "./lib/storage.js";
export type { StoreLocation } from "./lib/storage.js";

// Re-export templates
export {
  renderTemplate,
  loadTemplate,
  loadDefaultTemplate,
  formatDate,
  DEFAULT_TEMPLATE_PATH,
} from "./lib/template.js";

// Re-export parsing utilities
export {
  parseRecord,
  applyStatus,
  setTitle,
  headingTitle,
  STATUS_MARKER,
  PREVIOUS_STATUS_MARKER,
  HEADING_MARKER,
} from "./lib/parsing.js";
export type { StatusMergeResult } from "./lib/parsing.js";

// Re-export indexing functions
export { renderIndex, rebuildIndex, getIndexPath } from "./lib/indexing.js";

// Re-export lifecycle
export { applyRecord, inspectRecord } from "./lib/lifecycle.js";
export type { LifecycleOptions, ExistingRecord } from "./lib/lifecycle.js";
