/**
 * Core data models for adr-cli.
 *
 * A store is a directory of markdown decision records plus two reserved
 * files: the generated index and an optional template override.
 */

/** Prefix every record filename starts with. */
export const RECORD_PREFIX = "adr-";

/** Extension shared by records, the index and the template. */
export const RECORD_EXTENSION = ".md";

/** Generated index file (reserved, never a record). */
export const INDEX_FILE = "README.md";

/** Optional user template (reserved, never a record). */
export const TEMPLATE_FILE = "template.md";

/** Project-level configuration file. */
export const CONFIG_FILE = ".adr.toml";

/**
 * Values substituted into a template when a record is created.
 */
export interface TemplateValues {
  number: string;
  title: string;
  status: string;
  date: string;
}

/**
 * Structured view of a record's markdown content.
 */
export interface ParsedRecord {
  /** First `# ` line, verbatim */
  heading: string | null;
  /** Heading text without the `ADR <n>:` prefix */
  title: string | null;
  /** Current value of the status field, if present */
  status: string | null;
  /** Value of the previous-status field, if present */
  previousStatus: string | null;
  /** Every line of the content, in order */
  lines: string[];
}

/**
 * Input of one create-or-update invocation.
 */
export interface RecordRequest {
  /** Sequence number, already normalized (e.g., "007") */
  number: string;
  status: string;
  /** Required when the record does not exist yet */
  title?: string;
}

/**
 * Result of removing the old file after a rename.
 */
export type CleanupOutcome =
  | { status: "skipped" }
  | { status: "removed"; filename: string }
  | { status: "failed"; filename: string; error: Error };

/**
 * Result of the index rebuild that follows every successful write.
 */
export type IndexOutcome =
  | { status: "rebuilt"; count: number }
  | { status: "failed"; error: Error };

/**
 * What an invocation did to the store.
 */
export interface RecordOutcome {
  action: "created" | "updated";
  number: string;
  filename: string;
  /** Absolute or store-relative path of the written file */
  path: string;
  title: string | null;
  status: string;
  previousStatus: string | null;
  statusChanged: boolean;
  renamed: boolean;
  previousFilename: string | null;
  cleanup: CleanupOutcome;
  index: IndexOutcome;
}

/**
 * Project configuration from .adr.toml.
 */
export interface AdrConfig {
  /** Store directory, relative to the project root */
  directory?: string;
  /** Zero-padded width of sequence numbers */
  number_width?: number;
  /** Status menu offered by the interactive prompt */
  statuses?: string[];
  /** Heading of the generated index */
  index_title?: string;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: Required<AdrConfig> = {
  directory: "docs/adr",
  number_width: 3,
  statuses: ["Proposed", "Accepted", "Rejected", "Deprecated", "Superseded"],
  index_title: "Architecture Decision Records",
};

/**
 * Process exit codes.
 */
export const ExitCodes = {
  SUCCESS: 0,
  FAILURE: 1,
  USAGE_ERROR: 2,
  DATA_ERROR: 3,
  /** Record written, index rebuild failed */
  PARTIAL_FAILURE: 4,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];
