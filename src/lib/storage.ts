/**
 * Storage layer for ADR stores.
 *
 * Handles project configuration, store resolution and the record scanner:
 * listing record files, numbering, and deriving names from titles.
 * The store directory is passed explicitly to every function.
 */

import * as path from "node:path";
import * as toml from "toml";
import {
  type AdrConfig,
  CONFIG_FILE,
  DEFAULT_CONFIG,
  INDEX_FILE,
  RECORD_EXTENSION,
  RECORD_PREFIX,
  TEMPLATE_FILE,
} from "./models.js";
import { AdrError } from "./errors.js";
import { nodeFileOps, type DirEntry, type StoreFileOps } from "./fileops.js";

/**
 * Result of store resolution.
 */
export interface StoreLocation {
  /** Absolute path to the store directory (may not exist yet) */
  storePath: string;
  /** Absolute path to the project root holding .adr.toml */
  rootPath: string;
  /** Effective configuration */
  config: Required<AdrConfig>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function invalidConfig(configPath: string, detail: string): AdrError {
  return new AdrError("ConfigInvalid", `Invalid configuration in ${configPath}: ${detail}`);
}

/**
 * Load project configuration from .adr.toml, falling back to defaults
 * when the file is absent. Unknown keys are ignored.
 */
export function loadConfig(
  rootPath: string,
  io: StoreFileOps = nodeFileOps,
): Required<AdrConfig> {
  const configPath = path.join(rootPath, CONFIG_FILE);
  if (!io.exists(configPath)) {
    return { ...DEFAULT_CONFIG };
  }

  let parsed: unknown;
  try {
    parsed = toml.parse(io.readFile(configPath));
  } catch (err) {
    throw new AdrError("ConfigInvalid", `Failed to read configuration ${configPath}`, {
      cause: err,
    });
  }
  if (!isRecord(parsed)) {
    throw invalidConfig(configPath, "expected a table");
  }

  const config: Required<AdrConfig> = { ...DEFAULT_CONFIG };

  if (parsed.directory !== undefined) {
    if (typeof parsed.directory !== "string" || parsed.directory.trim() === "") {
      throw invalidConfig(configPath, "directory must be a non-empty string");
    }
    config.directory = parsed.directory;
  }

  if (parsed.number_width !== undefined) {
    const width = parsed.number_width;
    if (typeof width !== "number" || !Number.isInteger(width) || width < 1 || width > 9) {
      throw invalidConfig(configPath, "number_width must be an integer between 1 and 9");
    }
    config.number_width = width;
  }

  if (parsed.statuses !== undefined) {
    const statuses = parsed.statuses;
    if (
      !Array.isArray(statuses) ||
      statuses.length === 0 ||
      !statuses.every((s): s is string => typeof s === "string" && s.trim() !== "")
    ) {
      throw invalidConfig(configPath, "statuses must be a non-empty list of strings");
    }
    config.statuses = statuses;
  }

  if (parsed.index_title !== undefined) {
    if (typeof parsed.index_title !== "string") {
      throw invalidConfig(configPath, "index_title must be a string");
    }
    config.index_title = parsed.index_title;
  }

  return config;
}

/**
 * Serialize a configuration as .adr.toml content.
 */
export function serializeConfig(config: Required<AdrConfig>): string {
  const statuses = config.statuses.map((s) => JSON.stringify(s)).join(", ");
  return `# adr-cli configuration
directory = ${JSON.stringify(config.directory)}
number_width = ${config.number_width}
statuses = [${statuses}]
index_title = ${JSON.stringify(config.index_title)}
`;
}

/**
 * Resolve the store location from command options.
 *
 * Resolution order:
 * 1. --root (or cwd) is the project root; .adr.toml is read from there
 * 2. --dir, resolved against the root, overrides the configured directory
 */
export function resolveStore(
  options: { dir?: string; root?: string },
  io: StoreFileOps = nodeFileOps,
): StoreLocation {
  const rootPath = options.root ? path.resolve(options.root) : process.cwd();
  const config = loadConfig(rootPath, io);
  const storePath = path.resolve(rootPath, options.dir ?? config.directory);
  return { storePath, rootPath, config };
}

/**
 * Convert a title to a filename fragment: lowercase, with spaces and
 * underscores turned into hyphens. Nothing else is touched.
 */
export function slugify(title: string): string {
  return title.toLowerCase().replace(/[ _]/g, "-");
}

/**
 * Generate the filename for a record.
 * Format: adr-<number>-<slug>.md
 */
export function recordFilename(number: string, title: string): string {
  return `${RECORD_PREFIX}${number}-${slugify(title)}${RECORD_EXTENSION}`;
}

/**
 * Pad a positive integer to the given width.
 */
export function formatNumber(value: bigint | number, width: number): string {
  return value.toString().padStart(width, "0");
}

/**
 * Validate user input as a sequence number and zero-pad it. Input that is
 * already wider than `width` keeps its own width.
 */
export function normalizeNumber(input: string, width: number = DEFAULT_CONFIG.number_width): string {
  const trimmed = input.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new AdrError("InvalidNumber", `Invalid record number "${input}": expected digits`);
  }
  const significant = trimmed.replace(/^0+/, "");
  if (significant === "") {
    throw new AdrError("InvalidNumber", `Invalid record number "${input}": must be positive`);
  }
  return significant.padStart(Math.max(width, trimmed.length), "0");
}

const SEQUENCE_REGEX = /^adr-(\d+)-/;

/**
 * Parse the sequence number out of a record filename.
 * Returns null for names that do not follow the adr-<n>- convention.
 */
export function parseSequenceNumber(filename: string): { value: bigint; digits: string } | null {
  const match = SEQUENCE_REGEX.exec(filename);
  if (!match) return null;
  return { value: BigInt(match[1]), digits: match[1] };
}

/**
 * True if the file carries this sequence number, whatever its padding:
 * "adr-1-x.md", "adr-001-x.md" and "adr-0001-x.md" are all record 1.
 */
function carriesNumber(filename: string, number: string): boolean {
  if (!/^\d+$/.test(number)) return false;
  return parseSequenceNumber(filename)?.value === BigInt(number);
}

/**
 * List record filenames in the store, excluding the index, the template
 * and directories. Order is whatever the directory listing returns.
 */
export function listRecordFiles(storePath: string, io: StoreFileOps = nodeFileOps): string[] {
  let entries: DirEntry[];
  try {
    entries = io.listDir(storePath);
  } catch (err) {
    throw new AdrError("StoreUnavailable", `Cannot read record directory ${storePath}`, {
      cause: err,
    });
  }

  return entries
    .filter(
      (entry) =>
        !entry.isDirectory &&
        entry.name.endsWith(RECORD_EXTENSION) &&
        entry.name !== INDEX_FILE &&
        entry.name !== TEMPLATE_FILE,
    )
    .map((entry) => entry.name);
}

/**
 * True if a record with this number exists. A missing or unreadable store
 * counts as empty.
 */
export function recordExists(
  storePath: string,
  number: string,
  io: StoreFileOps = nodeFileOps,
): boolean {
  if (!io.exists(storePath)) return false;

  let files: string[];
  try {
    files = listRecordFiles(storePath, io);
  } catch {
    // Existence checks degrade to "not found"; the write step reports the failure.
    return false;
  }
  return files.some((f) => carriesNumber(f, number));
}

/**
 * Find the filename of the record with this number, or null.
 */
export function findRecordByNumber(
  storePath: string,
  number: string,
  io: StoreFileOps = nodeFileOps,
): string | null {
  if (!io.exists(storePath)) return null;

  const matches = listRecordFiles(storePath, io)
    .filter((f) => carriesNumber(f, number))
    .sort();
  return matches[0] ?? null;
}

/**
 * Compute the number following the highest one in use, padded to the
 * widest width found (never narrower than `width`).
 */
export function nextSequenceNumber(
  storePath: string,
  width: number = DEFAULT_CONFIG.number_width,
  io: StoreFileOps = nodeFileOps,
): string {
  if (!io.exists(storePath)) return formatNumber(1, width);

  let max = 0n;
  let widest = width;
  for (const file of listRecordFiles(storePath, io)) {
    const parsed = parseSequenceNumber(file);
    if (!parsed) continue;
    if (parsed.value > max) max = parsed.value;
    if (parsed.digits.length > widest) widest = parsed.digits.length;
  }
  return formatNumber(max + 1n, widest);
}

function capitalizeWord(word: string): string {
  if (word === "") return word;
  if (word.toLowerCase() === "adr") return "ADR";
  return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}

/**
 * Derive a display title from a record filename, for the index only.
 *
 * "adr-004-use-postgres.md" -> "Use Postgres"
 */
export function extractDisplayTitle(filename: string): string {
  const name = filename.endsWith(RECORD_EXTENSION)
    ? filename.slice(0, -RECORD_EXTENSION.length)
    : filename;

  let rest: string;
  const match = /^adr-\d+-(.*)$/.exec(name);
  if (match) {
    rest = match[1];
  } else {
    const hyphen = name.indexOf("-");
    if (hyphen === -1) return filename;
    rest = name.slice(hyphen + 1);
  }

  return rest.replace(/-/g, " ").split(" ").map(capitalizeWord).join(" ");
}
