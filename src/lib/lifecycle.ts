/**
 * Record lifecycle: create-or-update for a single sequence number.
 *
 * Each call re-derives everything from the store directory:
 * classify (does the number exist?) -> create or update -> persist ->
 * rebuild the index. Nothing is kept between calls.
 *
 * Failures before the record is written throw an AdrError and leave the
 * store untouched. After the write, the old-file cleanup of a rename and
 * the index rebuild are reported in the outcome instead of thrown, so a
 * saved record is never reported as lost.
 */

import * as path from "node:path";
import type {
  CleanupOutcome,
  IndexOutcome,
  ParsedRecord,
  RecordOutcome,
  RecordRequest,
} from "./models.js";
import { AdrError, formatCliError, toError } from "./errors.js";
import { nodeFileOps, type StoreFileOps } from "./fileops.js";
import {
  findRecordByNumber,
  parseSequenceNumber,
  recordExists,
  recordFilename,
} from "./storage.js";
import { formatDate, loadTemplate, renderTemplate } from "./template.js";
import { applyStatus, parseRecord, setTitle } from "./parsing.js";
import { rebuildIndex } from "./indexing.js";

export interface LifecycleOptions {
  /** Creation date for new records (defaults to now) */
  now?: Date;
  /** Heading of the regenerated index */
  indexTitle?: string;
  io?: StoreFileOps;
}

/**
 * Content to persist, computed before anything touches the disk.
 */
interface Draft {
  action: "created" | "updated";
  /** Sequence number as the record's filename spells it */
  number: string;
  filename: string;
  content: string;
  title: string | null;
  previousStatus: string | null;
  statusChanged: boolean;
  /** Set when an update moves the record to a new filename */
  previousFilename: string | null;
}

function draftNewRecord(
  storePath: string,
  request: RecordRequest,
  now: Date,
  io: StoreFileOps,
): Draft {
  const title = request.title?.trim() ?? "";
  if (title === "") {
    throw new AdrError(
      "MissingTitle",
      `A title is required to create record ${request.number}`,
    );
  }

  const template = loadTemplate(storePath, io);
  const content = renderTemplate(template, {
    number: request.number,
    title,
    status: request.status,
    date: formatDate(now),
  });

  return {
    action: "created",
    number: request.number,
    filename: recordFilename(request.number, title),
    content,
    title,
    previousStatus: null,
    statusChanged: true,
    previousFilename: null,
  };
}

/**
 * An existing record as found on disk.
 */
export interface ExistingRecord {
  filename: string;
  content: string;
  parsed: ParsedRecord;
}

/**
 * Locate and read the record with this number. Returns null when no file
 * carries the number.
 *
 * @throws AdrError RecordUnreadable when the file cannot be read
 */
export function inspectRecord(
  storePath: string,
  number: string,
  io: StoreFileOps = nodeFileOps,
): ExistingRecord | null {
  if (!recordExists(storePath, number, io)) return null;

  const filename = findRecordByNumber(storePath, number, io);
  if (filename === null) return null;

  const filePath = path.join(storePath, filename);
  let content: string;
  try {
    content = io.readFile(filePath);
  } catch (err) {
    throw new AdrError("RecordUnreadable", `Cannot read record ${filePath}`, { cause: err });
  }

  return { filename, content, parsed: parseRecord(content) };
}

function draftUpdate(
  request: RecordRequest,
  record: ExistingRecord,
): Draft {
  const { filename, content: existing, parsed } = record;
  const number = parseSequenceNumber(filename)?.digits ?? request.number;
  const merged = applyStatus(existing, request.status);

  let content = merged.content;
  let title = parsed.title;
  let target = filename;

  const requestedTitle = request.title?.trim() ?? "";
  if (requestedTitle !== "" && requestedTitle !== parsed.title) {
    content = setTitle(content, number, requestedTitle);
    title = requestedTitle;
    target = recordFilename(number, requestedTitle);
  }

  return {
    action: "updated",
    number,
    filename: target,
    content,
    title,
    previousStatus: merged.changed
      ? merged.previousStatus || null
      : parsed.previousStatus,
    statusChanged: merged.changed,
    previousFilename: target === filename ? null : filename,
  };
}

function removeOldFile(
  storePath: string,
  filename: string,
  io: StoreFileOps,
): CleanupOutcome {
  try {
    io.removeFile(path.join(storePath, filename));
    return { status: "removed", filename };
  } catch (err) {
    return { status: "failed", filename, error: toError(err) };
  }
}

function reindex(
  storePath: string,
  options: { title?: string; io: StoreFileOps },
): IndexOutcome {
  try {
    const listed = rebuildIndex(storePath, options);
    return { status: "rebuilt", count: listed.length };
  } catch (err) {
    return {
      status: "failed",
      error: new AdrError(
        "IndexWriteFailed",
        `Record saved, but the index could not be rebuilt: ${formatCliError(err)}`,
        { cause: err },
      ),
    };
  }
}

/**
 * Create the record if its number is unused, otherwise update it. A number
 * matches an existing record whatever its zero padding; the record keeps
 * the number as its filename spells it.
 *
 * @throws AdrError MissingArgument, MissingTitle, RecordUnreadable,
 *   StoreUnavailable or RecordWriteFailed; nothing has been written when
 *   it throws.
 */
export function applyRecord(
  storePath: string,
  input: RecordRequest,
  options: LifecycleOptions = {},
): RecordOutcome {
  const io = options.io ?? nodeFileOps;
  const now = options.now ?? new Date();

  const request: RecordRequest = { ...input, status: input.status.trim() };
  if (request.status === "") {
    throw new AdrError("MissingArgument", `A status is required for record ${request.number}`);
  }

  const existing = inspectRecord(storePath, request.number, io);
  const draft = existing
    ? draftUpdate(request, existing)
    : draftNewRecord(storePath, request, now, io);

  try {
    io.ensureDir(storePath);
  } catch (err) {
    throw new AdrError("StoreUnavailable", `Cannot create record directory ${storePath}`, {
      cause: err,
    });
  }

  const filePath = path.join(storePath, draft.filename);
  try {
    io.writeFile(filePath, draft.content);
  } catch (err) {
    throw new AdrError("RecordWriteFailed", `Cannot write record ${filePath}`, { cause: err });
  }

  const cleanup: CleanupOutcome =
    draft.previousFilename === null
      ? { status: "skipped" }
      : removeOldFile(storePath, draft.previousFilename, io);

  const index = reindex(storePath, { title: options.indexTitle, io });

  return {
    action: draft.action,
    number: draft.number,
    filename: draft.filename,
    path: filePath,
    title: draft.title,
    status: request.status,
    previousStatus: draft.previousStatus,
    statusChanged: draft.statusChanged,
    renamed: draft.previousFilename !== null,
    previousFilename: draft.previousFilename,
    cleanup,
    index,
  };
}
