/**
 * Parsing and rewriting of the structured fields inside a record.
 *
 * Records are plain markdown. Three kinds of lines carry meaning:
 * - the heading, the first line starting with `# `
 * - the status field, a line starting with `**Status**:`
 * - the previous-status field, a line starting with `**Previous Status**:`
 * Every other line is opaque and kept verbatim.
 */

import type { ParsedRecord } from "./models.js";

export const HEADING_MARKER = "# ";
export const STATUS_MARKER = "**Status**:";
export const PREVIOUS_STATUS_MARKER = "**Previous Status**:";

const HEADING_TITLE_REGEX = /^#\s+(?:ADR\s+\d+\s*:\s*)?(.*)$/i;
const HEADING_PREFIX_REGEX = /^(#\s+ADR\s+\d+\s*:\s*)/i;
const HARD_BREAK_REGEX = /\s{2,}$/;

/**
 * A line of content with its own terminator ("" for the last line).
 */
interface Line {
  text: string;
  eol: string;
}

function splitLines(content: string): Line[] {
  const parts = content.split(/(\r?\n)/);
  const lines: Line[] = [];
  for (let i = 0; i < parts.length; i += 2) {
    lines.push({ text: parts[i], eol: i + 1 < parts.length ? parts[i + 1] : "" });
  }
  return lines;
}

function joinLines(lines: readonly Line[]): string {
  return lines.map((line) => line.text + line.eol).join("");
}

/**
 * Terminator for lines added to the content: the first one the content uses.
 */
function defaultEol(lines: readonly Line[]): string {
  return lines.find((line) => line.eol !== "")?.eol ?? "\n";
}

function fieldValue(line: string, marker: string): string {
  return line.slice(marker.length).trim();
}

function isHeading(line: string): boolean {
  return line.startsWith(HEADING_MARKER);
}

function isStatusLine(line: string): boolean {
  return line.startsWith(STATUS_MARKER);
}

function isPreviousStatusLine(line: string): boolean {
  return line.startsWith(PREVIOUS_STATUS_MARKER);
}

/**
 * Extract the title text from a heading line, dropping an `ADR <n>:` prefix.
 */
export function headingTitle(heading: string): string {
  const match = HEADING_TITLE_REGEX.exec(heading);
  return match ? match[1].trim() : heading.slice(HEADING_MARKER.length).trim();
}

/**
 * Parse the structured fields out of record content.
 */
export function parseRecord(content: string): ParsedRecord {
  const lines = splitLines(content).map((line) => line.text);

  const heading = lines.find(isHeading) ?? null;
  const statusLine = lines.find(isStatusLine);
  const previousLine = lines.find(isPreviousStatusLine);

  return {
    heading,
    title: heading === null ? null : headingTitle(heading),
    status: statusLine === undefined ? null : fieldValue(statusLine, STATUS_MARKER),
    previousStatus:
      previousLine === undefined ? null : fieldValue(previousLine, PREVIOUS_STATUS_MARKER),
    lines,
  };
}

/**
 * Result of a status rewrite.
 */
export interface StatusMergeResult {
  content: string;
  /** False when the requested status was already current */
  changed: boolean;
  /** Status before the rewrite ("" when the record had none) */
  previousStatus: string;
}

/**
 * Set the record's status, moving the old value to the previous-status field.
 *
 * Applying the status that is already current returns the content unchanged.
 * Otherwise every status and previous-status line is removed and exactly one
 * of each is inserted where the first status line was (after the heading, or
 * at the top, when there was none). The previous-status line is omitted when
 * the old status was empty.
 */
export function applyStatus(content: string, status: string): StatusMergeResult {
  const lines = splitLines(content);
  const fallbackEol = defaultEol(lines);

  const firstStatus = lines.findIndex((line) => isStatusLine(line.text));
  const anchor = firstStatus === -1 ? null : lines[firstStatus];
  const current = anchor === null ? "" : fieldValue(anchor.text, STATUS_MARKER);

  if (status === current) {
    return { content, changed: false, previousStatus: current };
  }

  const suffix = anchor !== null && HARD_BREAK_REGEX.test(anchor.text) ? "  " : "";
  const inserted = [`${STATUS_MARKER} ${status}${suffix}`];
  if (current !== "") {
    inserted.push(`${PREVIOUS_STATUS_MARKER} ${current}${suffix}`);
  }
  const block = (eol: string): Line[] => inserted.map((text) => ({ text, eol }));

  const result: Line[] = [];
  for (const line of lines) {
    if (line === anchor) {
      result.push(...block(line.eol || fallbackEol));
    } else if (!isStatusLine(line.text) && !isPreviousStatusLine(line.text)) {
      result.push({ ...line });
    }
  }

  if (anchor === null) {
    const headingIndex = result.findIndex((line) => isHeading(line.text));
    if (headingIndex === -1) {
      result.unshift(...block(fallbackEol));
    } else {
      const heading = result[headingIndex];
      heading.eol = heading.eol || fallbackEol;
      result.splice(headingIndex + 1, 0, ...block(heading.eol));
    }
  }

  // The last line never gains a terminator the content did not end with.
  result[result.length - 1].eol = "";

  return { content: joinLines(result), changed: true, previousStatus: current };
}

/**
 * Replace the title in the heading line, keeping an `ADR <n>:` prefix.
 * Content without a heading gets `# ADR <number>: <title>` as its first line.
 */
export function setTitle(content: string, number: string, title: string): string {
  const lines = splitLines(content);
  const headingIndex = lines.findIndex((line) => isHeading(line.text));

  if (headingIndex === -1) {
    return joinLines([{ text: `# ADR ${number}: ${title}`, eol: defaultEol(lines) }, ...lines]);
  }

  const heading = lines[headingIndex];
  const prefixMatch = HEADING_PREFIX_REGEX.exec(heading.text);
  heading.text = prefixMatch ? `${prefixMatch[1]}${title}` : `# ${title}`;
  return joinLines(lines);
}
