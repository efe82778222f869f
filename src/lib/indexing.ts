/**
 * Index generation for ADR stores.
 *
 * README.md is a derived view: it is always regenerated in full from the
 * records currently on disk, never patched. A stale index heals itself on
 * the next rebuild.
 */

import * as path from "node:path";
import { DEFAULT_CONFIG, INDEX_FILE } from "./models.js";
import { AdrError } from "./errors.js";
import { nodeFileOps, type StoreFileOps } from "./fileops.js";
import { extractDisplayTitle, listRecordFiles } from "./storage.js";

/**
 * Get the path to the index file.
 */
export function getIndexPath(storePath: string): string {
  return path.join(storePath, INDEX_FILE);
}

/**
 * Render index content for a set of record filenames.
 * Entries are sorted by filename, which is numeric order for padded numbers.
 */
export function renderIndex(
  filenames: readonly string[],
  title: string = DEFAULT_CONFIG.index_title,
): string {
  const sorted = [...filenames].sort();
  let content = `# ${title}\n\n`;
  for (const filename of sorted) {
    content += `- [${extractDisplayTitle(filename)}](${filename})\n`;
  }
  return content;
}

/**
 * Regenerate README.md from the records in the store.
 * Returns the record filenames that were listed, sorted.
 */
export function rebuildIndex(
  storePath: string,
  options: { title?: string; io?: StoreFileOps } = {},
): string[] {
  const io = options.io ?? nodeFileOps;
  const filenames = listRecordFiles(storePath, io).sort();
  const indexPath = getIndexPath(storePath);

  try {
    io.writeFile(indexPath, renderIndex(filenames, options.title));
  } catch (err) {
    throw new AdrError("StoreUnavailable", `Cannot write index ${indexPath}`, { cause: err });
  }

  return filenames;
}
