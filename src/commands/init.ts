/**
 * adr init - Set up a record store.
 *
 * Creates the store directory, writes .adr.toml at the project root when
 * missing, and builds an empty index. With --template the built-in template
 * is copied into the store for editing.
 */

import { Command } from "commander";
import * as path from "node:path";
import { CONFIG_FILE, ExitCodes, TEMPLATE_FILE } from "../lib/models.js";
import { AdrError } from "../lib/errors.js";
import { nodeFileOps, type StoreFileOps } from "../lib/fileops.js";
import { resolveStore, serializeConfig, type StoreLocation } from "../lib/storage.js";
import { loadDefaultTemplate } from "../lib/template.js";
import { rebuildIndex } from "../lib/indexing.js";
import { createReporter, exitWithError, readGlobalOptions } from "../lib/output.js";

export interface InitResult {
  configCreated: boolean;
  templateCreated: boolean;
  records: number;
}

/**
 * Initialize the store. Existing configuration, template and records are
 * left as they are.
 */
export function initStore(
  store: StoreLocation,
  options: { template?: boolean } = {},
  io: StoreFileOps = nodeFileOps,
): InitResult {
  try {
    io.ensureDir(store.storePath);
  } catch (err) {
    throw new AdrError("StoreUnavailable", `Cannot create record directory ${store.storePath}`, {
      cause: err,
    });
  }

  const configPath = path.join(store.rootPath, CONFIG_FILE);
  let configCreated = false;
  if (!io.exists(configPath)) {
    const directory = path.relative(store.rootPath, store.storePath) || ".";
    try {
      io.writeFile(configPath, serializeConfig({ ...store.config, directory }));
    } catch (err) {
      throw new AdrError("StoreUnavailable", `Cannot write configuration ${configPath}`, {
        cause: err,
      });
    }
    configCreated = true;
  }

  const templatePath = path.join(store.storePath, TEMPLATE_FILE);
  let templateCreated = false;
  if (options.template && !io.exists(templatePath)) {
    try {
      io.writeFile(templatePath, loadDefaultTemplate(io));
    } catch (err) {
      throw new AdrError("StoreUnavailable", `Cannot write template ${templatePath}`, {
        cause: err,
      });
    }
    templateCreated = true;
  }

  const records = rebuildIndex(store.storePath, { title: store.config.index_title, io });

  return { configCreated, templateCreated, records: records.length };
}

export const initCommand = new Command("init")
  .description("Create the record directory, configuration and index")
  .option("--template", `copy the default template to ${TEMPLATE_FILE} for customizing`)
  .action((options: Record<string, unknown>, command: Command) => {
    const globalOpts = readGlobalOptions(command);
    const reporter = createReporter(globalOpts);

    try {
      const store = resolveStore({ dir: globalOpts.dir, root: globalOpts.root });
      const result = initStore(store, { template: options.template === true });

      reporter.json({
        status: "initialized",
        path: store.storePath,
        root: store.rootPath,
        config_created: result.configCreated,
        template_created: result.templateCreated,
        records: result.records,
      });
      reporter.result(`Initialized record store at ${store.storePath}`);
      if (result.configCreated) {
        reporter.info(`Wrote ${CONFIG_FILE}`);
      }
      if (result.templateCreated) {
        reporter.info(`Wrote ${TEMPLATE_FILE}; edit it to change new records`);
      }
      reporter.detail(`Index rebuilt: ${result.records} record(s)`);

      process.exit(ExitCodes.SUCCESS);
    } catch (err) {
      exitWithError(globalOpts, err);
    }
  });
