#!/usr/bin/env node
import { Command } from "commander";
import "dotenv/config";
import path from "node:path";
import { pathToFileURL } from "node:url";

import { DEFAULT_DATA_DIR, loadScraperConfig } from "../scraper/config";
import { createStores } from "../scraper/runtime";
import { deleteByUrl } from "../store/delete";

interface DeleteCliOptions {
  output: string;
  remote?: boolean;
  local: boolean;
}

async function main() {
  const program = new Command()
    .name("delete-url")
    .description("Delete every stored row for a GitHub repository or website URL")
    .argument("<urls...>", "URLs to delete")
    .option("-o, --output <dir>", "Directory holding the local spreadsheets", DEFAULT_DATA_DIR)
    .option("--remote", "Also delete from the remote sheets (default: AUTO_SAVE_TO_REMOTE)")
    .option("--no-local", "Leave the local spreadsheets untouched")
    .parse(process.argv);

  const options = program.opts<DeleteCliOptions>();
  const config = loadScraperConfig();
  const stores = createStores(config, {
    dataDir: path.resolve(options.output),
    local: options.local,
    remote: options.remote ?? config.autoSaveToRemote,
  });

  let failures = 0;
  for (const url of program.args) {
    const result = await deleteByUrl(url, stores);
    if (result.success) {
      console.log(`✓ ${result.message}`);
    } else {
      failures += 1;
      console.error(`❌ ${result.message}`);
    }
  }
  if (failures > 0) {
    process.exitCode = 1;
  }
}

const directInvocation = (() => {
  try {
    return pathToFileURL(process.argv[1] ?? "").href === import.meta.url;
  } catch {
    return false;
  }
})();

if (directInvocation) {
  main().catch((error) => {
    console.error("\n❌ Delete failed:", error instanceof Error ? error.message : error);
    process.exit(1);
  });
}
