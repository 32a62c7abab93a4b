#!/usr/bin/env node
import { Command } from "commander";
import "dotenv/config";
import { pathToFileURL } from "node:url";

import { loadScraperConfig } from "../scraper/config";
import { createRemote } from "../scraper/runtime";
import { IDENTITY_FIELDS, type ScrapeKind } from "../scraper/types";

const KINDS: readonly ScrapeKind[] = ["github", "website"];

function parseKinds(value: string): ScrapeKind[] {
  if (value === "all") {
    return [...KINDS];
  }
  const kind = KINDS.find((candidate) => candidate === value);
  if (!kind) {
    throw new Error(`--sheet must be one of github, website, all (got '${value}')`);
  }
  return [kind];
}

async function main() {
  const program = new Command()
    .name("dedupe-sheet")
    .description("Collapse duplicate URL rows in the remote sheets, keeping the first")
    .option("-s, --sheet <kind>", "Sheet to clean: github, website or all", "all")
    .parse(process.argv);

  const { sheet } = program.opts<{ sheet: string }>();
  const kinds = parseKinds(sheet);
  const config = loadScraperConfig();
  if (!config.sheet) {
    throw new Error("SHEET_APP_ID and SHEET_APP_SECRET must be set");
  }
  const stores = createRemote(config);

  let failures = 0;
  for (const kind of kinds) {
    const store = stores[kind];
    if (!store) {
      console.warn(`⚠️  Remote sheet for ${kind} is not configured; skipping it`);
      continue;
    }
    console.log(`⏳ Deduplicating ${store.name}…`);
    const result = await store.dedupe(IDENTITY_FIELDS[kind]);
    if (!result.success) {
      failures += 1;
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
    console.error("\n❌ Dedupe failed:", error instanceof Error ? error.message : error);
    process.exit(1);
  });
}
