#!/usr/bin/env node
import { Command } from "commander";
import "dotenv/config";
import Table from "cli-table3";
import fs from "fs-extra";
import { pathToFileURL } from "node:url";
import pLimit from "p-limit";

import { loadScraperConfig } from "../scraper/config";
import {
  DEFAULT_PROBE_URL,
  PROBE_TIMEOUT_MS,
  createTransportProbe,
  endpointLabel,
  parseProxyEndpoint,
  type ProbeResult,
  type ProxyProbe,
} from "../scraper/proxy-pool";
import type { ProxyEndpoint } from "../scraper/types";

interface CheckRow {
  endpoint: ProxyEndpoint;
  result: ProbeResult;
}

export async function readProxyList(filePath: string): Promise<string[]> {
  const raw = await fs.readFile(filePath, "utf8");
  return raw
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("#"));
}

export async function checkProxies(inputs: string[], probe: ProxyProbe, concurrency = 5): Promise<CheckRow[]> {
  const limit = pLimit(concurrency);
  const unique = [...new Set(inputs.map((input) => input.trim()).filter(Boolean))];
  return Promise.all(
    unique.map((input) =>
      limit(async () => {
        const endpoint = parseProxyEndpoint(input);
        return { endpoint, result: await probe(endpoint) };
      })
    )
  );
}

function outputResults(rows: CheckRow[], format: string) {
  if (format === "json") {
    console.log(
      JSON.stringify(
        rows.map((row) => ({ proxy: endpointLabel(row.endpoint), ...row.result })),
        null,
        2
      )
    );
    return;
  }
  const table = new Table({ head: ["Proxy", "Status", "Latency", "Error"] });
  for (const row of rows) {
    table.push([
      endpointLabel(row.endpoint),
      row.result.ok ? "✅" : "❌",
      row.result.ms === undefined ? "-" : `${row.result.ms}ms`,
      row.result.error ?? "",
    ]);
  }
  console.log(table.toString());
}

async function main() {
  const program = new Command()
    .name("check-proxies")
    .description("Probe proxies and report which ones work")
    .argument("[proxies...]", "Proxy URLs or host:port pairs")
    .option("-f, --file <path>", "File with one proxy per line (default: PROXY_FILE)")
    .option("--probe-url <url>", "URL fetched through each proxy", DEFAULT_PROBE_URL)
    .option(
      "--timeout <seconds>",
      "Probe timeout in seconds",
      (value) => Number.parseFloat(value),
      PROBE_TIMEOUT_MS / 1000
    )
    .option("--format <format>", "Output format: table or json", "table")
    .parse(process.argv);

  const options = program.opts<{ file?: string; probeUrl: string; timeout: number; format: string }>();
  if (!Number.isFinite(options.timeout) || options.timeout <= 0) {
    throw new Error("--timeout must be a positive number");
  }
  const config = loadScraperConfig();
  const inputs = [...program.args, ...config.proxies];
  const file = options.file ?? config.proxyFile;
  if (file) {
    inputs.push(...(await readProxyList(file)));
  }
  if (inputs.length === 0) {
    throw new Error("No proxies given. Pass them as arguments, with --file, or via HTTP_PROXY/PROXY_FILE.");
  }

  const probe = createTransportProbe(undefined, options.probeUrl, Math.round(options.timeout * 1000));
  const rows = await checkProxies(inputs, probe, config.maxThreads);
  outputResults(rows, options.format);
  const working = rows.filter((row) => row.result.ok).length;
  console.log(`\nℹ️  ${working}/${rows.length} proxies working`);
  if (working === 0) {
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
    console.error("\n❌ Proxy check failed:", error instanceof Error ? error.message : error);
    process.exit(1);
  });
}
