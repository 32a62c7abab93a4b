import type { HttpTransport, TransportRequest, TransportResponse } from "../../scraper/transport";
import { parseJsonObject } from "../sheet-client";

const SHEETS_PREFIX = "/open-apis/sheets/v2/spreadsheets/";

export interface RecordedCall {
  method: string;
  operation: string;
  range?: string;
  startIndex?: number;
}

interface ParsedRange {
  startRow: number;
  startColumn: number;
}

function columnNumber(letters: string): number {
  let value = 0;
  for (const letter of letters) {
    value = value * 26 + (letter.charCodeAt(0) - 64);
  }
  return value;
}

function parseRange(range: string): ParsedRange {
  const match = /^[^!]+!([A-Z]+)(\d+):[A-Z]+\d+$/.exec(range);
  if (!match) {
    throw new Error(`Unsupported range ${range}`);
  }
  return { startColumn: columnNumber(match[1]), startRow: Number.parseInt(match[2], 10) };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readValueRange(value: unknown): { range: string; values: unknown[][] } | null {
  if (!isRecord(value) || typeof value.range !== "string" || !Array.isArray(value.values)) {
    return null;
  }
  const values = value.values.map((row: unknown) => (Array.isArray(row) ? row : [row]));
  return { range: value.range, values };
}

function reply(request: TransportRequest, body: Record<string, unknown>, status = 200): TransportResponse {
  return {
    url: request.url,
    status,
    headers: { "content-type": "application/json; charset=utf-8" },
    body: JSON.stringify(body),
  };
}

/**
 * In-process stand-in for the spreadsheet service: one tab held as a grid,
 * tenant tokens numbered in issue order.
 */
export class FakeSheetService {
  grid: unknown[][] = [];
  readonly calls: RecordedCall[] = [];
  readonly revoked = new Set<string>();
  tokensIssued = 0;
  tokenError: { code: number; msg: string } | null = null;
  failRead = false;
  failBatch = false;
  failPut: (range: string) => boolean = () => false;

  readonly transport: HttpTransport = async (request) => this.handle(request);

  constructor(rows: unknown[][] = []) {
    this.grid = rows.map((row) => [...row]);
  }

  /** Rows as the service would return them, blank cells as null. */
  snapshot(): unknown[][] {
    const width = this.grid.reduce((max, row) => Math.max(max, row.length), 0);
    return this.grid.map((row) => Array.from({ length: width }, (_, index) => row[index] ?? null));
  }

  private async handle(request: TransportRequest): Promise<TransportResponse> {
    const { pathname } = new URL(request.url);
    if (pathname.endsWith("/tenant_access_token/internal/")) {
      if (this.tokenError) {
        return reply(request, this.tokenError);
      }
      this.tokensIssued += 1;
      return reply(request, { code: 0, msg: "ok", tenant_access_token: `tenant-${this.tokensIssued}`, expire: 7200 });
    }

    const token = (request.headers.authorization ?? "").replace(/^Bearer /, "");
    if (!token || this.revoked.has(token)) {
      return reply(request, { code: 99991663, msg: "Invalid access token" }, 400);
    }
    if (!pathname.startsWith(SHEETS_PREFIX)) {
      return reply(request, { code: 404, msg: "not found" }, 404);
    }

    const [, operation = ""] = pathname.slice(SHEETS_PREFIX.length).split("/");
    const body = parseJsonObject(request.body ?? "") ?? {};

    if (request.method === "GET" && operation === "values") {
      this.calls.push({ method: "GET", operation });
      if (this.failRead) {
        return reply(request, { code: 1, msg: "internal error" }, 500);
      }
      return reply(request, { code: 0, msg: "success", data: { valueRange: { values: this.snapshot() } } });
    }

    if (request.method === "PUT" && operation === "values") {
      const valueRange = readValueRange(body.valueRange);
      if (!valueRange) {
        return reply(request, { code: 90202, msg: "bad request" }, 400);
      }
      this.calls.push({ method: "PUT", operation, range: valueRange.range });
      if (this.failPut(valueRange.range)) {
        return reply(request, { code: 90221, msg: "request too large" });
      }
      this.write(valueRange.range, valueRange.values);
      return reply(request, { code: 0, msg: "success", data: {} });
    }

    if (request.method === "POST" && operation === "values_batch_update") {
      const ranges = Array.isArray(body.valueRanges) ? body.valueRanges.map(readValueRange) : [];
      this.calls.push({ method: "POST", operation, range: ranges[0]?.range });
      if (this.failBatch) {
        return reply(request, { code: 90221, msg: "request too large" });
      }
      for (const valueRange of ranges) {
        if (valueRange) {
          this.write(valueRange.range, valueRange.values);
        }
      }
      return reply(request, { code: 0, msg: "success", data: {} });
    }

    if (request.method === "DELETE" && operation === "dimension_range") {
      const dimension = isRecord(body.dimension) ? body.dimension : {};
      const { startIndex, endIndex } = dimension;
      if (typeof startIndex !== "number" || typeof endIndex !== "number") {
        return reply(request, { code: 90202, msg: "bad request" }, 400);
      }
      this.calls.push({ method: "DELETE", operation, startIndex });
      this.grid.splice(startIndex - 1, endIndex - startIndex + 1);
      return reply(request, { code: 0, msg: "success", data: { delCount: endIndex - startIndex + 1 } });
    }

    return reply(request, { code: 404, msg: "not found" }, 404);
  }

  private write(range: string, values: unknown[][]) {
    const { startRow, startColumn } = parseRange(range);
    values.forEach((cells, rowOffset) => {
      const rowIndex = startRow - 1 + rowOffset;
      while (this.grid.length <= rowIndex) {
        this.grid.push([]);
      }
      const row = this.grid[rowIndex];
      cells.forEach((cell, columnOffset) => {
        row[startColumn - 1 + columnOffset] = cell === "" ? null : cell;
      });
    });
  }
}
