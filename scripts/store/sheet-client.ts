import type { ResilientFetcher } from "../scraper/fetch";
import type { HttpMethod, SheetTarget } from "../scraper/types";
import type { AccessTokenProvider } from "./sheet-auth";
import type { CellValue } from "./types";

const SHEETS_PATH = "/open-apis/sheets/v2/spreadsheets";
const AUTH_FAILURE_CODES = new Set([99991661, 99991663]);

export interface SheetResponse {
  ok: boolean;
  httpStatus: number | null;
  code: number | null;
  message: string;
  data: Record<string, unknown> | null;
}

export function parseJsonObject(text: string): Record<string, unknown> | null {
  if (!text) {
    return null;
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return isRecord(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** 1 → A, 27 → AA */
export function columnLetter(index: number): string {
  let remaining = index;
  let letters = "";
  while (remaining > 0) {
    const offset = (remaining - 1) % 26;
    letters = String.fromCharCode(65 + offset) + letters;
    remaining = Math.floor((remaining - 1) / 26);
  }
  return letters;
}

export function rangeOf(sheetId: string, startRow: number, rowCount: number, columnCount: number): string {
  const lastColumn = columnLetter(Math.max(1, columnCount));
  return `${sheetId}!A${startRow}:${lastColumn}${startRow + Math.max(1, rowCount) - 1}`;
}

export function isAuthFailure(response: Pick<SheetResponse, "httpStatus" | "code">): boolean {
  return response.httpStatus === 401 || (response.code !== null && AUTH_FAILURE_CODES.has(response.code));
}

export interface SheetClientOptions {
  baseUrl: string;
  tokens: AccessTokenProvider;
  fetcher: ResilientFetcher;
}

/**
 * Thin client for the spreadsheet values API. Every call retries exactly once
 * with a fresh token when the service reports an expired or invalid one.
 */
export class SheetClient {
  private readonly baseUrl: string;
  private readonly tokens: AccessTokenProvider;
  private readonly fetcher: ResilientFetcher;

  constructor(options: SheetClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.tokens = options.tokens;
    this.fetcher = options.fetcher;
  }

  async readValues(target: SheetTarget, range?: string): Promise<SheetResponse & { values: unknown[][] | null }> {
    const response = await this.call(
      "GET",
      `/${target.spreadsheetToken}/values/${encodeURIComponent(range ?? target.sheetId)}`
    );
    const valueRange = response.data?.valueRange;
    const rawValues = isRecord(valueRange) ? valueRange.values : undefined;
    const values = Array.isArray(rawValues)
      ? rawValues.map((row: unknown) => (Array.isArray(row) ? row : [row]))
      : null;
    return { ...response, values };
  }

  putValues(target: SheetTarget, range: string, values: CellValue[][]): Promise<SheetResponse> {
    return this.call("PUT", `/${target.spreadsheetToken}/values`, { valueRange: { range, values } });
  }

  batchUpdateValues(target: SheetTarget, ranges: Array<{ range: string; values: CellValue[][] }>): Promise<SheetResponse> {
    return this.call("POST", `/${target.spreadsheetToken}/values_batch_update`, { valueRanges: ranges });
  }

  /** Deletes `count` rows starting at the 1-based sheet row `startRow`. */
  deleteRows(target: SheetTarget, startRow: number, count = 1): Promise<SheetResponse> {
    return this.call("DELETE", `/${target.spreadsheetToken}/dimension_range`, {
      dimension: {
        sheetId: target.sheetId,
        majorDimension: "ROWS",
        startIndex: startRow,
        endIndex: startRow + count - 1,
      },
    });
  }

  private async call(method: HttpMethod, path: string, body?: unknown): Promise<SheetResponse> {
    let response: SheetResponse | null = null;
    for (let attempt = 0; attempt < 2; attempt += 1) {
      let token: string;
      try {
        token = attempt === 0 ? await this.tokens.getAccessToken() : await this.tokens.refresh();
      } catch (error) {
        return {
          ok: false,
          httpStatus: null,
          code: null,
          message: error instanceof Error ? error.message : String(error),
          data: null,
        };
      }

      const result = await this.fetcher.fetch({
        url: `${this.baseUrl}${SHEETS_PATH}${path}`,
        method,
        headers: {
          authorization: `Bearer ${token}`,
          "content-type": "application/json; charset=utf-8",
        },
        body: body === undefined ? undefined : JSON.stringify(body),
      });
      const parsed: Record<string, unknown> = parseJsonObject(result.payload) ?? {};
      const { code, msg, data } = parsed;
      response = {
        ok: result.status === "ok" && code === 0,
        httpStatus: result.httpStatus,
        code: typeof code === "number" ? code : null,
        message: typeof msg === "string" ? msg : result.error ?? "",
        data: isRecord(data) ? data : null,
      };
      if (attempt === 0 && isAuthFailure(response)) {
        console.warn(`⚠️  [sheet] access token rejected on ${method} ${path}, refreshing`);
        continue;
      }
      break;
    }
    if (!response) {
      throw new Error(`No response for ${method} ${path}`);
    }
    return response;
  }
}
