import type { ResilientFetcher } from "../scraper/fetch";
import type { ScrapeKind, SheetConfig, SheetTarget } from "../scraper/types";
import { extractCanonicalUrl } from "./identity";
import { TenantTokenProvider } from "./sheet-auth";
import { SheetClient, rangeOf, type SheetResponse } from "./sheet-client";
import { CHUNK_TRUNCATION, REMOTE_TRUNCATION, truncateRow } from "./truncate";
import {
  headerOf,
  toCellValue,
  toValueMatrix,
  type CellValue,
  type Dataset,
  type DeleteResult,
  type IdentityField,
  type ReadResult,
  type Row,
  type TabularStore,
} from "./types";

export const CHUNK_ROWS = 50;

const IDENTITY_COLUMNS: readonly IdentityField[] = ["repository_url", "website_url"];

interface SheetEntry {
  /** 1-based row in the sheet; the header is row 1. */
  sheetRow: number;
  row: Row;
}

type RawRead = { ok: true; header: string[]; entries: SheetEntry[] } | { ok: false; error: string };

function isBlank(cell: unknown): boolean {
  return cell === null || cell === undefined || cell === "";
}

function describeFailure(response: SheetResponse): string {
  const status = response.httpStatus === null ? "" : `HTTP ${response.httpStatus}`;
  const code = response.code === null ? "" : `code ${response.code}`;
  return [status, code, response.message].filter(Boolean).join(", ") || "unknown error";
}

function toSheetValues(matrix: CellValue[][]): CellValue[][] {
  return matrix.map((row) => row.map((cell) => (cell === null ? "" : cell)));
}

export interface RemoteSheetStoreOptions {
  client: SheetClient;
  target: SheetTarget;
  name: string;
  chunkRows?: number;
}

/**
 * A remote spreadsheet tab used as a table: row 1 is the header, data starts
 * at row 2. Writes rewrite the whole used range.
 */
export class RemoteSheetStore implements TabularStore {
  readonly kind = "remote" as const;
  readonly truncation = REMOTE_TRUNCATION;
  readonly name: string;
  private readonly client: SheetClient;
  private readonly target: SheetTarget;
  private readonly chunkRows: number;
  /** Size of the range last seen holding data; writes blank out anything beyond the new data. */
  private extent = { rows: 0, columns: 0 };

  constructor(options: RemoteSheetStoreOptions) {
    this.client = options.client;
    this.target = options.target;
    this.name = options.name;
    this.chunkRows = options.chunkRows ?? CHUNK_ROWS;
  }

  async readAll(): Promise<ReadResult> {
    const raw = await this.readRaw();
    if (!raw.ok) {
      return raw;
    }
    if (raw.header.length === 0) {
      return { ok: true, dataset: null };
    }
    return { ok: true, dataset: { header: raw.header, rows: raw.entries.map((entry) => entry.row) } };
  }

  async writeAll(dataset: Dataset): Promise<boolean> {
    const tag = `[${this.name}]`;
    const columns = Math.max(dataset.header.length, this.extent.columns);
    const values = this.padded(toSheetValues(toValueMatrix(dataset)), columns);
    const range = rangeOf(this.target.sheetId, 1, values.length, columns);

    const put = await this.client.putValues(this.target, range, values);
    if (put.ok) {
      console.log(`✓ ${tag} wrote ${dataset.rows.length} rows`);
      this.extent = { rows: dataset.rows.length + 1, columns: dataset.header.length };
      return true;
    }
    console.warn(`⚠️  ${tag} values write failed (${describeFailure(put)}); trying batch update`);

    const batch = await this.client.batchUpdateValues(this.target, [{ range, values }]);
    if (batch.ok) {
      console.log(`✓ ${tag} wrote ${dataset.rows.length} rows via batch update`);
      this.extent = { rows: dataset.rows.length + 1, columns: dataset.header.length };
      return true;
    }
    console.warn(`⚠️  ${tag} batch update failed (${describeFailure(batch)}); writing in chunks of ${this.chunkRows} rows`);

    if (await this.writeChunks(dataset, values.length, columns)) {
      console.log(`✓ ${tag} wrote ${dataset.rows.length} rows in chunks`);
      this.extent = { rows: dataset.rows.length + 1, columns: dataset.header.length };
      return true;
    }
    console.error(`❌ ${tag} all write strategies failed`);
    return false;
  }

  /** Appends rows whose identity is not in the sheet yet; existing rows are left as they are. */
  async appendRows(rows: Row[]): Promise<boolean> {
    const tag = `[${this.name}]`;
    const read = await this.readAll();
    if (!read.ok) {
      console.error(`❌ ${tag} cannot append: ${read.error}`);
      return false;
    }
    const existing = read.dataset ?? { header: [], rows: [] };
    const header = headerOf(rows, existing.header);
    const identityField = IDENTITY_COLUMNS.find((column) => header.includes(column));
    let fresh = rows;
    if (identityField) {
      const seen = new Set(existing.rows.map((row) => extractCanonicalUrl(row[identityField])).filter(Boolean));
      fresh = rows.filter((row) => {
        const id = extractCanonicalUrl(row[identityField]);
        if (id && seen.has(id)) {
          console.warn(`⚠️  ${tag} ${id} is already stored; not appending it`);
          return false;
        }
        if (id) {
          seen.add(id);
        }
        return true;
      });
    }
    if (fresh.length === 0) {
      console.log(`ℹ️  ${tag} nothing new to append`);
      return true;
    }
    return this.writeAll({ header: headerOf(fresh, existing.header), rows: [...existing.rows, ...fresh] });
  }

  async deleteWhere(field: string, value: string): Promise<DeleteResult> {
    const tag = `[${this.name}]`;
    const target = extractCanonicalUrl(value);
    const raw = await this.readRaw();
    if (!raw.ok) {
      console.error(`❌ ${tag} cannot delete: ${raw.error}`);
      return { success: false, removed: 0 };
    }
    if (!raw.header.includes(field)) {
      return { success: true, removed: 0 };
    }
    const matches = raw.entries
      .filter((entry) => extractCanonicalUrl(entry.row[field]) === target)
      .map((entry) => entry.sheetRow)
      .sort((a, b) => b - a);

    let removed = 0;
    for (const sheetRow of matches) {
      const response = await this.client.deleteRows(this.target, sheetRow);
      if (!response.ok) {
        console.error(`❌ ${tag} failed to delete row ${sheetRow}: ${describeFailure(response)}`);
        this.extent.rows = Math.max(0, this.extent.rows - removed);
        return { success: false, removed };
      }
      removed += 1;
    }
    if (removed > 0) {
      console.log(`✓ ${tag} deleted ${removed} row(s) for ${target}`);
      this.extent.rows = Math.max(0, this.extent.rows - removed);
    }
    return { success: true, removed };
  }

  async exists(field: string, value: string): Promise<boolean> {
    const target = extractCanonicalUrl(value);
    const read = await this.readAll();
    if (!read.ok || !read.dataset) {
      return false;
    }
    return read.dataset.rows.some((row) => extractCanonicalUrl(row[field]) === target);
  }

  /** Collapses rows sharing an identity to the first one, then rewrites the sheet. */
  async dedupe(identityField: string): Promise<DeleteResult> {
    const tag = `[${this.name}]`;
    const read = await this.readAll();
    if (!read.ok) {
      console.error(`❌ ${tag} cannot dedupe: ${read.error}`);
      return { success: false, removed: 0 };
    }
    const dataset = read.dataset;
    if (!dataset || !dataset.header.includes(identityField)) {
      console.log(`ℹ️  ${tag} nothing to dedupe`);
      return { success: true, removed: 0 };
    }

    const seen = new Set<string>();
    const rows: Row[] = [];
    for (const row of dataset.rows) {
      const id = extractCanonicalUrl(row[identityField]);
      if (id && seen.has(id)) {
        continue;
      }
      if (id) {
        seen.add(id);
      }
      rows.push(id ? { ...row, [identityField]: id } : row);
    }
    const removed = dataset.rows.length - rows.length;
    if (removed === 0) {
      console.log(`ℹ️  ${tag} no duplicate ${identityField} values`);
      return { success: true, removed: 0 };
    }

    const written = await this.writeAll({ header: dataset.header, rows });
    if (written) {
      console.log(`✅ ${tag} removed ${removed} duplicate row(s)`);
    }
    return { success: written, removed: written ? removed : 0 };
  }

  private async readRaw(): Promise<RawRead> {
    const response = await this.client.readValues(this.target);
    if (!response.ok) {
      return { ok: false, error: describeFailure(response) };
    }
    const values = response.values ?? [];
    let used = values.length;
    while (used > 0 && values[used - 1].every(isBlank)) {
      used -= 1;
    }
    const rowsInUse = values.slice(0, used);
    this.extent = {
      rows: rowsInUse.length,
      columns: rowsInUse.reduce((max, row) => Math.max(max, row.length), 0),
    };
    if (rowsInUse.length === 0) {
      return { ok: true, header: [], entries: [] };
    }

    const columns = rowsInUse[0].map((cell) => (isBlank(cell) ? "" : String(cell).trim()));
    const header = columns.filter((column) => column.length > 0);
    const entries: SheetEntry[] = [];
    rowsInUse.slice(1).forEach((cells, index) => {
      if (cells.every(isBlank)) {
        return;
      }
      const row: Row = {};
      columns.forEach((column, columnIndex) => {
        if (column) {
          const cell = cells[columnIndex];
          row[column] = isBlank(cell) ? null : toCellValue(cell);
        }
      });
      entries.push({ sheetRow: index + 2, row });
    });
    return { ok: true, header, entries };
  }

  private padded(values: CellValue[][], columns: number): CellValue[][] {
    const rows = Math.max(values.length, this.extent.rows);
    return Array.from({ length: rows }, (_, rowIndex) => {
      const row = values[rowIndex] ?? [];
      return Array.from({ length: columns }, (_, columnIndex): CellValue => row[columnIndex] ?? "");
    });
  }

  private async writeChunks(dataset: Dataset, totalRows: number, columns: number): Promise<boolean> {
    const tag = `[${this.name}]`;
    const rows = dataset.rows.map((row) => truncateRow(row, CHUNK_TRUNCATION).row);
    const values = this.padded(toSheetValues(toValueMatrix({ header: dataset.header, rows })), columns).slice(
      0,
      totalRows
    );

    const header = await this.client.putValues(
      this.target,
      rangeOf(this.target.sheetId, 1, 1, columns),
      values.slice(0, 1)
    );
    if (!header.ok) {
      console.error(`❌ ${tag} header write failed: ${describeFailure(header)}`);
      return false;
    }
    for (let offset = 1; offset < values.length; offset += this.chunkRows) {
      const chunk = values.slice(offset, offset + this.chunkRows);
      const range = rangeOf(this.target.sheetId, offset + 1, chunk.length, columns);
      const response = await this.client.putValues(this.target, range, chunk);
      if (!response.ok) {
        console.error(`❌ ${tag} chunk ${range} failed: ${describeFailure(response)}`);
        return false;
      }
      console.log(`ℹ️  ${tag} wrote chunk ${range}`);
    }
    return true;
  }
}

export interface RemoteStores {
  github: RemoteSheetStore | null;
  website: RemoteSheetStore | null;
}

export function createRemoteStores(config: SheetConfig | null, fetcher: ResilientFetcher): RemoteStores {
  if (!config) {
    return { github: null, website: null };
  }
  const tokens = new TenantTokenProvider({
    baseUrl: config.baseUrl,
    appId: config.appId,
    appSecret: config.appSecret,
    fetcher,
  });
  const client = new SheetClient({ baseUrl: config.baseUrl, tokens, fetcher });
  const build = (kind: ScrapeKind, target: SheetTarget | null) =>
    target ? new RemoteSheetStore({ client, target, name: `remote:${kind}` }) : null;
  return { github: build("github", config.github), website: build("website", config.website) };
}
