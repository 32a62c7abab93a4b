import fs from "fs-extra";
import path from "node:path";
import * as XLSX from "xlsx";

import { extractCanonicalUrl } from "./identity";
import { LOCAL_TRUNCATION } from "./truncate";
import {
  headerOf,
  toCellValue,
  toValueMatrix,
  type Dataset,
  type DeleteResult,
  type ReadResult,
  type Row,
  type TabularStore,
} from "./types";

export interface LocalSheetStoreOptions {
  sheetName?: string;
}

export function backupPathFor(filePath: string): string {
  return `${filePath}.backup.xlsx`;
}

function parseWorkbook(buffer: Buffer): Dataset | null {
  const workbook = XLSX.read(buffer, { type: "buffer" });
  const firstSheet = workbook.SheetNames[0];
  const sheet = firstSheet === undefined ? undefined : workbook.Sheets[firstSheet];
  if (!sheet) {
    return null;
  }
  const matrix = XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, defval: null, raw: true, blankrows: false });
  if (matrix.length === 0) {
    return null;
  }
  const columns = matrix[0].map((cell) => (cell === null || cell === undefined ? "" : String(cell).trim()));
  const header = columns.filter((column) => column.length > 0);
  const rows = matrix.slice(1).map((cells) => {
    const row: Row = {};
    columns.forEach((column, index) => {
      if (column) {
        row[column] = toCellValue(cells[index]);
      }
    });
    return row;
  });
  return { header, rows };
}

async function writeWorkbook(filePath: string, dataset: Dataset, sheetName: string): Promise<void> {
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(toValueMatrix(dataset)), sheetName);
  const buffer: Buffer = XLSX.write(workbook, { type: "buffer", bookType: "xlsx" });
  await fs.ensureDir(path.dirname(filePath));
  const tempPath = `${filePath}.${process.pid}.tmp`;
  try {
    await fs.writeFile(tempPath, buffer);
    await fs.move(tempPath, filePath, { overwrite: true });
  } finally {
    await fs.remove(tempPath);
  }
}

/** A whole-file `.xlsx` store: every write rewrites the first worksheet. */
export class LocalSheetStore implements TabularStore {
  readonly kind = "local" as const;
  readonly truncation = LOCAL_TRUNCATION;
  readonly name: string;
  private readonly sheetName: string;

  constructor(
    readonly filePath: string,
    options: LocalSheetStoreOptions = {}
  ) {
    this.name = path.basename(filePath);
    this.sheetName = options.sheetName ?? "Sheet1";
  }

  async readAll(): Promise<ReadResult> {
    try {
      if (!(await fs.pathExists(this.filePath))) {
        return { ok: true, dataset: null };
      }
      const buffer = await fs.readFile(this.filePath);
      return { ok: true, dataset: parseWorkbook(buffer) };
    } catch (error) {
      return { ok: false, error: error instanceof Error ? error.message : String(error) };
    }
  }

  async writeAll(dataset: Dataset): Promise<boolean> {
    try {
      await writeWorkbook(this.filePath, dataset, this.sheetName);
      return true;
    } catch (error) {
      console.error(`❌ [${this.name}] write failed:`, error instanceof Error ? error.message : error);
      return false;
    }
  }

  async appendRows(rows: Row[]): Promise<boolean> {
    const read = await this.readAll();
    if (!read.ok) {
      console.error(`❌ [${this.name}] cannot append: ${read.error}`);
      return false;
    }
    const existing = read.dataset ?? { header: [], rows: [] };
    return this.writeAll({
      header: headerOf(rows, existing.header),
      rows: [...existing.rows, ...rows],
    });
  }

  async deleteWhere(field: string, value: string): Promise<DeleteResult> {
    const target = extractCanonicalUrl(value);
    const read = await this.readAll();
    if (!read.ok) {
      console.error(`❌ [${this.name}] cannot delete: ${read.error}`);
      return { success: false, removed: 0 };
    }
    const dataset = read.dataset;
    if (!dataset || !dataset.header.includes(field)) {
      return { success: true, removed: 0 };
    }
    const rows = dataset.rows.filter((row) => extractCanonicalUrl(row[field]) !== target);
    const removed = dataset.rows.length - rows.length;
    if (removed === 0) {
      return { success: true, removed: 0 };
    }
    const written = await this.writeAll({ header: dataset.header, rows });
    return { success: written, removed: written ? removed : 0 };
  }

  async exists(field: string, value: string): Promise<boolean> {
    const target = extractCanonicalUrl(value);
    const read = await this.readAll();
    if (!read.ok || !read.dataset) {
      return false;
    }
    return read.dataset.rows.some((row) => extractCanonicalUrl(row[field]) === target);
  }

  async salvage(dataset: Dataset): Promise<string | null> {
    const backupPath = backupPathFor(this.filePath);
    try {
      await writeWorkbook(backupPath, dataset, this.sheetName);
      return backupPath;
    } catch (error) {
      console.error(`❌ [${this.name}] backup write failed:`, error instanceof Error ? error.message : error);
      return null;
    }
  }
}
