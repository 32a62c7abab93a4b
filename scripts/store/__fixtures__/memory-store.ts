import { extractCanonicalUrl } from "../identity";
import { LOCAL_TRUNCATION } from "../truncate";
import { headerOf, type Dataset, type DeleteResult, type ReadResult, type Row, type TabularStore, type TruncationPolicy } from "../types";

export interface MemoryStoreOptions {
  name?: string;
  kind?: "local" | "remote";
  truncation?: TruncationPolicy;
  dataset?: Dataset | null;
  failRead?: boolean;
  failWrite?: boolean;
  salvageTo?: string;
}

/** In-process `TabularStore` for tests; records every write. */
export class MemoryStore implements TabularStore {
  readonly name: string;
  readonly kind: "local" | "remote";
  readonly truncation: TruncationPolicy;
  dataset: Dataset | null;
  failRead: boolean;
  failWrite: boolean;
  readonly writes: Dataset[] = [];
  readonly salvaged: Dataset[] = [];
  private readonly salvageTo?: string;

  constructor(options: MemoryStoreOptions = {}) {
    this.name = options.name ?? "memory";
    this.kind = options.kind ?? "local";
    this.truncation = options.truncation ?? LOCAL_TRUNCATION;
    this.dataset = options.dataset ?? null;
    this.failRead = options.failRead ?? false;
    this.failWrite = options.failWrite ?? false;
    this.salvageTo = options.salvageTo;
  }

  async readAll(): Promise<ReadResult> {
    if (this.failRead) {
      return { ok: false, error: "read failed" };
    }
    return { ok: true, dataset: this.dataset };
  }

  async writeAll(dataset: Dataset): Promise<boolean> {
    if (this.failWrite) {
      return false;
    }
    this.writes.push(dataset);
    this.dataset = dataset;
    return true;
  }

  async appendRows(rows: Row[]): Promise<boolean> {
    const existing = this.dataset ?? { header: [], rows: [] };
    return this.writeAll({ header: headerOf(rows, existing.header), rows: [...existing.rows, ...rows] });
  }

  async deleteWhere(field: string, value: string): Promise<DeleteResult> {
    if (!this.dataset) {
      return { success: true, removed: 0 };
    }
    const target = extractCanonicalUrl(value);
    const rows = this.dataset.rows.filter((row) => extractCanonicalUrl(row[field]) !== target);
    const removed = this.dataset.rows.length - rows.length;
    if (removed > 0 && !(await this.writeAll({ header: this.dataset.header, rows }))) {
      return { success: false, removed: 0 };
    }
    return { success: true, removed };
  }

  async exists(field: string, value: string): Promise<boolean> {
    const target = extractCanonicalUrl(value);
    return (this.dataset?.rows ?? []).some((row) => extractCanonicalUrl(row[field]) === target);
  }

  async salvage(dataset: Dataset): Promise<string | null> {
    if (!this.salvageTo) {
      return null;
    }
    this.salvaged.push(dataset);
    return this.salvageTo;
  }
}
