// src/lib/row-store/csv-file-store.ts
// File-backed row store: one CSV file per table, re-read on every call

import { randomUUID } from "node:crypto";
import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import { SerialQueue } from "../serial-queue.js";
import { formatCsv, parseCsv } from "./csv.js";
import {
  RowStoreError,
  TABLE_HEADERS,
  TABLE_NAMES,
  type RowStore,
  type TableName,
} from "./types.js";

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class CsvFileRowStore implements RowStore {
  // every mutation re-reads and rewrites the whole file, so one at a time per table
  private readonly writeQueues = new Map<TableName, SerialQueue>();

  constructor(private readonly dataDir: string) {}

  filePath(table: TableName): string {
    return path.join(this.dataDir, `${table}.csv`);
  }

  /**
   * Creates the data directory and a header-only file for every missing table.
   * Existing files are left untouched.
   */
  async ensureTables(): Promise<TableName[]> {
    await mkdir(this.dataDir, { recursive: true });
    const created: TableName[] = [];
    for (const table of TABLE_NAMES) {
      try {
        await writeFile(this.filePath(table), formatCsv([TABLE_HEADERS[table]]), { flag: "wx" });
        created.push(table);
      } catch (err) {
        const exists = err instanceof Error && "code" in err && err.code === "EEXIST";
        if (!exists) throw err;
      }
    }
    return created;
  }

  async readAllRows(table: TableName): Promise<string[][]> {
    let content: string;
    try {
      content = await readFile(this.filePath(table), "utf8");
    } catch (err) {
      throw new RowStoreError("table_unavailable", table, `Cannot read table '${table}': ${errorMessage(err)}`);
    }
    return parseCsv(content);
  }

  async appendRow(table: TableName, row: string[]): Promise<void> {
    await this.mutate(table, (rows) => {
      rows.push([...row]);
    });
  }

  async updateCell(table: TableName, rowIndex: number, colIndex: number, value: string): Promise<void> {
    await this.mutate(table, (rows) => {
      const row = this.getDataRow(table, rows, rowIndex);
      if (!Number.isInteger(colIndex) || colIndex < 1 || colIndex > TABLE_HEADERS[table].length) {
        throw new RowStoreError("index_out_of_range", table, `Column ${colIndex} is outside table '${table}'`);
      }
      while (row.length < colIndex) row.push("");
      row[colIndex - 1] = value;
    });
  }

  async deleteRow(table: TableName, rowIndex: number): Promise<void> {
    await this.mutate(table, (rows) => {
      this.getDataRow(table, rows, rowIndex);
      rows.splice(rowIndex - 1, 1);
    });
  }

  private mutate(table: TableName, change: (rows: string[][]) => void): Promise<void> {
    let queue = this.writeQueues.get(table);
    if (!queue) {
      queue = new SerialQueue();
      this.writeQueues.set(table, queue);
    }
    return queue.run(async () => {
      const rows = await this.readAllRows(table);
      change(rows);
      await this.writeRows(table, rows);
    });
  }

  private getDataRow(table: TableName, rows: string[][], rowIndex: number): string[] {
    const row = Number.isInteger(rowIndex) && rowIndex >= 2 ? rows[rowIndex - 1] : undefined;
    if (!row) {
      throw new RowStoreError("index_out_of_range", table, `Row ${rowIndex} is outside table '${table}'`);
    }
    return row;
  }

  /** Staging file for one write; unique so overlapping writers never share it */
  protected tempPath(table: TableName): string {
    return `${this.filePath(table)}.${randomUUID()}.tmp`;
  }

  private async writeRows(table: TableName, rows: string[][]): Promise<void> {
    const target = this.filePath(table);
    const tmp = this.tempPath(table);
    try {
      await writeFile(tmp, formatCsv(rows), "utf8");
      await rename(tmp, target);
    } catch (err) {
      await rm(tmp, { force: true, recursive: true });
      throw new RowStoreError("write_rejected", table, `Cannot write table '${table}': ${errorMessage(err)}`);
    }
  }
}
