// src/lib/row-store/memory-store.ts
// In-process row store used by tests and ROW_STORE=memory

import {
  RowStoreError,
  TABLE_HEADERS,
  TABLE_NAMES,
  type RowStore,
  type TableName,
} from "./types.js";

export interface MemoryRowStoreOptions {
  /** Initial data rows per table (header rows are added automatically) */
  tables?: Partial<Record<TableName, string[][]>>;
  /** Tables that behave as if they did not exist */
  missing?: TableName[];
}

export class MemoryRowStore implements RowStore {
  private readonly tables = new Map<TableName, string[][]>();

  constructor(options: MemoryRowStoreOptions = {}) {
    const missing = new Set(options.missing ?? []);
    for (const table of TABLE_NAMES) {
      if (missing.has(table)) continue;
      const rows = options.tables?.[table] ?? [];
      this.tables.set(table, [[...TABLE_HEADERS[table]], ...rows.map((r) => [...r])]);
    }
  }

  async readAllRows(table: TableName): Promise<string[][]> {
    return this.getTable(table).map((row) => [...row]);
  }

  async appendRow(table: TableName, row: string[]): Promise<void> {
    this.getTable(table).push([...row]);
  }

  async updateCell(table: TableName, rowIndex: number, colIndex: number, value: string): Promise<void> {
    const rows = this.getTable(table);
    const row = this.getDataRow(table, rows, rowIndex);
    if (!Number.isInteger(colIndex) || colIndex < 1 || colIndex > TABLE_HEADERS[table].length) {
      throw new RowStoreError("index_out_of_range", table, `Column ${colIndex} is outside table '${table}'`);
    }
    while (row.length < colIndex) row.push("");
    row[colIndex - 1] = value;
  }

  async deleteRow(table: TableName, rowIndex: number): Promise<void> {
    const rows = this.getTable(table);
    this.getDataRow(table, rows, rowIndex);
    rows.splice(rowIndex - 1, 1);
  }

  private getTable(table: TableName): string[][] {
    const rows = this.tables.get(table);
    if (!rows) {
      throw new RowStoreError("table_unavailable", table, `Table '${table}' not found`);
    }
    return rows;
  }

  private getDataRow(table: TableName, rows: string[][], rowIndex: number): string[] {
    // row 1 is the header and is never written through this interface
    const row = Number.isInteger(rowIndex) && rowIndex >= 2 ? rows[rowIndex - 1] : undefined;
    if (!row) {
      throw new RowStoreError("index_out_of_range", table, `Row ${rowIndex} is outside table '${table}'`);
    }
    return row;
  }
}
