/**
 * Row Store - Type Definitions
 *
 * Positional access to the three record tables. Row and column indices are
 * 1-based and the header row is row 1, so the first data row is row 2.
 */

export const TABLE_NAMES = ["Children", "Pets", "Owners"] as const;

export type TableName = (typeof TABLE_NAMES)[number];

export const TABLE_HEADERS: Record<TableName, readonly string[]> = {
  Children: ["ID", "First Name", "Last Name", "Age"],
  Pets: ["ID", "Nickname", "Age (months)", "Type"],
  Owners: ["Child Name", "Pet ID"],
};

export type RowStoreErrorCode =
  | "table_unavailable"
  | "write_rejected"
  | "index_out_of_range";

export class RowStoreError extends Error {
  code: RowStoreErrorCode;
  table: TableName;
  constructor(code: RowStoreErrorCode, table: TableName, message: string) {
    super(message);
    this.code = code;
    this.table = table;
    this.name = "RowStoreError";
  }
}

export interface RowStore {
  /** All rows including the header, in table order */
  readAllRows(table: TableName): Promise<string[][]>;

  appendRow(table: TableName, row: string[]): Promise<void>;

  updateCell(table: TableName, rowIndex: number, colIndex: number, value: string): Promise<void>;

  deleteRow(table: TableName, rowIndex: number): Promise<void>;
}
