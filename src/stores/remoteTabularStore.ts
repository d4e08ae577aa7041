/**
 * Contract of the remote spreadsheet holding the roster and audit tables.
 *
 * Row and column numbers are 1-based, header row included. Every call is
 * remote I/O and may reject; a missing sheet rejects with TableNotFoundError.
 */
export interface RemoteTabularStore {
  fetchAll(table: string): Promise<string[][]>;
  appendRow(table: string, values: string[]): Promise<void>;
  updateRowRange(table: string, rowNumber: number, values: string[]): Promise<void>;
  createSheet(table: string): Promise<void>;
  setCellValue(table: string, rowNumber: number, columnNumber: number, value: string): Promise<void>;
  deleteRow(table: string, rowNumber: number): Promise<void>;
  deleteColumn(table: string, columnNumber: number): Promise<void>;
}
