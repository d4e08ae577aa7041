import { TableNotFoundError } from "../domain/errors";
import { RemoteTabularStore } from "./remoteTabularStore";

export type RemoteOperation = keyof RemoteTabularStore;

export interface RemoteCall {
  operation: RemoteOperation;
  table: string;
}

/**
 * RemoteTabularStore over in-process arrays.
 *
 * Backs the demo roster when no spreadsheet is configured, and stands in
 * for Google Sheets in tests: it records every call and can be told to
 * fail a given operation.
 */
export class InMemoryTabularStore implements RemoteTabularStore {
  private readonly sheets = new Map<string, string[][]>();
  private readonly failures = new Map<RemoteOperation, Error>();
  readonly calls: RemoteCall[] = [];

  constructor(initial: Record<string, string[][]> = {}) {
    for (const [name, rows] of Object.entries(initial)) {
      this.sheets.set(
        name,
        rows.map((row) => [...row])
      );
    }
  }

  /** Make every later call of `operation` reject with `error` until cleared. */
  failOn(operation: RemoteOperation, error: Error = new Error(`${operation} failed`)): void {
    this.failures.set(operation, error);
  }

  clearFailures(): void {
    this.failures.clear();
  }

  /** Current contents of a sheet, bypassing call recording. */
  peek(table: string): string[][] | undefined {
    const rows = this.sheets.get(table);
    return rows?.map((row) => [...row]);
  }

  callCount(operation: RemoteOperation, table?: string): number {
    return this.calls.filter(
      (call) => call.operation === operation && (table === undefined || call.table === table)
    ).length;
  }

  async fetchAll(table: string): Promise<string[][]> {
    return this.sheet("fetchAll", table).map((row) => [...row]);
  }

  async appendRow(table: string, values: string[]): Promise<void> {
    this.sheet("appendRow", table).push([...values]);
  }

  async updateRowRange(table: string, rowNumber: number, values: string[]): Promise<void> {
    const rows = this.sheet("updateRowRange", table);
    while (rows.length < rowNumber) rows.push([]);
    const existing = rows[rowNumber - 1];
    const updated = [...existing];
    values.forEach((value, index) => {
      updated[index] = value;
    });
    rows[rowNumber - 1] = updated;
  }

  async createSheet(table: string): Promise<void> {
    this.record("createSheet", table);
    if (!this.sheets.has(table)) {
      this.sheets.set(table, []);
    }
  }

  async setCellValue(
    table: string,
    rowNumber: number,
    columnNumber: number,
    value: string
  ): Promise<void> {
    const rows = this.sheet("setCellValue", table);
    while (rows.length < rowNumber) rows.push([]);
    const row = rows[rowNumber - 1];
    while (row.length < columnNumber - 1) row.push("");
    row[columnNumber - 1] = value;
  }

  async deleteRow(table: string, rowNumber: number): Promise<void> {
    const rows = this.sheet("deleteRow", table);
    rows.splice(rowNumber - 1, 1);
  }

  async deleteColumn(table: string, columnNumber: number): Promise<void> {
    const rows = this.sheet("deleteColumn", table);
    for (const row of rows) {
      row.splice(columnNumber - 1, 1);
    }
  }

  private record(operation: RemoteOperation, table: string): void {
    this.calls.push({ operation, table });
    const failure = this.failures.get(operation);
    if (failure) throw failure;
  }

  private sheet(operation: RemoteOperation, table: string): string[][] {
    this.record(operation, table);
    const rows = this.sheets.get(table);
    if (!rows) throw new TableNotFoundError(table);
    return rows;
  }
}
