export type Row = readonly string[];

export type CellValue = string | number | boolean | null | undefined;

/**
 * A record of the main table: the 1-based sheet row it lives on
 * (header is row 1) and its cells keyed by header.
 */
export interface RosterRecord {
  rowNumber: number;
  fields: Record<string, string>;
}

/** Convert a value to the text a re-fetch of the sheet would return. */
export function toCellText(value: CellValue): string {
  if (value === null || value === undefined) return "";
  return String(value);
}

export function toRowText(values: readonly CellValue[]): string[] {
  return values.map(toCellText);
}

/**
 * Immutable view of one sheet as fetched: header row plus body rows.
 *
 * The header index is built once per snapshot; every write produces a new
 * snapshot, so the index can never go stale against its own headers.
 */
export class TableSnapshot {
  readonly headers: readonly string[];
  private readonly columns: ReadonlyMap<string, number>;

  constructor(
    readonly name: string,
    readonly values: readonly Row[]
  ) {
    this.headers = values.length > 0 ? values[0] : [];
    const columns = new Map<string, number>();
    this.headers.forEach((header, index) => {
      if (!columns.has(header)) columns.set(header, index);
    });
    this.columns = columns;
  }

  static empty(name: string): TableSnapshot {
    return new TableSnapshot(name, []);
  }

  /** Rows including the header. The last row number equals this count. */
  get rowCount(): number {
    return this.values.length;
  }

  get recordCount(): number {
    return Math.max(0, this.values.length - 1);
  }

  /** Body rows without the header. */
  get body(): readonly Row[] {
    return this.values.slice(1);
  }

  hasColumn(column: string): boolean {
    return this.columns.has(column);
  }

  columnIndex(column: string): number | undefined {
    return this.columns.get(column);
  }

  /** Row by 1-based sheet row number, header included. */
  row(rowNumber: number): Row | undefined {
    if (!Number.isInteger(rowNumber) || rowNumber < 1) return undefined;
    return this.values[rowNumber - 1];
  }

  isRecordRow(rowNumber: number): boolean {
    return Number.isInteger(rowNumber) && rowNumber >= 2 && rowNumber <= this.values.length;
  }

  /** Cell text by column name; missing columns and short rows read as "". */
  cell(row: Row, column: string): string {
    const index = this.columns.get(column);
    if (index === undefined || index >= row.length) return "";
    return row[index] ?? "";
  }

  record(rowNumber: number): RosterRecord | undefined {
    if (!this.isRecordRow(rowNumber)) return undefined;
    const row = this.values[rowNumber - 1];
    const fields: Record<string, string> = {};
    this.headers.forEach((header, index) => {
      fields[header] = row[index] ?? "";
    });
    return { rowNumber, fields };
  }

  records(): RosterRecord[] {
    const result: RosterRecord[] = [];
    for (let rowNumber = 2; rowNumber <= this.values.length; rowNumber++) {
      const record = this.record(rowNumber);
      if (record) result.push(record);
    }
    return result;
  }

  withAppendedRow(row: Row): TableSnapshot {
    return new TableSnapshot(this.name, [...this.values, row]);
  }

  withReplacedRow(rowNumber: number, row: Row): TableSnapshot {
    const values = [...this.values];
    values[rowNumber - 1] = row;
    return new TableSnapshot(this.name, values);
  }
}
