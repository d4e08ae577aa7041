import { AppError, BackingStoreError, NotFoundError, TableNotFoundError, errorMessage } from "../domain/errors";
import { CellValue, TableSnapshot, toRowText } from "../domain/table";
import { KeyedLock } from "../lib/keyedLock";
import { logger } from "../lib/logger";
import { RemoteTabularStore } from "./remoteTabularStore";

const log = logger.child("tableCache");

export interface TableCacheOptions {
  /** Tables refreshed by refresh() with no argument, besides those already cached */
  knownTables: readonly string[];
  /** Header row written into a table the cache has to create */
  initialHeaders?: Readonly<Record<string, readonly string[]>>;
}

/**
 * Read-through, write-through cache of whole sheets.
 *
 * Reads serve the last complete snapshot of a table, even while a refresh of
 * it is running. Writes to one table are serialized; each write replaces the
 * snapshot instead of patching it, so readers never see a half-applied row.
 */
export class TableCache {
  private readonly snapshots = new Map<string, TableSnapshot>();
  private readonly pendingFetches = new Map<string, Promise<TableSnapshot>>();
  private readonly writers = new KeyedLock<string>();
  // Bumped when a write makes in-flight fetches of the table stale
  private readonly generations = new Map<string, number>();

  constructor(
    private readonly remote: RemoteTabularStore,
    private readonly options: TableCacheOptions
  ) {}

  async getTable(name: string): Promise<TableSnapshot> {
    const cached = this.snapshots.get(name);
    if (cached) return cached;
    return this.load(name);
  }

  async getHeaders(name: string): Promise<readonly string[]> {
    const table = await this.getTable(name);
    return table.headers;
  }

  isCached(name: string): boolean {
    return this.snapshots.has(name);
  }

  /**
   * Append a row and return the table's new row count, which is the new
   * row's number. The cached copy is patched with the text form of the values.
   * A table not cached yet is loaded first, which creates a missing sheet.
   */
  async appendRow(name: string, values: readonly CellValue[]): Promise<number> {
    const row = toRowText(values);
    return this.writers.run(name, async () => {
      const before = this.snapshots.get(name) ?? (await this.load(name));
      await this.callRemote(name, "append row", () => this.remote.appendRow(name, row));

      const updated = before.withAppendedRow(row);
      this.snapshots.set(name, updated);
      log.debug("Row appended", { table: name, rows: updated.rowCount });
      return updated.rowCount;
    });
  }

  async updateRow(name: string, rowNumber: number, values: readonly CellValue[]): Promise<void> {
    const row = toRowText(values);
    await this.writers.run(name, async () => {
      await this.callRemote(name, `update row ${rowNumber}`, () =>
        this.remote.updateRowRange(name, rowNumber, row)
      );

      const cached = this.snapshots.get(name);
      if (cached && rowNumber >= 1 && rowNumber <= cached.rowCount) {
        this.snapshots.set(name, cached.withReplacedRow(rowNumber, row));
      } else {
        await this.fetchInto(name);
      }
      log.debug("Row updated", { table: name, rowNumber });
    });
  }

  /**
   * Delete a row remotely. Rows below it move up, so the cached copy is
   * dropped and the next read fetches the table again.
   */
  async deleteRow(name: string, rowNumber: number): Promise<void> {
    await this.writers.run(name, async () => {
      await this.callRemote(name, `delete row ${rowNumber}`, () =>
        this.remote.deleteRow(name, rowNumber)
      );
      this.invalidate(name);
      log.info("Row deleted", { table: name, rowNumber });
    });
  }

  async deleteColumn(name: string, columnName: string): Promise<void> {
    await this.writers.run(name, async () => {
      const table = await this.getTable(name);
      const index = table.columnIndex(columnName);
      if (index === undefined) {
        throw new NotFoundError(`Column "${columnName}" not found`, { table: name });
      }
      await this.callRemote(name, `delete column ${columnName}`, () =>
        this.remote.deleteColumn(name, index + 1)
      );
      this.invalidate(name);
      log.info("Column deleted", { table: name, column: columnName });
    });
  }

  /** Add a header cell. Returns false, writing nothing, if the column exists. */
  async addColumn(name: string, columnName: string): Promise<boolean> {
    return this.writers.run(name, async () => {
      const headers = (await this.getTable(name)).headers;
      if (headers.includes(columnName)) return false;

      await this.callRemote(name, `add column ${columnName}`, () =>
        this.remote.setCellValue(name, 1, headers.length + 1, columnName)
      );
      await this.fetchInto(name);
      log.info("Column added", { table: name, column: columnName });
      return true;
    });
  }

  /** Re-fetch one table and return its row count. */
  async refresh(name: string): Promise<number>;
  /** Re-fetch every known or cached table; failures are logged and skipped. Returns total rows. */
  async refresh(): Promise<number>;
  async refresh(name?: string): Promise<number> {
    if (name !== undefined) {
      const snapshot = await this.writers.run(name, () => this.fetchInto(name));
      log.info("Cache refreshed", { table: name, rows: snapshot.rowCount });
      return snapshot.rowCount;
    }

    const names = new Set([...this.options.knownTables, ...this.snapshots.keys()]);
    let total = 0;
    for (const table of names) {
      try {
        total += await this.refresh(table);
      } catch (error) {
        log.warn("Refresh skipped", { table, error: errorMessage(error) });
      }
    }
    log.info("All caches refreshed", { tables: names.size, rows: total });
    return total;
  }

  private async load(name: string): Promise<TableSnapshot> {
    const pending = this.pendingFetches.get(name);
    if (pending) return pending;

    const fetch = this.fetchUnlessOvertaken(name);
    this.pendingFetches.set(name, fetch);
    try {
      return await fetch;
    } finally {
      this.pendingFetches.delete(name);
    }
  }

  /**
   * Fetch for a cold read. A write may replace the entry while the fetch is in
   * flight, and a delete makes its rows stale; in that case the result is
   * not stored.
   */
  private async fetchUnlessOvertaken(name: string): Promise<TableSnapshot> {
    for (;;) {
      const generation = this.generation(name);
      const snapshot = await this.fetch(name);
      const current = this.snapshots.get(name);
      if (current) return current;
      if (generation === this.generation(name)) {
        this.snapshots.set(name, snapshot);
        return snapshot;
      }
      log.debug("Discarding fetch overtaken by a delete", { table: name });
    }
  }

  private async fetchInto(name: string): Promise<TableSnapshot> {
    const snapshot = await this.fetch(name);
    this.snapshots.set(name, snapshot);
    return snapshot;
  }

  private generation(name: string): number {
    return this.generations.get(name) ?? 0;
  }

  private invalidate(name: string): void {
    this.snapshots.delete(name);
    this.generations.set(name, this.generation(name) + 1);
  }

  private async fetch(name: string): Promise<TableSnapshot> {
    try {
      return new TableSnapshot(name, await this.remote.fetchAll(name));
    } catch (error) {
      if (error instanceof TableNotFoundError) {
        return this.createTable(name);
      }
      throw this.wrap(name, "fetch", error);
    }
  }

  private async createTable(name: string): Promise<TableSnapshot> {
    const header = this.options.initialHeaders?.[name];
    await this.callRemote(name, "create sheet", () => this.remote.createSheet(name));
    if (header && header.length > 0) {
      await this.callRemote(name, "write header", () => this.remote.appendRow(name, [...header]));
      return new TableSnapshot(name, [[...header]]);
    }
    return TableSnapshot.empty(name);
  }

  private async callRemote(name: string, action: string, call: () => Promise<void>): Promise<void> {
    try {
      await call();
    } catch (error) {
      throw this.wrap(name, action, error);
    }
  }

  private wrap(name: string, action: string, error: unknown): AppError {
    if (error instanceof AppError) return error;
    log.error(`Remote ${action} failed`, error, { table: name });
    return new BackingStoreError(`Failed to ${action} in table "${name}"`, {
      table: name,
      cause: error,
    });
  }
}
