/**
 * Roster Service
 *
 * Reads and writes of the main table shared by the chat flows and the
 * mini-app API:
 * - alphabet, person lists and cards
 * - builder drafts and their save (append or overwrite)
 * - birthday and homeroom views
 * - record, photo and column maintenance
 *
 * Row numbers held by callers are re-checked against the current table
 * before use; a delete drops the cached table, so the check sees it.
 */

import { RosterSchema } from "../config";
import { NotFoundError, ValidationError } from "../domain/errors";
import {
  BirthdayEntry,
  CardField,
  Draft,
  HomeroomGroup,
  PersonEntry,
  birthdayIndex,
  cardFields,
  draftFromRow,
  firstLetters,
  homeroomGroups,
  peopleByLetter,
  recordIdentity,
  rowFromDraft,
} from "../domain/roster";
import { CellValue, TableSnapshot } from "../domain/table";
import { logger } from "../lib/logger";
import { TableCache } from "../stores/tableCache";
import { AssistantAnswer, QueryAssistant } from "./queryAssistant";

const log = logger.child("roster");

// ============================================
// Types
// ============================================

/** A record as served to the mini-app: its cells plus `row_index`. */
export type PersonRecord = Record<string, string | number> & { row_index: number };

export interface EditTarget {
  rowNumber: number;
  draft: Record<string, string>;
  /** Name on the row when editing starts; saveDraft() checks it is unchanged */
  identity: string;
}

export type SaveTarget = { mode: "CREATE" } | { mode: "EDIT"; rowNumber: number; identity: string };

export interface ClientConfig {
  homeroom_values: readonly string[];
  status_values: readonly string[];
  date_columns: readonly string[];
}

export interface RosterServiceOptions {
  table: string;
  schema: RosterSchema;
  now?: () => Date;
}

// ============================================
// Service
// ============================================

export class RosterService {
  readonly schema: RosterSchema;
  private readonly table: string;
  private readonly now: () => Date;

  constructor(
    private readonly cache: TableCache,
    private readonly assistant: QueryAssistant,
    options: RosterServiceOptions
  ) {
    this.table = options.table;
    this.schema = options.schema;
    this.now = options.now ?? (() => new Date());
  }

  get tableName(): string {
    return this.table;
  }

  getTable(): Promise<TableSnapshot> {
    return this.cache.getTable(this.table);
  }

  getHeaders(): Promise<readonly string[]> {
    return this.cache.getHeaders(this.table);
  }

  isDateColumn(column: string): boolean {
    return this.schema.dateColumns.includes(column);
  }

  /** Choices for a fixed-choice column, or null for free-text columns. */
  choicesFor(column: string): readonly string[] | null {
    if (column === this.schema.groupColumn) return this.schema.groupValues;
    if (column === this.schema.statusColumn) return this.schema.statusValues;
    return null;
  }

  async letters(): Promise<string[]> {
    return firstLetters(await this.getTable(), this.schema);
  }

  async peopleByLetter(letter: string): Promise<PersonEntry[]> {
    return peopleByLetter(await this.getTable(), this.schema, letter);
  }

  /**
   * Re-check a picker entry held in a session against the current table.
   * Rejects with NotFoundError once the row no longer carries that person.
   */
  async confirmPerson(letter: string, entry: PersonEntry): Promise<void> {
    const current = await this.peopleByLetter(letter);
    const unchanged = current.some(
      (person) => person.rowNumber === entry.rowNumber && person.label === entry.label
    );
    if (!unchanged) {
      throw new NotFoundError(`Record #${entry.rowNumber} no longer holds "${entry.label}"`, {
        table: this.table,
        rowNumber: entry.rowNumber,
      });
    }
  }

  async card(rowNumber: number): Promise<CardField[]> {
    return cardFields(await this.getTable(), this.schema, rowNumber);
  }

  async startEdit(rowNumber: number): Promise<EditTarget> {
    const table = await this.getTable();
    const draft = draftFromRow(table, rowNumber);
    return {
      rowNumber,
      draft,
      identity: recordIdentity(table, this.schema, rowNumber) ?? "",
    };
  }

  /**
   * Write a builder draft: append for CREATE, overwrite for EDIT.
   * Returns the row number written.
   */
  async saveDraft(draft: Draft, target: SaveTarget): Promise<number> {
    const table = await this.getTable();
    const row = rowFromDraft(table.headers, draft, this.schema.dateColumns);

    if (target.mode === "CREATE") {
      const rowNumber = await this.cache.appendRow(this.table, row);
      log.info("Record created", { rowNumber });
      return rowNumber;
    }

    const current = recordIdentity(table, this.schema, target.rowNumber);
    if (current === null) {
      throw new NotFoundError(`Record #${target.rowNumber} not found`, {
        table: this.table,
        rowNumber: target.rowNumber,
      });
    }
    if (current !== target.identity) {
      throw new ValidationError(`Record #${target.rowNumber} changed while it was being edited`, {
        table: this.table,
        rowNumber: target.rowNumber,
      });
    }

    await this.cache.updateRow(this.table, target.rowNumber, row);
    log.info("Record updated", { rowNumber: target.rowNumber });
    return target.rowNumber;
  }

  /** Add a column to the main table. Returns false if it already exists. */
  async addColumn(name: string): Promise<boolean> {
    const column = name.trim();
    if (!column) {
      throw new ValidationError("Column name is empty", { table: this.table });
    }
    return this.cache.addColumn(this.table, column);
  }

  async deleteColumn(name: string): Promise<void> {
    await this.cache.deleteColumn(this.table, name);
  }

  async birthdays(): Promise<Map<number, BirthdayEntry[]>> {
    return birthdayIndex(await this.getTable(), this.schema);
  }

  async birthdaysInMonth(month: number): Promise<BirthdayEntry[]> {
    return (await this.birthdays()).get(month) ?? [];
  }

  async homerooms(): Promise<HomeroomGroup[]> {
    return homeroomGroups(await this.getTable(), this.schema, this.now());
  }

  /** Put a question about the whole main table to the assistant. */
  async ask(question: string): Promise<AssistantAnswer | null> {
    const table = await this.getTable();
    if (table.recordCount === 0) return null;
    return this.assistant.ask(question, table.headers, table.body);
  }

  async summarize(): Promise<{ summary: string; records: number; columns: number }> {
    const table = await this.getTable();
    const summary = await this.assistant.summarize(table.headers, table.body);
    return { summary, records: table.recordCount, columns: table.headers.length };
  }

  // ============================================
  // Mini-app record operations
  // ============================================

  async listPeople(): Promise<PersonRecord[]> {
    const table = await this.getTable();
    return table.records().map((record) => ({ ...record.fields, row_index: record.rowNumber }));
  }

  async createPerson(values: readonly CellValue[]): Promise<number> {
    const table = await this.getTable();
    this.checkWidth(table, values);
    const rowNumber = await this.cache.appendRow(this.table, values);
    log.info("Record created", { rowNumber });
    return rowNumber;
  }

  async updatePerson(rowNumber: number, values: readonly CellValue[]): Promise<void> {
    const table = await this.getTable();
    this.requireRecord(table, rowNumber);
    this.checkWidth(table, values);
    await this.cache.updateRow(this.table, rowNumber, values);
    log.info("Record updated", { rowNumber });
  }

  async deletePerson(rowNumber: number): Promise<void> {
    this.requireRecord(await this.getTable(), rowNumber);
    await this.cache.deleteRow(this.table, rowNumber);
    log.info("Record deleted", { rowNumber });
  }

  /** Store a photo reference in the photo column, adding the column if needed. */
  async setPhoto(rowNumber: number, url: string): Promise<void> {
    this.requireRecord(await this.getTable(), rowNumber);
    await this.cache.addColumn(this.table, this.schema.photoColumn);

    const table = await this.getTable();
    const row = this.requireRecord(table, rowNumber);
    const index = table.columnIndex(this.schema.photoColumn);
    if (index === undefined) {
      throw new NotFoundError(`Column "${this.schema.photoColumn}" not found`, { table: this.table });
    }

    const values: string[] = table.headers.map((_, column) => row[column] ?? "");
    values[index] = url;
    await this.cache.updateRow(this.table, rowNumber, values);
    log.info("Photo stored", { rowNumber });
  }

  clientConfig(): ClientConfig {
    return {
      homeroom_values: this.schema.groupValues,
      status_values: this.schema.statusValues,
      date_columns: this.schema.dateColumns,
    };
  }

  private requireRecord(table: TableSnapshot, rowNumber: number): readonly string[] {
    const row = table.row(rowNumber);
    if (!row || !table.isRecordRow(rowNumber)) {
      throw new NotFoundError(`Record #${rowNumber} not found`, { table: this.table, rowNumber });
    }
    return row;
  }

  private checkWidth(table: TableSnapshot, values: readonly CellValue[]): void {
    if (values.length > table.headers.length) {
      throw new ValidationError(
        `Row has ${values.length} values but the table has ${table.headers.length} columns`,
        { table: this.table }
      );
    }
  }
}
