import { RosterSchema } from "../config";
import { ageOn, formatRosterDate, parseRosterDate, toStoredDate } from "./dates";
import { NotFoundError } from "./errors";
import { TableSnapshot } from "./table";

/** An entry of the person picker: label plus the row it points at. */
export interface PersonEntry {
  label: string;
  rowNumber: number;
  /** Button text, `label [#row]` */
  display: string;
}

export interface BirthdayEntry {
  name: string;
  day: number;
  year: number;
  rowNumber: number;
}

/** Month number (1-12) to that month's birthdays, ordered by day. */
export type BirthdayIndex = Map<number, BirthdayEntry[]>;

export interface HomeroomMember {
  name: string;
  rowNumber: number;
  /** Full years, or null when the birth date does not parse */
  age: number | null;
  status: string;
}

export interface HomeroomGroup {
  name: string;
  members: HomeroomMember[];
}

export interface CardField {
  header: string;
  value: string;
}

export type Draft = Readonly<Record<string, string>>;

const LETTER = /^[А-ЯЁA-Z]$/;

function requireColumn(table: TableSnapshot, column: string): void {
  if (!table.hasColumn(column)) {
    throw new NotFoundError(`Column "${column}" not found`, { table: table.name });
  }
}

function fullName(first: string, last: string): string {
  return `${first} ${last}`.trim();
}

/** Distinct uppercase first letters of first names, sorted. */
export function firstLetters(table: TableSnapshot, schema: RosterSchema): string[] {
  requireColumn(table, schema.firstNameColumn);

  const letters = new Set<string>();
  for (const row of table.body) {
    const name = table.cell(row, schema.firstNameColumn).trim();
    if (!name) continue;
    const letter = name[0].toUpperCase();
    if (LETTER.test(letter)) letters.add(letter);
  }
  return [...letters].sort();
}

/**
 * Records whose first name starts with the letter (case-insensitive).
 * Namesakes (same first and last name) get their birth date appended.
 */
export function peopleByLetter(
  table: TableSnapshot,
  schema: RosterSchema,
  letter: string
): PersonEntry[] {
  requireColumn(table, schema.firstNameColumn);

  const prefix = letter.toUpperCase();
  const matches: { first: string; last: string; birth: string; rowNumber: number }[] = [];

  table.body.forEach((row, index) => {
    const first = table.cell(row, schema.firstNameColumn).trim();
    if (!first || !first.toUpperCase().startsWith(prefix)) return;
    matches.push({
      first,
      last: table.cell(row, schema.lastNameColumn).trim(),
      birth: table.cell(row, schema.birthDateColumn).trim(),
      rowNumber: index + 2,
    });
  });

  const namesakeCounts = new Map<string, number>();
  for (const match of matches) {
    const key = `${match.first.toLowerCase()}_${match.last.toLowerCase()}`;
    namesakeCounts.set(key, (namesakeCounts.get(key) ?? 0) + 1);
  }

  return matches.map((match) => {
    const key = `${match.first.toLowerCase()}_${match.last.toLowerCase()}`;
    let label = fullName(match.first, match.last);
    if ((namesakeCounts.get(key) ?? 0) > 1 && match.birth) {
      label = `${label} (р. ${formatRosterDate(match.birth)})`;
    }
    return { label, rowNumber: match.rowNumber, display: `${label} [#${match.rowNumber}]` };
  });
}

/** Row number from a `... [#N]` label, or null. */
export function rowNumberFromLabel(text: string): number | null {
  const match = /\[#(\d+)\]$/.exec(text.trim());
  return match ? Number(match[1]) : null;
}

/** Non-empty fields of a record in header order, dates in display form. */
export function cardFields(
  table: TableSnapshot,
  schema: RosterSchema,
  rowNumber: number
): CardField[] {
  const row = table.row(rowNumber);
  if (!row || !table.isRecordRow(rowNumber)) {
    throw new NotFoundError(`Record #${rowNumber} not found`, { table: table.name, rowNumber });
  }

  const fields: CardField[] = [];
  table.headers.forEach((header, index) => {
    const value = (row[index] ?? "").trim();
    if (!value) return;
    fields.push({
      header,
      value: schema.dateColumns.includes(header) ? formatRosterDate(value) : value,
    });
  });
  return fields;
}

/** Draft pre-filled with a record's non-empty cells. */
export function draftFromRow(table: TableSnapshot, rowNumber: number): Record<string, string> {
  const row = table.row(rowNumber);
  if (!row || !table.isRecordRow(rowNumber)) {
    throw new NotFoundError(`Record #${rowNumber} not found`, { table: table.name, rowNumber });
  }

  const draft: Record<string, string> = {};
  table.headers.forEach((header, index) => {
    const value = row[index] ?? "";
    if (value.trim()) draft[header] = value;
  });
  return draft;
}

/**
 * Assemble a full row in header order. Fields absent from the draft are
 * empty; D.M.YYYY values in date columns are stored as YYYY-MM-DD.
 */
export function rowFromDraft(
  headers: readonly string[],
  draft: Draft,
  dateColumns: readonly string[]
): string[] {
  return headers.map((header) => {
    const value = draft[header] ?? "";
    if (value && dateColumns.includes(header)) {
      return toStoredDate(value);
    }
    return value;
  });
}

/** Identity used to detect that a row was replaced under a held row number. */
export function recordIdentity(table: TableSnapshot, schema: RosterSchema, rowNumber: number): string | null {
  const row = table.row(rowNumber);
  if (!row || !table.isRecordRow(rowNumber)) return null;
  return fullName(
    table.cell(row, schema.firstNameColumn).trim(),
    table.cell(row, schema.lastNameColumn).trim()
  );
}

/**
 * Birthdays grouped by month, each month ordered by day of month.
 * Blank or unparseable birth dates are skipped.
 */
export function birthdayIndex(table: TableSnapshot, schema: RosterSchema): BirthdayIndex {
  const index: BirthdayIndex = new Map();
  if (
    !table.hasColumn(schema.firstNameColumn) ||
    !table.hasColumn(schema.lastNameColumn) ||
    !table.hasColumn(schema.birthDateColumn)
  ) {
    return index;
  }

  table.body.forEach((row, position) => {
    const birthDate = parseRosterDate(table.cell(row, schema.birthDateColumn));
    if (!birthDate) return;

    const month = birthDate.getMonth() + 1;
    const entries = index.get(month) ?? [];
    entries.push({
      name: fullName(
        table.cell(row, schema.firstNameColumn).trim(),
        table.cell(row, schema.lastNameColumn).trim()
      ),
      day: birthDate.getDate(),
      year: birthDate.getFullYear(),
      rowNumber: position + 2,
    });
    index.set(month, entries);
  });

  for (const entries of index.values()) {
    entries.sort((a, b) => a.day - b.day);
  }
  return index;
}

/**
 * Members grouped by homeroom. Configured groups come first in configured
 * order, groups only found in the data follow; empty groups are dropped.
 */
export function homeroomGroups(
  table: TableSnapshot,
  schema: RosterSchema,
  today: Date
): HomeroomGroup[] {
  const required = [
    schema.firstNameColumn,
    schema.lastNameColumn,
    schema.groupColumn,
    schema.birthDateColumn,
    schema.statusColumn,
  ];
  if (!required.every((column) => table.hasColumn(column))) {
    return [];
  }

  const groups = new Map<string, HomeroomMember[]>();
  for (const name of schema.groupValues) {
    groups.set(name, []);
  }

  table.body.forEach((row, position) => {
    const name = fullName(
      table.cell(row, schema.firstNameColumn).trim(),
      table.cell(row, schema.lastNameColumn).trim()
    );
    if (!name) return;

    const groupName = table.cell(row, schema.groupColumn).trim() || schema.unassignedGroup;
    const members = groups.get(groupName) ?? [];
    members.push({
      name,
      rowNumber: position + 2,
      age: ageOn(table.cell(row, schema.birthDateColumn), today),
      status: table.cell(row, schema.statusColumn).trim(),
    });
    groups.set(groupName, members);
  });

  const result: HomeroomGroup[] = [];
  for (const [name, members] of groups) {
    if (members.length === 0) continue;
    members.sort((a, b) => a.name.localeCompare(b.name, "ru"));
    result.push({ name, members });
  }
  return result;
}
