import { differenceInYears, format, isValid, parse, parseISO } from "date-fns";

/** Textual date formats found in the roster, tried in order. */
const RECOGNIZED_FORMATS = ["yyyy-MM-dd", "dd.MM.yyyy", "dd/MM/yyyy", "yyyy/MM/dd", "dd-MM-yyyy"];

const DOTTED_DATE = /^(\d{1,2})\.(\d{1,2})\.(\d{4})$/;

// Anchor for date-fns parse; only fields missing from the pattern come from it
const REFERENCE_DATE = new Date(2000, 0, 1);

/**
 * Parse a cell in any recognized format. Calendar-invalid dates
 * (e.g. "1990-02-30") and unknown formats yield null.
 */
export function parseRosterDate(raw: string): Date | null {
  const text = raw.trim();
  if (!text) return null;

  for (const pattern of RECOGNIZED_FORMATS) {
    const parsed = parse(text, pattern, REFERENCE_DATE);
    if (isValid(parsed)) return parsed;
  }
  return null;
}

/** Display form DD.MM.YYYY; unparseable values are returned unchanged. */
export function formatRosterDate(raw: string): string {
  if (!raw) return "";
  const parsed = parseRosterDate(raw);
  return parsed ? format(parsed, "dd.MM.yyyy") : raw;
}

/**
 * Convert user input D.M.YYYY to the stored YYYY-MM-DD form.
 * Anything else is returned as typed.
 */
export function toStoredDate(value: string): string {
  const match = DOTTED_DATE.exec(value);
  if (!match) return value;
  const [, day, month, year] = match;
  return `${year}-${month.padStart(2, "0")}-${day.padStart(2, "0")}`;
}

/** Whole years elapsed since the birth date, or null when it does not parse. */
export function ageOn(birthDateRaw: string, today: Date): number | null {
  const birthDate = parseRosterDate(birthDateRaw);
  if (!birthDate) return null;
  return differenceInYears(today, birthDate);
}

const MONTH_NAMES = [
  "Январь",
  "Февраль",
  "Март",
  "Апрель",
  "Май",
  "Июнь",
  "Июль",
  "Август",
  "Сентябрь",
  "Октябрь",
  "Ноябрь",
  "Декабрь",
] as const;

export function monthName(month: number): string {
  return MONTH_NAMES[month - 1] ?? `Месяц ${month}`;
}

/**
 * Audit timestamp (ISO 8601) as `dd.MM.yy HH:mm` in UTC, the zone the
 * audit rows are written in. Null when the value is not a timestamp.
 */
export function formatLogTimestamp(iso: string): string | null {
  const date = parseISO(iso.trim());
  if (!isValid(date)) return null;

  const pad = (value: number) => String(value).padStart(2, "0");
  return (
    `${pad(date.getUTCDate())}.${pad(date.getUTCMonth() + 1)}.${pad(date.getUTCFullYear() % 100)} ` +
    `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}`
  );
}
