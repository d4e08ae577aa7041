/**
 * Button payloads. Chat platforms cap callback data (64 bytes on the most
 * restrictive one), so buttons carry positions into lists the flow already
 * knows (headers, choices, groups) instead of the names themselves.
 */

export const MAX_CALLBACK_BYTES = 64;

const SIMPLE_ACTIONS = [
  "mainMenu",
  "botMenu",
  "view",
  "edit",
  "create",
  "ask",
  "other",
  "birthdays",
  "homerooms",
  "backToLetters",
  "backToPeople",
  "addCategory",
  "save",
  "cancelBuilder",
  "backToBuilder",
  "adminPanel",
  "adminUsers",
  "adminStats",
  "adminLogs",
  "adminSummary",
  "adminAdd",
  "adminRemove",
  "adminReload",
] as const;

export type SimpleAction = (typeof SIMPLE_ACTIONS)[number];

export type CallbackAction =
  | { type: SimpleAction }
  | { type: "letter"; letter: string }
  | { type: "person"; rowNumber: number }
  /** Position in the main table's header row */
  | { type: "field"; index: number }
  /** Position in the fixed-choice list being shown */
  | { type: "choice"; index: number }
  | { type: "month"; month: number }
  /** Position in the session's homeroom group list */
  | { type: "group"; index: number };

const PARAMETRIZED = /^(letter|person|field|choice|month|group):(.+)$/;
const NUMBER = /^\d+$/;

function isSimpleAction(value: string): value is SimpleAction {
  return SIMPLE_ACTIONS.some((action) => action === value);
}

export function encodeAction(action: CallbackAction): string {
  let data: string;
  switch (action.type) {
    case "letter":
      data = `letter:${action.letter}`;
      break;
    case "person":
      data = `person:${action.rowNumber}`;
      break;
    case "field":
    case "choice":
    case "group":
      data = `${action.type}:${action.index}`;
      break;
    case "month":
      data = `month:${action.month}`;
      break;
    default:
      data = action.type;
  }

  if (Buffer.byteLength(data, "utf8") > MAX_CALLBACK_BYTES) {
    throw new RangeError(`Callback data too long: ${data}`);
  }
  return data;
}

/** Parse button data; null for anything this codec did not produce. */
export function decodeAction(data: string): CallbackAction | null {
  if (isSimpleAction(data)) {
    return { type: data };
  }

  const match = PARAMETRIZED.exec(data);
  if (!match) return null;
  const [, kind, value] = match;

  if (kind === "letter") {
    return [...value].length === 1 ? { type: "letter", letter: value } : null;
  }
  if (!NUMBER.test(value)) return null;

  const number = Number(value);
  switch (kind) {
    case "person":
      return { type: "person", rowNumber: number };
    case "field":
      return { type: "field", index: number };
    case "choice":
      return { type: "choice", index: number };
    case "month":
      return { type: "month", month: number };
    case "group":
      return { type: "group", index: number };
    default:
      return null;
  }
}
