import { HomeroomGroup, PersonEntry } from "../domain/roster";
import { monthName } from "../domain/dates";
import { CallbackAction, encodeAction } from "./callbackData";
import { Button, Keyboard } from "./events";
import { LABELS, fieldLabel, groupButtonLabel } from "./texts";

function button(text: string, action: CallbackAction): Button {
  return { text, data: encodeAction(action) };
}

function chunk<T>(items: readonly T[], size: number): T[][] {
  const rows: T[][] = [];
  for (let start = 0; start < items.length; start += size) {
    rows.push(items.slice(start, start + size));
  }
  return rows;
}

const toMainMenu = (label: string = LABELS.mainMenu) => [button(label, { type: "mainMenu" })];

// ============================================
// Menus
// ============================================

export function mainMenuKeyboard(options: { webAppUrl: string | null; isAdmin: boolean }): Keyboard {
  const rows: Keyboard = [];
  if (options.webAppUrl) {
    rows.push([{ text: LABELS.openMiniApp, webAppUrl: options.webAppUrl }]);
  }
  rows.push([button(LABELS.botMenu, { type: "botMenu" })]);
  if (options.isAdmin) {
    rows.push([button(LABELS.adminPanel, { type: "adminPanel" })]);
  }
  return rows;
}

export function botMenuKeyboard(): Keyboard {
  return [
    [button(LABELS.view, { type: "view" })],
    [button(LABELS.edit, { type: "edit" })],
    [button(LABELS.create, { type: "create" })],
    [button(LABELS.ask, { type: "ask" })],
    [button(LABELS.other, { type: "other" })],
    toMainMenu(LABELS.back),
  ];
}

// ============================================
// Browsing
// ============================================

export function alphabetKeyboard(letters: readonly string[]): Keyboard {
  return [
    ...chunk(
      letters.map((letter) => button(letter, { type: "letter", letter })),
      5
    ),
    toMainMenu(LABELS.back),
  ];
}

export function peopleKeyboard(people: readonly PersonEntry[]): Keyboard {
  return [
    ...people.map((person) => [button(person.display, { type: "person", rowNumber: person.rowNumber })]),
    [button(LABELS.backToLetters, { type: "backToLetters" })],
  ];
}

export function cardKeyboard(): Keyboard {
  return [[button(LABELS.backToPeople, { type: "backToPeople" })], toMainMenu(LABELS.toMainMenu)];
}

// ============================================
// Builder
// ============================================

export function builderKeyboard(
  headers: readonly string[],
  draft: Readonly<Record<string, string>>,
  isDateColumn: (header: string) => boolean
): Keyboard {
  return [
    ...headers.map((header, index) => [
      button(fieldLabel(header, draft[header], isDateColumn(header)), { type: "field", index }),
    ]),
    [button(LABELS.addCategory, { type: "addCategory" })],
    [button(LABELS.save, { type: "save" }), button(LABELS.cancel, { type: "cancelBuilder" })],
  ];
}

export function choiceKeyboard(values: readonly string[]): Keyboard {
  return [
    ...chunk(
      values.map((value, index) => button(value, { type: "choice", index })),
      2
    ),
    [button(LABELS.back, { type: "backToBuilder" })],
  ];
}

// ============================================
// Admin
// ============================================

export function adminMenuKeyboard(): Keyboard {
  return [
    [button(LABELS.adminUsers, { type: "adminUsers" })],
    [button(LABELS.adminStats, { type: "adminStats" })],
    [button(LABELS.adminLogs, { type: "adminLogs" })],
    [button(LABELS.adminSummary, { type: "adminSummary" })],
    [button(LABELS.adminAdd, { type: "adminAdd" })],
    [button(LABELS.adminRemove, { type: "adminRemove" })],
    [button(LABELS.adminReload, { type: "adminReload" })],
    toMainMenu(),
  ];
}

/** Under admin result screens. */
export function adminResultKeyboard(): Keyboard {
  return [[button(LABELS.backToAdmin, { type: "adminPanel" })], toMainMenu()];
}

/** Under admin prompts and failures. */
export function adminBackKeyboard(): Keyboard {
  return [[button(LABELS.back, { type: "adminPanel" })]];
}

// ============================================
// Other
// ============================================

export function otherMenuKeyboard(): Keyboard {
  return [
    [button(LABELS.homerooms, { type: "homerooms" })],
    [button(LABELS.birthdays, { type: "birthdays" })],
    toMainMenu(LABELS.back),
  ];
}

export function monthKeyboard(): Keyboard {
  const months = Array.from({ length: 12 }, (_, index) => index + 1);
  return [
    ...chunk(
      months.map((month) => button(monthName(month), { type: "month", month })),
      3
    ),
    [button(LABELS.back, { type: "other" })],
  ];
}

export function birthdaysKeyboard(): Keyboard {
  return [[button(LABELS.backToMonths, { type: "birthdays" })], toMainMenu()];
}

export function homeroomGroupsKeyboard(groups: readonly HomeroomGroup[]): Keyboard {
  return [
    ...chunk(
      groups.map((group, index) => button(groupButtonLabel(group), { type: "group", index })),
      2
    ),
    [button(LABELS.back, { type: "other" })],
  ];
}

export function homeroomKeyboard(): Keyboard {
  return [[button(LABELS.backToHomerooms, { type: "homerooms" })], toMainMenu()];
}
