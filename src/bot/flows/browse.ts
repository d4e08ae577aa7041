import { NotFoundError } from "../../domain/errors";
import { PersonEntry, rowNumberFromLabel } from "../../domain/roster";
import { BrowseMode, Session } from "../../domain/session";
import { FlowContext, Outcome, SessionIn, enter } from "../flow";
import { alphabetKeyboard, cardKeyboard, peopleKeyboard } from "../keyboards";
import {
  CHOOSE_LETTER,
  CHOOSE_PERSON,
  LABELS,
  PERSON_NOT_FOUND,
  ROSTER_EMPTY,
  cardText,
  noNamesForLetter,
} from "../texts";
import { startEdit } from "./builder";
import { showMainMenu, showStaleMenu } from "./mainMenu";

const LETTER = /^[А-ЯЁA-Z]$/i;

/** Browse mode of a session that is somewhere in the browse screens. */
export function browseMode(session: Session): BrowseMode | null {
  switch (session.state) {
    case "SELECTING_LETTER":
    case "SELECTING_PERSON":
    case "VIEWING_CARD":
      return session.mode;
    default:
      return null;
  }
}

function lastLetter(session: Session): string | null {
  if (session.state === "SELECTING_PERSON" || session.state === "VIEWING_CARD") {
    return session.lastLetter;
  }
  return null;
}

export async function showAlphabet(ctx: FlowContext, mode: BrowseMode): Promise<Outcome> {
  const letters = await ctx.services.roster.letters();
  if (letters.length === 0) {
    await ctx.reply.show({ text: ROSTER_EMPTY });
    return showMainMenu(ctx);
  }

  await ctx.reply.show({ text: CHOOSE_LETTER, keyboard: alphabetKeyboard(letters) });
  return enter(ctx, { state: "SELECTING_LETTER", mode });
}

export async function showPeople(ctx: FlowContext, mode: BrowseMode, letter: string): Promise<Outcome> {
  const people = await ctx.services.roster.peopleByLetter(letter);
  if (people.length === 0) {
    await ctx.reply.show({ text: noNamesForLetter(letter) });
    return showAlphabet(ctx, mode);
  }

  await ctx.reply.show({ text: CHOOSE_PERSON, keyboard: peopleKeyboard(people) });
  return enter(ctx, { state: "SELECTING_PERSON", mode, lastLetter: letter, people });
}

export async function showCard(
  ctx: FlowContext,
  rowNumber: number,
  letter: string | null
): Promise<Outcome> {
  const fields = await ctx.services.roster.card(rowNumber);
  await ctx.reply.show({ text: cardText(fields), keyboard: cardKeyboard() });
  return enter(ctx, { state: "VIEWING_CARD", mode: "VIEW_ONLY", lastLetter: letter, viewingRow: rowNumber });
}

// ============================================
// Button presses
// ============================================

export async function selectLetter(ctx: FlowContext, letter: string): Promise<Outcome> {
  const mode = browseMode(ctx.session);
  if (mode === null) return showStaleMenu(ctx);
  return showPeople(ctx, mode, letter.toUpperCase());
}

/**
 * Open the person picked from the list held in the session, after checking
 * the row still holds that person.
 */
export async function selectPerson(ctx: FlowContext, rowNumber: number): Promise<Outcome> {
  const session = ctx.session;
  if (session.state !== "SELECTING_PERSON") return showStaleMenu(ctx);

  const entry = session.people.find((person) => person.rowNumber === rowNumber);
  if (!entry || !(await stillListed(ctx, session.lastLetter, entry))) {
    await ctx.reply.show({ text: PERSON_NOT_FOUND });
    return showPeople(ctx, session.mode, session.lastLetter);
  }

  if (session.mode === "EDIT") {
    return startEdit(ctx, rowNumber, session.lastLetter);
  }
  return showCard(ctx, rowNumber, session.lastLetter);
}

async function stillListed(ctx: FlowContext, letter: string, entry: PersonEntry): Promise<boolean> {
  try {
    await ctx.services.roster.confirmPerson(letter, entry);
    return true;
  } catch (error) {
    if (error instanceof NotFoundError) return false;
    throw error;
  }
}

export async function backToLetters(ctx: FlowContext): Promise<Outcome> {
  const mode = browseMode(ctx.session);
  if (mode === null) return showStaleMenu(ctx);
  return showAlphabet(ctx, mode);
}

export async function backToPeople(ctx: FlowContext): Promise<Outcome> {
  const mode = browseMode(ctx.session);
  if (mode === null) return showStaleMenu(ctx);

  const letter = lastLetter(ctx.session);
  return letter ? showPeople(ctx, mode, letter) : showAlphabet(ctx, mode);
}

// ============================================
// Typed input
// ============================================

export async function handleLetterText(
  ctx: FlowContext,
  session: SessionIn<"SELECTING_LETTER">,
  text: string
): Promise<Outcome> {
  if (text === LABELS.back) {
    return showMainMenu(ctx);
  }
  if (LETTER.test(text)) {
    return showPeople(ctx, session.mode, text.toUpperCase());
  }
  return showAlphabet(ctx, session.mode);
}

export async function handlePersonText(
  ctx: FlowContext,
  session: SessionIn<"SELECTING_PERSON">,
  text: string
): Promise<Outcome> {
  if (text === LABELS.backToLetters) {
    return showAlphabet(ctx, session.mode);
  }

  const rowNumber = rowNumberFromLabel(text);
  if (rowNumber === null) {
    await ctx.reply.show({ text: PERSON_NOT_FOUND });
    return showPeople(ctx, session.mode, session.lastLetter);
  }
  return selectPerson(ctx, rowNumber);
}

export async function handleCardText(
  ctx: FlowContext,
  session: SessionIn<"VIEWING_CARD">,
  text: string
): Promise<Outcome> {
  if (text === LABELS.backToPeople) {
    return session.lastLetter
      ? showPeople(ctx, session.mode, session.lastLetter)
      : showAlphabet(ctx, session.mode);
  }
  if (text === LABELS.toMainMenu) {
    return showMainMenu(ctx);
  }
  return showCard(ctx, session.viewingRow, session.lastLetter);
}
