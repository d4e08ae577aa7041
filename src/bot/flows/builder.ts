/**
 * Builder mode: a draft edited field by field, then appended (CREATE) or
 * written over the row it was loaded from (EDIT).
 *
 * Group and status take a value from the configured list; every other
 * field takes free text, stored as typed. Dates typed as D.M.YYYY are
 * converted when the draft is saved.
 */

import { BuilderPhase, BuilderStep, ChoiceField } from "../../domain/session";
import { SaveTarget } from "../../services/rosterService";
import { FlowContext, KEEP, Outcome, SessionIn, enter } from "../flow";
import { builderKeyboard, choiceKeyboard } from "../keyboards";
import {
  CARD_CREATED,
  CARD_UPDATED,
  LABELS,
  NEW_CATEGORY_PROMPT,
  builderHeader,
  categoryAdded,
  categoryExists,
  choicePrompt,
  invalidChoice,
  valuePrompt,
} from "../texts";
import { showMainMenu, showStaleMenu } from "./mainMenu";

type BuilderSession = SessionIn<"BUILDER_MODE">;
type SelectionStep = Extract<BuilderStep, { choice: ChoiceField }>;

const MENU: BuilderStep = { name: "MENU" };

function isSelectionStep(step: BuilderStep): step is SelectionStep {
  return step.name === "WAITING_GROUP_SELECTION" || step.name === "WAITING_STATUS_SELECTION";
}

function withStep(phase: BuilderPhase, step: BuilderStep): BuilderPhase {
  return { ...phase, step };
}

function withValue(phase: BuilderPhase, field: string, value: string): BuilderPhase {
  return { ...phase, draft: { ...phase.draft, [field]: value } };
}

function choiceFieldOf(ctx: FlowContext, field: string): ChoiceField | null {
  const schema = ctx.services.roster.schema;
  if (field === schema.groupColumn) return "GROUP";
  if (field === schema.statusColumn) return "STATUS";
  return null;
}

function selectionStep(choice: ChoiceField, field: string): SelectionStep {
  return choice === "GROUP"
    ? { name: "WAITING_GROUP_SELECTION", field, choice }
    : { name: "WAITING_STATUS_SELECTION", field, choice };
}

// ============================================
// Entry points
// ============================================

export async function startCreate(ctx: FlowContext): Promise<Outcome> {
  return showBuilderMenu(ctx, { state: "BUILDER_MODE", mode: "CREATE", draft: {}, step: MENU, fields: [] });
}

export async function startEdit(
  ctx: FlowContext,
  rowNumber: number,
  lastLetter: string | null
): Promise<Outcome> {
  const target = await ctx.services.roster.startEdit(rowNumber);
  return showBuilderMenu(ctx, {
    state: "BUILDER_MODE",
    mode: "EDIT",
    draft: target.draft,
    step: MENU,
    fields: [],
    editingRow: target.rowNumber,
    editingIdentity: target.identity,
    lastLetter,
  });
}

export async function showBuilderMenu(ctx: FlowContext, phase: BuilderPhase): Promise<Outcome> {
  const roster = ctx.services.roster;
  const headers = await roster.getHeaders();
  await ctx.reply.show({
    text: builderHeader(phase.mode),
    keyboard: builderKeyboard(headers, phase.draft, (header) => roster.isDateColumn(header)),
  });
  return enter(ctx, { ...phase, step: MENU, fields: headers });
}

async function promptField(ctx: FlowContext, phase: BuilderPhase, field: string): Promise<Outcome> {
  const roster = ctx.services.roster;
  const choice = choiceFieldOf(ctx, field);
  const current = phase.draft[field];

  if (choice !== null) {
    await ctx.reply.show({
      text: choicePrompt(field, current),
      keyboard: choiceKeyboard(roster.choicesFor(field) ?? []),
    });
    return enter(ctx, withStep(phase, selectionStep(choice, field)));
  }

  await ctx.reply.show({ text: valuePrompt(field, current, roster.isDateColumn(field)) });
  return enter(ctx, withStep(phase, { name: "WAITING_VALUE", field }));
}

// ============================================
// Button presses
// ============================================

/**
 * Field buttons carry positions in the header row they were built from.
 * A column added or removed since then shows the menu again instead.
 */
export async function selectField(ctx: FlowContext, index: number): Promise<Outcome> {
  const session = ctx.session;
  if (session.state !== "BUILDER_MODE") return showStaleMenu(ctx);

  const headers = await ctx.services.roster.getHeaders();
  const field = session.fields[index];
  if (field === undefined || headers[index] !== field || headers.length !== session.fields.length) {
    return showBuilderMenu(ctx, session);
  }
  return promptField(ctx, session, field);
}

export async function selectChoice(ctx: FlowContext, index: number): Promise<Outcome> {
  const session = ctx.session;
  if (session.state !== "BUILDER_MODE" || !isSelectionStep(session.step)) {
    return showStaleMenu(ctx);
  }

  const { field } = session.step;
  const choices = ctx.services.roster.choicesFor(field) ?? [];
  const value = choices[index];
  if (value === undefined) {
    await ctx.reply.show({ text: invalidChoice(field) });
    await ctx.reply.show({ text: choicePrompt(field, session.draft[field]), keyboard: choiceKeyboard(choices) });
    return KEEP;
  }
  return showBuilderMenu(ctx, withValue(session, field, value));
}

export async function backToBuilder(ctx: FlowContext): Promise<Outcome> {
  const session = ctx.session;
  if (session.state !== "BUILDER_MODE") return showStaleMenu(ctx);
  return showBuilderMenu(ctx, session);
}

export async function askNewCategory(ctx: FlowContext): Promise<Outcome> {
  const session = ctx.session;
  if (session.state !== "BUILDER_MODE") return showStaleMenu(ctx);

  await ctx.reply.show({ text: NEW_CATEGORY_PROMPT });
  return enter(ctx, withStep(session, { name: "WAITING_NEW_CAT" }));
}

export async function saveCard(ctx: FlowContext): Promise<Outcome> {
  const session = ctx.session;
  if (session.state !== "BUILDER_MODE") return showStaleMenu(ctx);

  const target: SaveTarget =
    session.mode === "CREATE"
      ? { mode: "CREATE" }
      : { mode: "EDIT", rowNumber: session.editingRow, identity: session.editingIdentity };
  const rowNumber = await ctx.services.roster.saveDraft(session.draft, target);

  await ctx.services.access.logAction(
    ctx.user.id,
    session.mode === "CREATE" ? "Создание карточки" : "Редактирование карточки",
    `Строка #${rowNumber}`
  );
  await ctx.reply.show({ text: session.mode === "CREATE" ? CARD_CREATED : CARD_UPDATED });
  return showMainMenu(ctx);
}

// ============================================
// Typed input
// ============================================

export async function handleBuilderText(
  ctx: FlowContext,
  session: BuilderSession,
  text: string
): Promise<Outcome> {
  const step = session.step;
  switch (step.name) {
    case "MENU":
      return handleMenuText(ctx, session, text);
    case "WAITING_VALUE":
      return showBuilderMenu(ctx, withValue(session, step.field, text));
    case "WAITING_NEW_CAT":
      return addCategory(ctx, session, text);
    default:
      return handleSelectionText(ctx, session, step, text);
  }
}

async function handleMenuText(ctx: FlowContext, session: BuilderSession, text: string): Promise<Outcome> {
  if (text === LABELS.cancel) {
    return showMainMenu(ctx);
  }
  if (text === LABELS.addCategory) {
    return askNewCategory(ctx);
  }
  if (text === LABELS.save) {
    return saveCard(ctx);
  }

  // Longest header first, so "Дата рождения" wins over "Дата"
  const headers = [...(await ctx.services.roster.getHeaders())].sort((a, b) => b.length - a.length);
  const field = headers.find((header) => text.startsWith(header) || text.startsWith(`✅ ${header}`));
  if (field !== undefined) {
    return promptField(ctx, session, field);
  }
  return showBuilderMenu(ctx, session);
}

async function handleSelectionText(
  ctx: FlowContext,
  session: BuilderSession,
  step: SelectionStep,
  text: string
): Promise<Outcome> {
  if (text === LABELS.back) {
    return showBuilderMenu(ctx, session);
  }

  const choices = ctx.services.roster.choicesFor(step.field) ?? [];
  if (choices.includes(text)) {
    return showBuilderMenu(ctx, withValue(session, step.field, text));
  }
  await ctx.reply.show({
    text: choicePrompt(step.field, session.draft[step.field]),
    keyboard: choiceKeyboard(choices),
  });
  return KEEP;
}

async function addCategory(ctx: FlowContext, session: BuilderSession, text: string): Promise<Outcome> {
  const name = text.trim();
  if (!name) {
    await ctx.reply.show({ text: NEW_CATEGORY_PROMPT });
    return KEEP;
  }

  const added = await ctx.services.roster.addColumn(name);
  await ctx.reply.show({ text: added ? categoryAdded(name) : categoryExists(name) });
  if (added) {
    await ctx.services.access.logAction(ctx.user.id, "Добавление категории", name);
  }
  return showBuilderMenu(ctx, session);
}
