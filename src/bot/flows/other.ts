import { FlowContext, KEEP, Outcome, SessionIn, enter } from "../flow";
import {
  birthdaysKeyboard,
  homeroomGroupsKeyboard,
  homeroomKeyboard,
  monthKeyboard,
  otherMenuKeyboard,
} from "../keyboards";
import {
  BIRTHDAYS_TEXT,
  CHOOSE_GROUP_WITH_BUTTONS,
  CHOOSE_MONTH_WITH_BUTTONS,
  EXIT_PHRASES,
  HOMEROOMS_TEXT,
  OTHER_MENU_TEXT,
  birthdaysText,
  homeroomText,
} from "../texts";
import { showMainMenu, showStaleMenu } from "./mainMenu";

const isExitPhrase = (text: string) => EXIT_PHRASES.includes(text.trim().toLowerCase());

export async function showOtherMenu(ctx: FlowContext): Promise<Outcome> {
  await ctx.reply.show({ text: OTHER_MENU_TEXT, keyboard: otherMenuKeyboard() });
  return enter(ctx, { state: "OTHER_MENU" });
}

// ============================================
// Birthdays
// ============================================

export async function showMonths(ctx: FlowContext): Promise<Outcome> {
  await ctx.reply.show({ text: BIRTHDAYS_TEXT, keyboard: monthKeyboard() });
  return enter(ctx, { state: "SELECTING_MONTH" });
}

export async function showBirthdays(ctx: FlowContext, month: number): Promise<Outcome> {
  if (month < 1 || month > 12) return showStaleMenu(ctx);

  const entries = await ctx.services.roster.birthdaysInMonth(month);
  await ctx.reply.show({ text: birthdaysText(month, entries), keyboard: birthdaysKeyboard() });
  return enter(ctx, { state: "SELECTING_MONTH" });
}

// ============================================
// Homerooms
// ============================================

export async function showGroups(ctx: FlowContext): Promise<Outcome> {
  const groups = await ctx.services.roster.homerooms();
  await ctx.reply.show({ text: HOMEROOMS_TEXT, keyboard: homeroomGroupsKeyboard(groups) });
  return enter(ctx, { state: "SELECTING_HOMEROOM_GROUP", groups });
}

/**
 * Members of the group at `index` in the list the buttons were built from.
 * That list is kept in the session; after a restart it is rebuilt.
 */
export async function showGroup(ctx: FlowContext, index: number): Promise<Outcome> {
  const session = ctx.session;
  if (session.state !== "SELECTING_HOMEROOM_GROUP") return showStaleMenu(ctx);

  const groups = session.groups ?? (await ctx.services.roster.homerooms());
  const group = groups[index];
  if (group === undefined) return showStaleMenu(ctx);

  await ctx.reply.show({ text: homeroomText(group), keyboard: homeroomKeyboard() });
  return enter(ctx, { state: "SELECTING_HOMEROOM_GROUP", groups });
}

// ============================================
// Typed input
// ============================================

export async function handleOtherText(ctx: FlowContext, text: string): Promise<Outcome> {
  if (text.includes("Дни рождения")) return showMonths(ctx);
  if (text.includes("Домашки")) return showGroups(ctx);
  if (text.includes("Назад")) return showMainMenu(ctx);
  return showOtherMenu(ctx);
}

export async function handleMonthText(ctx: FlowContext, text: string): Promise<Outcome> {
  if (isExitPhrase(text)) return showMainMenu(ctx);

  await ctx.reply.show({ text: CHOOSE_MONTH_WITH_BUTTONS });
  await ctx.reply.show({ text: BIRTHDAYS_TEXT, keyboard: monthKeyboard() });
  return KEEP;
}

export async function handleGroupText(
  ctx: FlowContext,
  session: SessionIn<"SELECTING_HOMEROOM_GROUP">,
  text: string
): Promise<Outcome> {
  if (isExitPhrase(text)) return showMainMenu(ctx);

  const groups = session.groups ?? (await ctx.services.roster.homerooms());
  await ctx.reply.show({ text: CHOOSE_GROUP_WITH_BUTTONS });
  await ctx.reply.show({ text: HOMEROOMS_TEXT, keyboard: homeroomGroupsKeyboard(groups) });
  return session.groups === null ? enter(ctx, { state: "SELECTING_HOMEROOM_GROUP", groups }) : KEEP;
}
