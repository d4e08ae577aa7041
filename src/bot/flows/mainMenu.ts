import { BOT_MENU_TEXT, MAIN_MENU_TEXT, STALE_MENU } from "../texts";
import { botMenuKeyboard, mainMenuKeyboard } from "../keyboards";
import { CLEAR, FlowContext, Outcome, enter } from "../flow";

/** Root menu. The session is dropped, so the next event starts from IDLE. */
export async function showMainMenu(ctx: FlowContext): Promise<Outcome> {
  const isAdmin = await ctx.services.access.isAdmin(ctx.user.id);
  await ctx.reply.show({
    text: MAIN_MENU_TEXT,
    keyboard: mainMenuKeyboard({ webAppUrl: ctx.services.webAppUrl, isAdmin }),
  });
  return CLEAR;
}

export async function showBotMenu(ctx: FlowContext): Promise<Outcome> {
  await ctx.reply.show({ text: BOT_MENU_TEXT, keyboard: botMenuKeyboard() });
  return enter(ctx, { state: "IDLE" });
}

/** A button from a screen the session has since left. */
export async function showStaleMenu(ctx: FlowContext): Promise<Outcome> {
  await ctx.reply.show({ text: STALE_MENU });
  return showMainMenu(ctx);
}
