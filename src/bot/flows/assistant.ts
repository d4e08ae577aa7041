import { escapeHtml } from "../../lib/html";
import { FlowContext, Outcome, enter } from "../flow";
import {
  ASSISTANT_EMPTY_TABLE,
  ASSISTANT_INTRO,
  ASSISTANT_THINKING,
  EXIT_PHRASES,
  assistantAnswer,
} from "../texts";
import { showMainMenu } from "./mainMenu";

export async function startQuestion(ctx: FlowContext): Promise<Outcome> {
  await ctx.reply.show({ text: ASSISTANT_INTRO });
  return enter(ctx, { state: "GEMINI_QUESTION" });
}

/**
 * Answer one question and stay in question mode, so follow-ups need no
 * menu round-trip.
 */
export async function answerQuestion(ctx: FlowContext, question: string): Promise<Outcome> {
  await ctx.reply.placeholder(ASSISTANT_THINKING);

  const answer = await ctx.services.roster.ask(question);
  if (answer === null) {
    await ctx.reply.show({ text: ASSISTANT_EMPTY_TABLE });
  } else if (answer.source === "assistant") {
    await ctx.reply.show({ text: assistantAnswer(answer.text) });
  } else {
    await ctx.reply.show({ text: escapeHtml(answer.text) });
  }
  return enter(ctx, { state: "GEMINI_QUESTION" });
}

export async function handleQuestionText(ctx: FlowContext, text: string): Promise<Outcome> {
  if (EXIT_PHRASES.includes(text.trim().toLowerCase())) {
    return showMainMenu(ctx);
  }
  return answerQuestion(ctx, text);
}
