import readline from "readline";
import { Keyboard } from "../bot/events";
import { OutboundAction } from "../bot/transports/recordingTransport";
import { stripHtml } from "../lib/html";

/** A button the console user can press by typing `#number`. */
export interface NumberedButton {
  number: number;
  text: string;
  data: string;
  /** Message the button is attached to */
  messageId: number;
}

export interface RenderedKeyboard {
  lines: string[];
  buttons: NumberedButton[];
}

/**
 * Number the callback buttons of a keyboard, row by row.
 * Mini-app buttons cannot be pressed here; they are listed with their link.
 */
export function numberButtons(keyboard: Keyboard | undefined, messageId: number): RenderedKeyboard {
  const lines: string[] = [];
  const buttons: NumberedButton[] = [];

  for (const row of keyboard ?? []) {
    const cells = row.map((button) => {
      if ("webAppUrl" in button) {
        return `[${button.text} → ${button.webAppUrl}]`;
      }
      const numbered = { number: buttons.length + 1, text: button.text, data: button.data, messageId };
      buttons.push(numbered);
      return `#${numbered.number} ${button.text}`;
    });
    lines.push("  " + cells.join("   "));
  }
  return { lines, buttons };
}

/** Lines printed for one outbound action. */
export function renderAction(action: OutboundAction): RenderedKeyboard {
  const marker = action.kind === "edit" ? `✎ (message ${action.messageId})` : `✉ (message ${action.messageId})`;
  const keyboard = numberButtons(action.reply.keyboard, action.messageId);
  return {
    lines: [marker, stripHtml(action.reply.text), ...keyboard.lines, ""],
    buttons: keyboard.buttons,
  };
}

/** The button a `#N` input presses, or null for plain text. */
export function parsePress(input: string, buttons: readonly NumberedButton[]): NumberedButton | null {
  const match = /^#(\d+)$/.exec(input.trim());
  if (!match) return null;
  return buttons.find((button) => button.number === Number(match[1])) ?? null;
}

/**
 * Ask one line of input
 */
export function ask(rl: readline.Interface, prompt: string): Promise<string> {
  return new Promise((resolve) => {
    rl.question(prompt, (answer: string) => resolve(answer));
  });
}
