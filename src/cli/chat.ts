import readline from "readline";
import dotenv from "dotenv";
import { InboundEvent } from "../bot/events";
import { RecordingTransport } from "../bot/transports/recordingTransport";
import { createServices } from "../bootstrap";
import { loadConfig } from "../config";
import { logger, setLogLevel } from "../lib/logger";
import { NumberedButton, ask, parsePress, renderAction } from "./helpers";

/**
 * Console chat: drives the conversation engine from a terminal.
 *
 * Usage: npm run chat [-- --user <id>]
 * The main administrator's id is used unless --user is given.
 */

dotenv.config();

const CONVERSATION_ID = 1;

function userIdFromArgs(args: readonly string[]): number | null {
  const index = args.indexOf("--user");
  if (index === -1) return null;
  const id = Number(args[index + 1]);
  return Number.isInteger(id) ? id : null;
}

async function main(): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logLevel === "debug" ? "debug" : "warn");
  const services = createServices(config);
  const user = { id: userIdFromArgs(process.argv.slice(2)) ?? config.mainAdminId, firstName: "Console" };

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  const transport = new RecordingTransport();
  let buttons: NumberedButton[] = [];
  let presses = 0;

  const deliver = async (event: InboundEvent) => {
    await services.engine.handle(event, transport);
    for (const action of transport.drain()) {
      const rendered = renderAction(action);
      console.log(rendered.lines.join("\n"));
      if (rendered.buttons.length > 0) {
        buttons = rendered.buttons;
      }
    }
  };

  console.log(`Chatting as user ${user.id}. Type a message, #N to press a button, /quit to leave.\n`);
  await deliver({ kind: "text", conversationId: CONVERSATION_ID, user, text: "/start" });

  for (;;) {
    const input = (await ask(rl, "> ")).trim();
    if (input === "/quit") break;
    if (!input) continue;

    const pressed = parsePress(input, buttons);
    await deliver(
      pressed
        ? {
            kind: "callback",
            conversationId: CONVERSATION_ID,
            user,
            callbackId: `console-${++presses}`,
            messageId: pressed.messageId,
            data: pressed.data,
          }
        : { kind: "text", conversationId: CONVERSATION_ID, user, text: input }
    );
  }

  rl.close();
}

main().catch((error: unknown) => {
  logger.error("Console chat failed", error);
  process.exitCode = 1;
});
