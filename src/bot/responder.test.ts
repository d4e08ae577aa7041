import { CallbackEvent, TextEvent } from "./events";
import { Responder } from "./responder";
import { RecordingTransport } from "./transports/recordingTransport";

const user = { id: 1001 };
const textEvent: TextEvent = { kind: "text", conversationId: 7, user, text: "hi" };
const callbackEvent: CallbackEvent = {
  kind: "callback",
  conversationId: 7,
  user,
  callbackId: "cb-1",
  messageId: 50,
  data: "view",
};

describe("Responder", () => {
  it("sends every reply to a text message as a new message", async () => {
    const transport = new RecordingTransport();
    const reply = new Responder(transport, 7, textEvent);

    await reply.show({ text: "one" });
    await reply.show({ text: "two" });

    expect(transport.actions.map((action) => [action.kind, action.messageId])).toEqual([
      ["send", 1],
      ["send", 2],
    ]);
  });

  it("edits the pressed message once, then sends", async () => {
    const transport = new RecordingTransport();
    const reply = new Responder(transport, 7, callbackEvent);

    await reply.show({ text: "notice" });
    await reply.show({ text: "menu" });

    expect(transport.actions.map((action) => [action.kind, action.messageId, action.reply.text])).toEqual([
      ["edit", 50, "notice"],
      ["send", 1, "menu"],
    ]);
  });

  it("replaces a placeholder with the next reply", async () => {
    const transport = new RecordingTransport({ firstMessageId: 10 });
    const reply = new Responder(transport, 7, textEvent);

    await reply.placeholder("working");
    await reply.show({ text: "done" });

    expect(transport.actions.map((action) => [action.kind, action.messageId, action.reply.text])).toEqual([
      ["send", 10, "working"],
      ["edit", 10, "done"],
    ]);
  });

  it("falls back to a new message when the edit is refused", async () => {
    const transport = new RecordingTransport({ maxEditLength: 5 });
    const reply = new Responder(transport, 7, callbackEvent);

    await reply.show({ text: "far too long" });

    expect(transport.actions).toEqual([
      { kind: "send", conversationId: 7, messageId: 1, reply: { text: "far too long" } },
    ]);
  });
});
