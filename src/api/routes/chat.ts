import { Router } from "express";
import { z } from "zod";
import { ConversationEngine } from "../../bot/conversation";
import { RecordingTransport } from "../../bot/transports/recordingTransport";
import { parseInput, sendError } from "../respond";

// Ids handed to messages created while handling one event. The gateway
// swaps them for the platform's ids; they start above any real message id.
export const LOCAL_MESSAGE_ID_BASE = 2 ** 31;

const chatUser = z.object({
  id: z.number().int(),
  username: z.string().optional(),
  firstName: z.string().optional(),
  lastName: z.string().optional(),
});

const inboundEvent = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("text"),
    conversationId: z.number().int(),
    user: chatUser,
    text: z.string(),
  }),
  z.object({
    kind: z.literal("callback"),
    conversationId: z.number().int(),
    user: chatUser,
    callbackId: z.string().min(1),
    messageId: z.number().int(),
    data: z.string(),
  }),
]);

/**
 * Chat gateway endpoint. A platform adapter posts one normalized event and
 * delivers the returned send/edit actions in order.
 */
export function createChatRouter(engine: ConversationEngine): Router {
  const router = Router();

  // POST /api/chat/events
  router.post("/events", async (req, res) => {
    try {
      const event = parseInput(inboundEvent, req.body);
      const transport = new RecordingTransport({ firstMessageId: LOCAL_MESSAGE_ID_BASE });
      await engine.handle(event, transport);
      res.json({ actions: transport.actions, answeredCallbacks: transport.answeredCallbacks });
    } catch (error) {
      sendError(res, error, "handle chat event");
    }
  });

  return router;
}
