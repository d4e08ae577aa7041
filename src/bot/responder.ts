import { ConversationId } from "../domain/session";
import { logger } from "../lib/logger";
import { ChatTransport, InboundEvent, MessageNotEditableError, Reply } from "./events";

const log = logger.child("responder");

/**
 * Replies to one inbound event.
 *
 * The first show() after a button press edits the pressed message; every
 * other show() sends a new one, so a notice followed by a menu leaves both
 * on screen. placeholder() puts up a progress text that the next show()
 * replaces. An edit the transport refuses falls back to a new message.
 */
export class Responder {
  private target: number | null;

  constructor(
    private readonly transport: ChatTransport,
    private readonly conversationId: ConversationId,
    event: InboundEvent
  ) {
    this.target = event.kind === "callback" ? event.messageId : null;
  }

  async show(reply: Reply): Promise<void> {
    const target = this.target;
    this.target = null;
    if (target === null) {
      await this.transport.send(this.conversationId, reply);
    } else {
      await this.editOrSend(target, reply);
    }
  }

  async placeholder(text: string): Promise<void> {
    const reply = { text };
    this.target =
      this.target === null
        ? await this.transport.send(this.conversationId, reply)
        : await this.editOrSend(this.target, reply);
  }

  /** Returns the id of the message now showing the reply. */
  private async editOrSend(messageId: number, reply: Reply): Promise<number> {
    try {
      await this.transport.edit(this.conversationId, messageId, reply);
      return messageId;
    } catch (error) {
      if (!(error instanceof MessageNotEditableError)) throw error;
      log.warn("Edit refused, sending a new message", {
        conversationId: this.conversationId,
        messageId,
        reason: error.message,
      });
      return this.transport.send(this.conversationId, reply);
    }
  }
}
