import { ConversationId } from "../domain/session";
import { ChatUser } from "../domain/user";

// ============================================
// Outbound
// ============================================

/** Inline button: either presses a callback or opens the mini-app. */
export type Button = { text: string; data: string } | { text: string; webAppUrl: string };

export type Keyboard = Button[][];

/** A message as shown to the user. Text is HTML (see lib/html). */
export interface Reply {
  text: string;
  keyboard?: Keyboard;
}

// ============================================
// Inbound
// ============================================

interface EventBase {
  conversationId: ConversationId;
  user: ChatUser;
}

export interface TextEvent extends EventBase {
  kind: "text";
  text: string;
}

export interface CallbackEvent extends EventBase {
  kind: "callback";
  callbackId: string;
  /** Message carrying the pressed button */
  messageId: number;
  data: string;
}

export type InboundEvent = TextEvent | CallbackEvent;

// ============================================
// Transport
// ============================================

/**
 * Outbound side of a chat platform.
 *
 * edit() rejects with MessageNotEditableError when the platform refuses to
 * change a message in place; answerCallback() rejects with
 * StaleCallbackError for a press on an expired message.
 */
export interface ChatTransport {
  /** Returns the new message's id */
  send(conversationId: ConversationId, reply: Reply): Promise<number>;
  edit(conversationId: ConversationId, messageId: number, reply: Reply): Promise<void>;
  answerCallback(callbackId: string): Promise<void>;
}

export class MessageNotEditableError extends Error {
  constructor(readonly messageId: number, reason: string) {
    super(`Message ${messageId} cannot be edited: ${reason}`);
    this.name = "MessageNotEditableError";
  }
}

export class StaleCallbackError extends Error {
  constructor(readonly callbackId: string) {
    super(`Callback ${callbackId} has expired`);
    this.name = "StaleCallbackError";
  }
}
