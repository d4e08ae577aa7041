import { ConversationId } from "../../domain/session";
import { ChatTransport, MessageNotEditableError, Reply, StaleCallbackError } from "../events";

export type OutboundAction =
  | { kind: "send"; conversationId: ConversationId; messageId: number; reply: Reply }
  | { kind: "edit"; conversationId: ConversationId; messageId: number; reply: Reply };

export interface RecordingTransportOptions {
  /** Edits of longer texts are refused with MessageNotEditableError */
  maxEditLength?: number;
  /** First message id handed out */
  firstMessageId?: number;
}

/**
 * Transport that keeps outbound actions in memory instead of delivering
 * them. The HTTP chat gateway returns them to the caller; tests and the
 * console chat read them back.
 */
export class RecordingTransport implements ChatTransport {
  readonly actions: OutboundAction[] = [];
  readonly answeredCallbacks: string[] = [];
  private readonly staleCallbacks = new Set<string>();
  private nextMessageId: number;

  constructor(private readonly options: RecordingTransportOptions = {}) {
    this.nextMessageId = options.firstMessageId ?? 1;
  }

  async send(conversationId: ConversationId, reply: Reply): Promise<number> {
    const messageId = this.nextMessageId++;
    this.actions.push({ kind: "send", conversationId, messageId, reply });
    return messageId;
  }

  async edit(conversationId: ConversationId, messageId: number, reply: Reply): Promise<void> {
    const limit = this.options.maxEditLength;
    if (limit !== undefined && reply.text.length > limit) {
      throw new MessageNotEditableError(messageId, `text longer than ${limit} characters`);
    }
    this.actions.push({ kind: "edit", conversationId, messageId, reply });
  }

  async answerCallback(callbackId: string): Promise<void> {
    if (this.staleCallbacks.has(callbackId)) {
      throw new StaleCallbackError(callbackId);
    }
    this.answeredCallbacks.push(callbackId);
  }

  /** Make answerCallback() reject for this id. */
  expireCallback(callbackId: string): void {
    this.staleCallbacks.add(callbackId);
  }

  /** Remove and return everything recorded so far. */
  drain(): OutboundAction[] {
    return this.actions.splice(0, this.actions.length);
  }

  lastReply(): Reply | undefined {
    return this.actions[this.actions.length - 1]?.reply;
  }
}
