import { TableNames } from "../config";
import { ConversationId, Session, SessionPhase, transition } from "../domain/session";
import { ChatUser } from "../domain/user";
import { AccessControl } from "../services/accessControl";
import { RosterService } from "../services/rosterService";
import { TableCache } from "../stores/tableCache";
import { Responder } from "./responder";

/** Services the chat flows read and write through. */
export interface BotServices {
  roster: RosterService;
  access: AccessControl;
  cache: TableCache;
  tables: TableNames;
  webAppUrl: string | null;
}

/** Everything a flow step sees about the event it handles. */
export interface FlowContext {
  readonly conversationId: ConversationId;
  readonly user: ChatUser;
  /** Stored session as of the event; flows never mutate it */
  readonly session: Session;
  readonly reply: Responder;
  readonly services: BotServices;
}

/**
 * What to store once a step has finished replying. Nothing is stored
 * when a step throws.
 */
export type Outcome = { kind: "save"; session: Session } | { kind: "clear" } | { kind: "keep" };

export const CLEAR: Outcome = { kind: "clear" };
export const KEEP: Outcome = { kind: "keep" };

/** Store the session in a new phase. */
export function enter(ctx: FlowContext, phase: SessionPhase): Outcome {
  return { kind: "save", session: transition(ctx.session, phase) };
}

/** The session type of one state. */
export type SessionIn<S extends Session["state"]> = Extract<Session, { state: S }>;
