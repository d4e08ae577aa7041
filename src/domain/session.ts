import { Draft, HomeroomGroup, PersonEntry } from "./roster";

export type ConversationId = number;

export type BrowseMode = "VIEW_ONLY" | "EDIT";

export type AdminStep = "WAITING_USER_ID_FOR_ADD" | "WAITING_USER_ID_FOR_REMOVE";

/** Builder fields answered from a fixed list instead of free text. */
export type ChoiceField = "GROUP" | "STATUS";

export type BuilderStep =
  | { name: "MENU" }
  | { name: "WAITING_VALUE"; field: string }
  | { name: "WAITING_NEW_CAT" }
  | { name: `WAITING_${ChoiceField}_SELECTION`; field: string; choice: ChoiceField };

interface BuilderBase {
  state: "BUILDER_MODE";
  draft: Draft;
  step: BuilderStep;
  /** Columns behind the field buttons last shown, by button position */
  fields: readonly string[];
}

export type BuilderPhase =
  | (BuilderBase & { mode: "CREATE" })
  | (BuilderBase & {
      mode: "EDIT";
      editingRow: number;
      /** Name of the record when editing started, re-checked before saving */
      editingIdentity: string;
      lastLetter: string | null;
    });

/** State-specific payload. Fields only exist in the states that use them. */
export type SessionPhase =
  | { state: "IDLE" }
  | { state: "ADMIN_MENU"; step: AdminStep | null }
  | { state: "SELECTING_LETTER"; mode: BrowseMode }
  | {
      state: "SELECTING_PERSON";
      mode: BrowseMode;
      lastLetter: string;
      people: readonly PersonEntry[];
    }
  | { state: "VIEWING_CARD"; mode: "VIEW_ONLY"; lastLetter: string | null; viewingRow: number }
  | BuilderPhase
  | { state: "GEMINI_QUESTION" }
  | { state: "OTHER_MENU" }
  | { state: "SELECTING_MONTH" }
  | { state: "SELECTING_HOMEROOM_GROUP"; groups: readonly HomeroomGroup[] | null };

export interface SessionMeta {
  userId: number | null;
  /** Epoch milliseconds of the last read or write */
  lastAccess: number;
  createdAt: string;
}

export type Session = SessionMeta & SessionPhase;

export function newSession(now: number): Session {
  return {
    state: "IDLE",
    userId: null,
    lastAccess: now,
    createdAt: new Date(now).toISOString(),
  };
}

/** Move a session to another phase, keeping its metadata. */
export function transition(session: Session, phase: SessionPhase): Session {
  return {
    userId: session.userId,
    lastAccess: session.lastAccess,
    createdAt: session.createdAt,
    ...phase,
  };
}
