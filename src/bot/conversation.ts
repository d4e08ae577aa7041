/**
 * Conversation engine: the state machine behind every chat front-end.
 *
 * - One event per conversation at a time (keyed lock)
 * - Every event passes the access gate, which audits it
 * - Flow steps return an Outcome; the session is written only after the
 *   step finished, so a failing step leaves the stored session as it was
 */

import { KeyedLock } from "../lib/keyedLock";
import { logger } from "../lib/logger";
import { ConversationId } from "../domain/session";
import { SessionStore } from "../stores/sessionStore";
import { CallbackAction, decodeAction } from "./callbackData";
import { CallbackEvent, ChatTransport, InboundEvent, StaleCallbackError } from "./events";
import { BotServices, FlowContext, KEEP, Outcome } from "./flow";
import { Responder } from "./responder";
import {
  HELP_TEXT,
  LABELS,
  MAIN_MENU_TRIGGERS,
  UNKNOWN_BUTTON,
  UNKNOWN_COMMAND,
  WELCOME_TEXT,
  accessDenied,
  errorText,
} from "./texts";
import {
  askUserToAdd,
  askUserToRemove,
  handleAdminText,
  reloadAll,
  runAdminCommand,
  showAccessLog,
  showAdminMenu,
  showStats,
  showSummary,
  showUsers,
} from "./flows/admin";
import { answerQuestion, handleQuestionText, startQuestion } from "./flows/assistant";
import {
  backToLetters,
  backToPeople,
  handleCardText,
  handleLetterText,
  handlePersonText,
  selectLetter,
  selectPerson,
  showAlphabet,
} from "./flows/browse";
import {
  askNewCategory,
  backToBuilder,
  handleBuilderText,
  saveCard,
  selectChoice,
  selectField,
  startCreate,
} from "./flows/builder";
import { showBotMenu, showMainMenu } from "./flows/mainMenu";
import {
  handleGroupText,
  handleMonthText,
  handleOtherText,
  showBirthdays,
  showGroup,
  showGroups,
  showMonths,
  showOtherMenu,
} from "./flows/other";

const log = logger.child("conversation");

export class ConversationEngine {
  private readonly conversations = new KeyedLock<ConversationId>();

  constructor(
    private readonly sessions: SessionStore,
    private readonly services: BotServices
  ) {}

  /**
   * Handle one inbound event, replying through `transport`. Never rejects
   * for a failing step: the failure is logged and reported to the user.
   */
  handle(event: InboundEvent, transport: ChatTransport): Promise<void> {
    return this.conversations.run(event.conversationId, () => this.process(event, transport));
  }

  private async process(event: InboundEvent, transport: ChatTransport): Promise<void> {
    log.debug("Inbound event", { conversationId: event.conversationId, kind: event.kind, userId: event.user.id });

    if (event.kind === "callback" && !(await this.acknowledge(event, transport))) {
      return;
    }

    const reply = new Responder(transport, event.conversationId, event);
    try {
      const outcome = await this.dispatch(event, reply);
      await this.apply(event.conversationId, outcome);
    } catch (error) {
      log.error("Event handling failed", error, { conversationId: event.conversationId, kind: event.kind });
      try {
        await reply.show({ text: errorText(error) });
      } catch (replyError) {
        log.error("Failure notice not delivered", replyError, { conversationId: event.conversationId });
      }
    }
  }

  /** False when the press is stale and the event should be dropped. */
  private async acknowledge(event: CallbackEvent, transport: ChatTransport): Promise<boolean> {
    try {
      await transport.answerCallback(event.callbackId);
      return true;
    } catch (error) {
      if (error instanceof StaleCallbackError) {
        log.warn("Stale callback ignored", { conversationId: event.conversationId, data: event.data });
        return false;
      }
      log.error("Callback acknowledgement failed", error, { conversationId: event.conversationId });
      return true;
    }
  }

  private async dispatch(event: InboundEvent, reply: Responder): Promise<Outcome> {
    if (!(await this.services.access.checkAccess(event.user))) {
      await reply.show({ text: accessDenied(event.user.id) });
      return KEEP;
    }

    const stored = await this.sessions.get(event.conversationId);
    const ctx: FlowContext = {
      conversationId: event.conversationId,
      user: event.user,
      session: { ...stored, userId: event.user.id },
      reply,
      services: this.services,
    };

    if (event.kind === "callback") {
      const action = decodeAction(event.data);
      if (action === null) {
        log.warn("Unknown callback data", { conversationId: event.conversationId, data: event.data });
        await reply.show({ text: UNKNOWN_BUTTON });
        return KEEP;
      }
      return routeAction(ctx, action);
    }

    const text = event.text.trim();
    if (text.startsWith("/")) {
      return runCommand(ctx, text);
    }
    return routeText(ctx, text);
  }

  private async apply(conversationId: ConversationId, outcome: Outcome): Promise<void> {
    switch (outcome.kind) {
      case "save":
        await this.sessions.save(conversationId, outcome.session);
        break;
      case "clear":
        await this.sessions.clear(conversationId);
        break;
      case "keep":
        break;
    }
  }
}

// ============================================
// Commands
// ============================================

async function runCommand(ctx: FlowContext, text: string): Promise<Outcome> {
  const [head, ...args] = text.split(/\s+/);
  // "/start@SomeBot" in group chats
  const command = head.split("@")[0].toLowerCase();

  switch (command) {
    case "/start":
      await ctx.reply.show({ text: WELCOME_TEXT });
      return showMainMenu(ctx);
    case "/menu":
      return showMainMenu(ctx);
    case "/help":
      await ctx.reply.show({ text: HELP_TEXT });
      return KEEP;
    case "/view":
      return showAlphabet(ctx, "VIEW_ONLY");
    case "/edit":
      return showAlphabet(ctx, "EDIT");
    case "/create":
      return startCreate(ctx);
    case "/ask":
      return args.length > 0 ? answerQuestion(ctx, args.join(" ")) : startQuestion(ctx);
    case "/other":
      return showOtherMenu(ctx);
    case "/admin":
      return runAdminCommand(ctx, args);
    default:
      await ctx.reply.show({ text: UNKNOWN_COMMAND });
      return KEEP;
  }
}

// ============================================
// Typed text
// ============================================

function routeText(ctx: FlowContext, text: string): Promise<Outcome> {
  if (MAIN_MENU_TRIGGERS.includes(text)) {
    return showMainMenu(ctx);
  }

  const session = ctx.session;
  switch (session.state) {
    case "IDLE":
      return handleIdleText(ctx, text);
    case "ADMIN_MENU":
      return handleAdminText(ctx, session, text);
    case "SELECTING_LETTER":
      return handleLetterText(ctx, session, text);
    case "SELECTING_PERSON":
      return handlePersonText(ctx, session, text);
    case "VIEWING_CARD":
      return handleCardText(ctx, session, text);
    case "BUILDER_MODE":
      return handleBuilderText(ctx, session, text);
    case "GEMINI_QUESTION":
      return handleQuestionText(ctx, text);
    case "OTHER_MENU":
      return handleOtherText(ctx, text);
    case "SELECTING_MONTH":
      return handleMonthText(ctx, text);
    case "SELECTING_HOMEROOM_GROUP":
      return handleGroupText(ctx, session, text);
    default:
      return showMainMenu(ctx);
  }
}

/** Root menu texts, matched loosely so typed variants of the labels work. */
function handleIdleText(ctx: FlowContext, text: string): Promise<Outcome> {
  if (text === LABELS.adminPanel) return showAdminMenu(ctx);
  if (text === LABELS.botMenu) return showBotMenu(ctx);
  if (text.includes("Создать карточку")) return startCreate(ctx);
  if (text.includes("Найти") || text.includes("Просмотреть")) return showAlphabet(ctx, "VIEW_ONLY");
  if (text.includes("Редактировать")) return showAlphabet(ctx, "EDIT");
  if (text.includes("Задать вопрос") || text.includes("AI")) return startQuestion(ctx);
  if (text.includes("Остальное")) return showOtherMenu(ctx);
  return showMainMenu(ctx);
}

// ============================================
// Button presses
// ============================================

function routeAction(ctx: FlowContext, action: CallbackAction): Promise<Outcome> {
  switch (action.type) {
    case "mainMenu":
    case "cancelBuilder":
      return showMainMenu(ctx);
    case "botMenu":
      return showBotMenu(ctx);
    case "view":
      return showAlphabet(ctx, "VIEW_ONLY");
    case "edit":
      return showAlphabet(ctx, "EDIT");
    case "create":
      return startCreate(ctx);
    case "ask":
      return startQuestion(ctx);
    case "other":
      return showOtherMenu(ctx);
    case "birthdays":
      return showMonths(ctx);
    case "homerooms":
      return showGroups(ctx);
    case "letter":
      return selectLetter(ctx, action.letter);
    case "person":
      return selectPerson(ctx, action.rowNumber);
    case "backToLetters":
      return backToLetters(ctx);
    case "backToPeople":
      return backToPeople(ctx);
    case "field":
      return selectField(ctx, action.index);
    case "choice":
      return selectChoice(ctx, action.index);
    case "addCategory":
      return askNewCategory(ctx);
    case "save":
      return saveCard(ctx);
    case "backToBuilder":
      return backToBuilder(ctx);
    case "month":
      return showBirthdays(ctx, action.month);
    case "group":
      return showGroup(ctx, action.index);
    case "adminPanel":
      return showAdminMenu(ctx);
    case "adminUsers":
      return showUsers(ctx);
    case "adminStats":
      return showStats(ctx);
    case "adminLogs":
      return showAccessLog(ctx);
    case "adminSummary":
      return showSummary(ctx);
    case "adminAdd":
      return askUserToAdd(ctx);
    case "adminRemove":
      return askUserToRemove(ctx);
    case "adminReload":
      return reloadAll(ctx);
  }
}
