/**
 * Admin panel and /admin sub-commands.
 *
 * Every entry point re-checks admin rights: panel buttons stay on screen
 * after a role is revoked.
 */

import { AdminStep, SessionPhase } from "../../domain/session";
import { Role } from "../../domain/user";
import { FlowContext, KEEP, Outcome, SessionIn, enter } from "../flow";
import { adminBackKeyboard, adminMenuKeyboard, adminResultKeyboard } from "../keyboards";
import {
  ADD_USER_FORMAT_ERROR,
  ADD_USER_PROMPT,
  ADMIN_HELP_TEXT,
  ADMIN_MENU_TEXT,
  COMMAND_ID_FORMAT_ERROR,
  LABELS,
  NOT_ADMIN,
  RELOADING_ALL,
  REMOVE_USER_FORMAT_ERROR,
  REMOVE_USER_PROMPT,
  SUMMARIZING,
  UNKNOWN_ADMIN_COMMAND,
  accessLogText,
  reloadedAll,
  reloadedTable,
  statsText,
  summaryText,
} from "../texts";
import { showMainMenu } from "./mainMenu";

const USER_ID_INPUT = /^(\d+)(?:\s+(\S+))?/;
const LOG_ENTRIES_SHOWN = 10;

interface UserIdInput {
  id: number;
  role: Role;
}

/** Leading numeric id, optionally followed by a role; unknown roles mean "user". */
export function parseUserIdInput(text: string): UserIdInput | null {
  const match = USER_ID_INPUT.exec(text.trim());
  if (!match) return null;
  const role = match[2]?.toLowerCase() === "admin" ? "admin" : "user";
  return { id: Number(match[1]), role };
}

/** Run `step` for admins; everyone else gets a refusal and the session is kept. */
async function asAdmin(ctx: FlowContext, step: () => Promise<Outcome>): Promise<Outcome> {
  if (!(await ctx.services.access.isAdmin(ctx.user.id))) {
    await ctx.reply.show({ text: NOT_ADMIN });
    return KEEP;
  }
  return step();
}

function adminPhase(step: AdminStep | null): SessionPhase {
  return { state: "ADMIN_MENU", step };
}

// ============================================
// Panel screens
// ============================================

export function showAdminMenu(ctx: FlowContext): Promise<Outcome> {
  return asAdmin(ctx, () => renderAdminMenu(ctx));
}

async function renderAdminMenu(ctx: FlowContext): Promise<Outcome> {
  await ctx.reply.show({ text: ADMIN_MENU_TEXT, keyboard: adminMenuKeyboard() });
  return enter(ctx, adminPhase(null));
}

export function showUsers(ctx: FlowContext): Promise<Outcome> {
  return asAdmin(ctx, async () => {
    const text = await ctx.services.access.getUsersList();
    await ctx.reply.show({ text, keyboard: adminResultKeyboard() });
    return enter(ctx, adminPhase(null));
  });
}

export function showStats(ctx: FlowContext): Promise<Outcome> {
  return asAdmin(ctx, async () => {
    const stats = await ctx.services.access.getStats();
    await ctx.reply.show({ text: statsText(stats), keyboard: adminResultKeyboard() });
    return enter(ctx, adminPhase(null));
  });
}

export function showAccessLog(ctx: FlowContext): Promise<Outcome> {
  return asAdmin(ctx, async () => {
    const entries = await ctx.services.access.recentAccessLog(LOG_ENTRIES_SHOWN);
    await ctx.reply.show({ text: accessLogText(entries), keyboard: adminResultKeyboard() });
    return enter(ctx, adminPhase(null));
  });
}

export function showSummary(ctx: FlowContext): Promise<Outcome> {
  return asAdmin(ctx, async () => {
    await ctx.reply.placeholder(SUMMARIZING);
    const { summary, records, columns } = await ctx.services.roster.summarize();
    await ctx.reply.show({ text: summaryText(summary, records, columns), keyboard: adminResultKeyboard() });
    return enter(ctx, adminPhase(null));
  });
}

export function reloadAll(ctx: FlowContext): Promise<Outcome> {
  return asAdmin(ctx, async () => {
    await ctx.reply.placeholder(RELOADING_ALL);
    const rows = await refreshEverything(ctx);
    await ctx.reply.show({ text: reloadedAll(rows), keyboard: adminResultKeyboard() });
    return enter(ctx, adminPhase(null));
  });
}

export function askUserToAdd(ctx: FlowContext): Promise<Outcome> {
  return asAdmin(ctx, async () => {
    await ctx.reply.show({ text: ADD_USER_PROMPT, keyboard: adminBackKeyboard() });
    return enter(ctx, adminPhase("WAITING_USER_ID_FOR_ADD"));
  });
}

export function askUserToRemove(ctx: FlowContext): Promise<Outcome> {
  return asAdmin(ctx, async () => {
    await ctx.reply.show({ text: REMOVE_USER_PROMPT, keyboard: adminBackKeyboard() });
    return enter(ctx, adminPhase("WAITING_USER_ID_FOR_REMOVE"));
  });
}

async function refreshEverything(ctx: FlowContext): Promise<number> {
  const { cache, access } = ctx.services;
  const rows = await cache.refresh();
  access.invalidateUsers();
  access.invalidateLogs();
  await access.logAction(ctx.user.id, "Обновление всех таблиц", `Строк: ${rows}`);
  return rows;
}

// ============================================
// User management
// ============================================

async function addUser(ctx: FlowContext, input: UserIdInput): Promise<string> {
  const result = await ctx.services.access.addUser(input.id, "", "", "", input.role);
  await ctx.services.access.logAction(ctx.user.id, "Добавление пользователя", `ID: ${input.id}, роль: ${input.role}`);
  return result;
}

async function removeUser(ctx: FlowContext, id: number): Promise<string> {
  const result = await ctx.services.access.removeUser(id);
  await ctx.services.access.logAction(ctx.user.id, "Удаление пользователя", `ID: ${id}`);
  return result;
}

export function handleAdminText(
  ctx: FlowContext,
  session: SessionIn<"ADMIN_MENU">,
  text: string
): Promise<Outcome> {
  return asAdmin(ctx, async () => {
    if (session.step === "WAITING_USER_ID_FOR_ADD") {
      const input = parseUserIdInput(text);
      if (!input) {
        await ctx.reply.show({ text: ADD_USER_FORMAT_ERROR, keyboard: adminBackKeyboard() });
        return KEEP;
      }
      await ctx.reply.show({ text: await addUser(ctx, input) });
      return renderAdminMenu(ctx);
    }

    if (session.step === "WAITING_USER_ID_FOR_REMOVE") {
      const input = parseUserIdInput(text);
      if (!input) {
        await ctx.reply.show({ text: REMOVE_USER_FORMAT_ERROR, keyboard: adminBackKeyboard() });
        return KEEP;
      }
      await ctx.reply.show({ text: await removeUser(ctx, input.id) });
      return renderAdminMenu(ctx);
    }

    switch (text) {
      case LABELS.adminUsers:
        return showUsers(ctx);
      case LABELS.adminStats:
        return showStats(ctx);
      case LABELS.adminLogs:
        return showAccessLog(ctx);
      case LABELS.mainMenu:
      case LABELS.toMainMenu:
        return showMainMenu(ctx);
      default:
        return renderAdminMenu(ctx);
    }
  });
}

// ============================================
// /admin command
// ============================================

/** `/admin <sub-command> [args]`; no sub-command opens the panel. */
export function runAdminCommand(ctx: FlowContext, args: readonly string[]): Promise<Outcome> {
  return asAdmin(ctx, async () => {
    const [subcommand, ...rest] = args;
    if (subcommand === undefined) {
      return renderAdminMenu(ctx);
    }

    const { cache, access, tables } = ctx.services;
    switch (subcommand.toLowerCase()) {
      case "users":
        return showUsers(ctx);
      case "logs":
        return showAccessLog(ctx);
      case "stats":
        return showStats(ctx);
      case "reload": {
        const rows = await refreshEverything(ctx);
        await ctx.reply.show({ text: `✅ База данных обновлена!\nЗагружено записей: ${rows}` });
        return KEEP;
      }
      case "reload_users": {
        const rows = await cache.refresh(tables.users);
        access.invalidateUsers();
        await ctx.reply.show({ text: reloadedTable(tables.users, rows) });
        return KEEP;
      }
      case "reload_logs": {
        const rows = await cache.refresh(tables.accessLog);
        access.invalidateLogs();
        await ctx.reply.show({ text: reloadedTable(tables.accessLog, rows) });
        return KEEP;
      }
      case "add": {
        const input = parseUserIdInput(rest.join(" "));
        await ctx.reply.show({ text: input ? await addUser(ctx, input) : COMMAND_ID_FORMAT_ERROR });
        return KEEP;
      }
      case "remove": {
        const input = parseUserIdInput(rest.join(" "));
        await ctx.reply.show({ text: input ? await removeUser(ctx, input.id) : COMMAND_ID_FORMAT_ERROR });
        return KEEP;
      }
      case "help":
        await ctx.reply.show({ text: ADMIN_HELP_TEXT });
        return KEEP;
      default:
        await ctx.reply.show({ text: UNKNOWN_ADMIN_COMMAND });
        return KEEP;
    }
  });
}
