/**
 * Access Control
 *
 * Allow-list and role lookup over the Users table, plus the audit trail:
 * - every access check appends a row to AccessLog
 * - notable user actions append a row to ActionLog
 *
 * The main administrator is fixed by configuration and needs no Users row.
 * Audit writes are best-effort and never fail the operation they annotate.
 */

import { TableNames } from "../config";
import { Availability, attempt, available, unavailable } from "../domain/availability";
import { BackingStoreError, errorMessage } from "../domain/errors";
import { TableSnapshot } from "../domain/table";
import {
  AccessDecision,
  AllowedUser,
  ChatUser,
  Role,
  userFromRow,
} from "../domain/user";
import { bold, code, escapeHtml } from "../lib/html";
import { KeyedLock } from "../lib/keyedLock";
import { logger } from "../lib/logger";
import { TableCache } from "../stores/tableCache";

const log = logger.child("access");

// ============================================
// Types
// ============================================

interface StoredUser extends AllowedUser {
  rowNumber: number;
}

export interface AccessLogEntry {
  timestamp: string;
  userId: string;
  username: string;
  firstName: string;
  lastName: string;
  status: string;
}

export interface SystemStats {
  database?: { records: number; columns: number };
  users?: { total: number; admins: number; regular: number };
  logs?: { total: number; granted: number; denied: number };
}

export interface AccessControlOptions {
  mainAdminId: number;
  tables: TableNames;
  now?: () => Date;
}

function roleLabel(role: Role): string {
  return role === "admin" ? "👑 Админ" : "👤 Пользователь";
}

function accessLogEntry(row: readonly string[]): AccessLogEntry {
  return {
    timestamp: row[0] ?? "",
    userId: row[1] ?? "",
    username: row[2] ?? "",
    firstName: row[3] ?? "",
    lastName: row[4] ?? "",
    status: row[5] ?? "",
  };
}

// ============================================
// Service
// ============================================

export class AccessControl {
  private usersCache: StoredUser[] | null = null;
  private logsCache: AccessLogEntry[] | null = null;
  // Membership changes run one at a time: each reads the row numbers it writes against
  private readonly membership = new KeyedLock<string>();
  private readonly now: () => Date;

  constructor(
    private readonly cache: TableCache,
    private readonly options: AccessControlOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  get mainAdminId(): number {
    return this.options.mainAdminId;
  }

  /**
   * Grant or deny a chat user. Always writes an audit row, whichever
   * branch decides.
   */
  async checkAccess(user: ChatUser): Promise<boolean> {
    let decision: AccessDecision;
    if (user.id === this.options.mainAdminId) {
      decision = "GRANTED_ADMIN";
    } else {
      const users = await this.loadUsers();
      if (!users.ok) {
        log.warn("Users table unavailable, denying", { userId: user.id, reason: users.reason });
      }
      const listed = users.ok && users.value.some((entry) => entry.id === user.id);
      decision = listed ? "GRANTED" : "DENIED";
    }

    await this.logAccess(user, decision);
    log.info("Access checked", { userId: user.id, decision });
    return decision !== "DENIED";
  }

  async isAdmin(userId: number): Promise<boolean> {
    if (userId === this.options.mainAdminId) return true;

    const users = await this.loadUsers();
    if (!users.ok) {
      log.warn("Users table unavailable", { reason: users.reason });
      return false;
    }
    return users.value.some((entry) => entry.id === userId && entry.role === "admin");
  }

  async addUser(
    id: number,
    username: string,
    firstName: string,
    lastName: string,
    role: Role = "user"
  ): Promise<string> {
    try {
      return await this.membership.run(this.options.tables.users, async () => {
        const users = await this.requireUsers();
        if (users.some((entry) => entry.id === id)) {
          return `⚠️ Пользователь ${id} уже существует`;
        }

        await this.cache.appendRow(this.options.tables.users, [
          id,
          username,
          `${firstName} ${lastName}`.trim(),
          role,
        ]);
        this.invalidateUsers();
        log.info("User added", { userId: id, role });
        return `✅ Пользователь добавлен\nID: ${id}\nРоль: ${roleLabel(role)}`;
      });
    } catch (error) {
      log.error("Failed to add user", error, { userId: id });
      return `❌ Ошибка: ${errorMessage(error)}`;
    }
  }

  /** Delete the last Users row carrying the id. The main administrator cannot be removed. */
  async removeUser(id: number): Promise<string> {
    if (id === this.options.mainAdminId) {
      return "❌ Нельзя удалить главного администратора!";
    }

    const table = this.options.tables.users;
    try {
      return await this.membership.run(table, async () => {
        // row numbers come from a fresh read taken under the lock
        await this.cache.refresh(table);
        this.invalidateUsers();
        const users = await this.requireUsers();

        let target: StoredUser | undefined;
        for (let index = users.length - 1; index >= 0; index--) {
          if (users[index].id === id) {
            target = users[index];
            break;
          }
        }
        if (!target) {
          return "❌ Пользователь не найден";
        }

        await this.cache.deleteRow(table, target.rowNumber);
        this.invalidateUsers();
        log.info("User removed", { userId: id, rowNumber: target.rowNumber });
        return "✅ Пользователь удален";
      });
    } catch (error) {
      log.error("Failed to remove user", error, { userId: id });
      return `❌ Ошибка: ${errorMessage(error)}`;
    }
  }

  async getUsers(): Promise<AllowedUser[]> {
    const users = await this.requireUsers();
    return users.map(({ id, username, name, role }) => ({ id, username, name, role }));
  }

  async getUsersList(): Promise<string> {
    try {
      const users = await this.requireUsers();
      if (users.length === 0) {
        return "📭 Список пользователей пуст";
      }

      let text = bold("👥 Список пользователей") + "\n\n";
      users.forEach((user, index) => {
        text += `${index + 1}. ID: ${code(String(user.id))}\n`;
        text += `   👤: ${escapeHtml(user.name || "Не указано")}\n`;
        text += `   📱: ${escapeHtml(user.username || "Не указано")}\n`;
        text += `   🏷️: ${roleLabel(user.role)}\n\n`;
      });
      return text;
    } catch (error) {
      log.error("Failed to list users", error);
      return `❌ Ошибка: ${errorMessage(error)}`;
    }
  }

  /** The most recent access log entries, oldest first. */
  async recentAccessLog(limit = 10): Promise<AccessLogEntry[]> {
    const entries = await this.loadLogs();
    if (!entries.ok) {
      throw new BackingStoreError(entries.reason, { table: this.options.tables.accessLog });
    }
    return entries.value.slice(-limit);
  }

  /** Aggregate counts. A part whose table fails to load is left out. */
  async getStats(): Promise<SystemStats> {
    const stats: SystemStats = {};

    const main = await attempt(() => this.cache.getTable(this.options.tables.main));
    if (main.ok && main.value.rowCount > 0) {
      stats.database = { records: main.value.recordCount, columns: main.value.headers.length };
    }

    const users = await this.loadUsers();
    if (users.ok) {
      const admins = users.value.filter((user) => user.role === "admin").length;
      stats.users = {
        total: users.value.length,
        admins,
        regular: users.value.length - admins,
      };
    }

    const logs = await this.loadLogs();
    if (logs.ok) {
      stats.logs = {
        total: logs.value.length,
        granted: logs.value.filter((entry) => entry.status === "GRANTED" || entry.status === "GRANTED_ADMIN")
          .length,
        denied: logs.value.filter((entry) => entry.status === "DENIED").length,
      };
    }

    return stats;
  }

  /** Append an ActionLog row. Failures are logged and reported, never thrown. */
  async logAction(userId: number, action: string, details = ""): Promise<Availability<void>> {
    const users = await this.loadUsers();
    const known = users.ok ? users.value.find((user) => user.id === userId) : undefined;
    let display = String(userId);
    if (known) {
      display = known.username ? `${known.name} (@${known.username})` : known.name;
    }

    const written = await attempt(() =>
      this.cache.appendRow(this.options.tables.actionLog, [
        this.now().toISOString(),
        String(userId),
        display,
        action,
        details,
      ])
    );
    if (!written.ok) {
      log.warn("Action not logged", { userId, action, reason: written.reason });
      return unavailable(written.reason);
    }
    return available(undefined);
  }

  invalidateUsers(): void {
    this.usersCache = null;
  }

  invalidateLogs(): void {
    this.logsCache = null;
  }

  private async logAccess(user: ChatUser, decision: AccessDecision): Promise<void> {
    const written = await attempt(() =>
      this.cache.appendRow(this.options.tables.accessLog, [
        this.now().toISOString(),
        String(user.id),
        user.username ? `@${user.username}` : "",
        user.firstName ?? "",
        user.lastName ?? "",
        decision,
      ])
    );
    if (written.ok) {
      this.invalidateLogs();
    } else {
      log.warn("Access not logged", { userId: user.id, decision, reason: written.reason });
    }
  }

  private async requireUsers(): Promise<StoredUser[]> {
    const users = await this.loadUsers();
    if (!users.ok) {
      throw new BackingStoreError(users.reason, { table: this.options.tables.users });
    }
    return users.value;
  }

  private async loadUsers(): Promise<Availability<StoredUser[]>> {
    if (this.usersCache) return available(this.usersCache);

    const table = await attempt(() => this.cache.getTable(this.options.tables.users));
    if (!table.ok) return unavailable(table.reason);

    const users = usersFrom(table.value);
    this.usersCache = users;
    return available(users);
  }

  private async loadLogs(): Promise<Availability<AccessLogEntry[]>> {
    if (this.logsCache) return available(this.logsCache);

    const table = await attempt(() => this.cache.getTable(this.options.tables.accessLog));
    if (!table.ok) return unavailable(table.reason);

    const entries = table.value.body.map(accessLogEntry);
    this.logsCache = entries;
    return available(entries);
  }
}

function usersFrom(table: TableSnapshot): StoredUser[] {
  const users: StoredUser[] = [];
  table.body.forEach((row, index) => {
    const user = userFromRow(row);
    if (user) users.push({ ...user, rowNumber: index + 2 });
  });
  return users;
}
