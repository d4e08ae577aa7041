import { InMemoryTabularStore } from "../stores/inMemoryTabularStore";
import { TableCache } from "../stores/tableCache";
import { ACCESS_LOG_HEADER, ACTION_LOG_HEADER, USERS_HEADER } from "../domain/user";
import { AccessControl } from "./accessControl";

const TABLES = { main: "Main", users: "Users", accessLog: "AccessLog", actionLog: "ActionLog" };
const MAIN_ADMIN = 526710245;
const NOW = new Date("2024-05-01T12:00:00.000Z");

describe("AccessControl", () => {
  const createRemote = (users: string[][] = []) =>
    new InMemoryTabularStore({
      Main: [
        ["Имя", "Фамилия"],
        ["Анна", "Иванова"],
      ],
      Users: [USERS_HEADER, ...users],
      AccessLog: [ACCESS_LOG_HEADER],
      ActionLog: [ACTION_LOG_HEADER],
    });

  const createAccess = (remote: InMemoryTabularStore) => {
    const cache = new TableCache(remote, { knownTables: Object.values(TABLES) });
    return new AccessControl(cache, { mainAdminId: MAIN_ADMIN, tables: TABLES, now: () => NOW });
  };

  describe("checkAccess", () => {
    it("grants the main administrator without a Users row and audits it", async () => {
      const remote = createRemote();
      const access = createAccess(remote);

      const granted = await access.checkAccess({ id: MAIN_ADMIN, username: "boss", firstName: "Глеб" });

      expect(granted).toBe(true);
      expect(remote.peek("AccessLog")?.[1]).toEqual([
        "2024-05-01T12:00:00.000Z",
        "526710245",
        "@boss",
        "Глеб",
        "",
        "GRANTED_ADMIN",
      ]);
    });

    it("grants a listed user", async () => {
      const remote = createRemote([["1001", "anna", "Анна Иванова", "user"]]);
      const access = createAccess(remote);

      expect(await access.checkAccess({ id: 1001 })).toBe(true);
      expect(remote.peek("AccessLog")?.[1]?.[5]).toBe("GRANTED");
    });

    it("denies and audits an unlisted user", async () => {
      const remote = createRemote();
      const access = createAccess(remote);

      expect(await access.checkAccess({ id: 2002, lastName: "Смирнов" })).toBe(false);
      expect(remote.peek("AccessLog")?.[1]).toEqual([
        "2024-05-01T12:00:00.000Z",
        "2002",
        "",
        "",
        "Смирнов",
        "DENIED",
      ]);
    });

    it("still decides when the audit write fails", async () => {
      const remote = createRemote([["1001", "anna", "Анна Иванова", "user"]]);
      const access = createAccess(remote);
      remote.failOn("appendRow");

      expect(await access.checkAccess({ id: 1001 })).toBe(true);
    });

    it("denies when the Users table cannot be read", async () => {
      const remote = createRemote([["1001", "anna", "Анна Иванова", "user"]]);
      const access = createAccess(remote);
      remote.failOn("fetchAll");

      expect(await access.checkAccess({ id: 1001 })).toBe(false);
    });
  });

  describe("isAdmin", () => {
    it("is true for the main administrator with no Users row", async () => {
      const access = createAccess(createRemote());

      expect(await access.isAdmin(MAIN_ADMIN)).toBe(true);
    });

    it("follows the role column for listed users", async () => {
      const access = createAccess(
        createRemote([
          ["1001", "anna", "Анна Иванова", "admin"],
          ["1002", "boris", "Борис Петров", "user"],
        ])
      );

      expect(await access.isAdmin(1001)).toBe(true);
      expect(await access.isAdmin(1002)).toBe(false);
      expect(await access.isAdmin(9999)).toBe(false);
    });
  });

  describe("addUser", () => {
    it("appends a row and sees it on the next check", async () => {
      const remote = createRemote();
      const access = createAccess(remote);
      expect(await access.isAdmin(3003)).toBe(false);

      const message = await access.addUser(3003, "vera", "Вера", "Смирнова", "admin");

      expect(message).toBe("✅ Пользователь добавлен\nID: 3003\nРоль: 👑 Админ");
      expect(remote.peek("Users")?.[1]).toEqual(["3003", "vera", "Вера Смирнова", "admin"]);
      expect(await access.isAdmin(3003)).toBe(true);
    });

    it("reports an existing id without writing", async () => {
      const remote = createRemote([["1001", "anna", "Анна Иванова", "user"]]);
      const access = createAccess(remote);

      const message = await access.addUser(1001, "", "", "");

      expect(message).toBe("⚠️ Пользователь 1001 уже существует");
      expect(remote.callCount("appendRow", "Users")).toBe(0);
    });
  });

  describe("removeUser", () => {
    it("refuses to remove the main administrator without touching the table", async () => {
      const remote = createRemote();
      const access = createAccess(remote);

      const message = await access.removeUser(MAIN_ADMIN);

      expect(message).toBe("❌ Нельзя удалить главного администратора!");
      expect(remote.calls).toEqual([]);
    });

    it("deletes the last row carrying the id", async () => {
      const remote = createRemote([
        ["1001", "anna", "Анна Иванова", "user"],
        ["1002", "boris", "Борис Петров", "user"],
        ["1001", "anna2", "Анна Иванова", "admin"],
      ]);
      const access = createAccess(remote);

      const message = await access.removeUser(1001);

      expect(message).toBe("✅ Пользователь удален");
      expect(remote.peek("Users")).toEqual([
        USERS_HEADER,
        ["1001", "anna", "Анна Иванова", "user"],
        ["1002", "boris", "Борис Петров", "user"],
      ]);
      expect(await access.isAdmin(1001)).toBe(false);
    });

    it("removes the right rows when two removals overlap", async () => {
      const remote = createRemote([
        ["1001", "anna", "Анна Иванова", "user"],
        ["1002", "boris", "Борис Петров", "user"],
        ["1003", "vera", "Вера Смирнова", "user"],
      ]);
      const access = createAccess(remote);
      await access.getUsers();

      const messages = await Promise.all([access.removeUser(1001), access.removeUser(1002)]);

      expect(messages).toEqual(["✅ Пользователь удален", "✅ Пользователь удален"]);
      expect(remote.peek("Users")).toEqual([USERS_HEADER, ["1003", "vera", "Вера Смирнова", "user"]]);
    });

    it("reads rows added behind the cache before choosing the row", async () => {
      const remote = createRemote([["1001", "anna", "Анна Иванова", "user"]]);
      const access = createAccess(remote);
      await access.getUsers();
      await remote.appendRow("Users", ["1002", "boris", "Борис Петров", "user"]);

      expect(await access.removeUser(1002)).toBe("✅ Пользователь удален");
      expect(remote.peek("Users")).toEqual([USERS_HEADER, ["1001", "anna", "Анна Иванова", "user"]]);
    });

    it("reports an unknown id", async () => {
      const access = createAccess(createRemote());

      expect(await access.removeUser(4242)).toBe("❌ Пользователь не найден");
    });
  });

  describe("getUsersList", () => {
    it("formats each user with an escaped name", async () => {
      const access = createAccess(createRemote([["1001", "", "Анна <Ваня>", "admin"]]));

      expect(await access.getUsersList()).toBe(
        "<b>👥 Список пользователей</b>\n\n" +
          "1. ID: <code>1001</code>\n" +
          "   👤: Анна &lt;Ваня&gt;\n" +
          "   📱: Не указано\n" +
          "   🏷️: 👑 Админ\n\n"
      );
    });

    it("reports an empty list", async () => {
      const access = createAccess(createRemote());

      expect(await access.getUsersList()).toBe("📭 Список пользователей пуст");
    });
  });

  describe("getStats", () => {
    it("counts records, roles and access decisions", async () => {
      const remote = createRemote([
        ["1001", "anna", "Анна Иванова", "admin"],
        ["1002", "boris", "Борис Петров", "user"],
      ]);
      const access = createAccess(remote);
      await access.checkAccess({ id: 1001 });
      await access.checkAccess({ id: 5005 });

      const stats = await access.getStats();

      expect(stats).toEqual({
        database: { records: 1, columns: 2 },
        users: { total: 2, admins: 1, regular: 1 },
        logs: { total: 2, granted: 1, denied: 1 },
      });
    });

    it("omits the parts whose tables fail to load", async () => {
      const remote = createRemote();
      const access = createAccess(remote);
      remote.failOn("fetchAll");

      expect(await access.getStats()).toEqual({});
    });
  });

  describe("recentAccessLog", () => {
    it("returns the last entries in order", async () => {
      const remote = createRemote([["1001", "anna", "Анна Иванова", "user"]]);
      const access = createAccess(remote);
      await access.checkAccess({ id: 1001, firstName: "Анна" });
      await access.checkAccess({ id: 7007, firstName: "Иван" });
      await access.checkAccess({ id: 8008, firstName: "Олег" });

      const entries = await access.recentAccessLog(2);

      expect(entries.map((entry) => [entry.firstName, entry.status])).toEqual([
        ["Иван", "DENIED"],
        ["Олег", "DENIED"],
      ]);
    });
  });

  describe("logAction", () => {
    it("records the action with the user's display name", async () => {
      const remote = createRemote([["1001", "anna", "Анна Иванова", "user"]]);
      const access = createAccess(remote);

      const result = await access.logAction(1001, "CARD_CREATED", "row 5");

      expect(result.ok).toBe(true);
      expect(remote.peek("ActionLog")?.[1]).toEqual([
        "2024-05-01T12:00:00.000Z",
        "1001",
        "Анна Иванова (@anna)",
        "CARD_CREATED",
        "row 5",
      ]);
    });

    it("reports a failed write instead of throwing", async () => {
      const remote = createRemote();
      const access = createAccess(remote);
      remote.failOn("appendRow", new Error("quota exceeded"));

      const result = await access.logAction(1001, "RELOAD");

      expect(result).toEqual({ ok: false, reason: 'Failed to append row in table "ActionLog"' });
    });
  });

  describe("audit tables missing from the spreadsheet", () => {
    it("creates them with their headers on the first write", async () => {
      const remote = new InMemoryTabularStore({
        Main: [["Имя", "Фамилия"]],
        Users: [USERS_HEADER, ["1001", "anna", "Анна Иванова", "user"]],
      });
      const cache = new TableCache(remote, {
        knownTables: Object.values(TABLES),
        initialHeaders: { AccessLog: ACCESS_LOG_HEADER, ActionLog: ACTION_LOG_HEADER },
      });
      const access = new AccessControl(cache, { mainAdminId: MAIN_ADMIN, tables: TABLES, now: () => NOW });

      await access.checkAccess({ id: 1001 });
      await access.checkAccess({ id: 2002 });
      const logged = await access.logAction(1001, "RELOAD");

      expect(logged.ok).toBe(true);
      expect(remote.peek("AccessLog")).toEqual([
        ACCESS_LOG_HEADER,
        ["2024-05-01T12:00:00.000Z", "1001", "", "", "", "GRANTED"],
        ["2024-05-01T12:00:00.000Z", "2002", "", "", "", "DENIED"],
      ]);
      expect(remote.peek("ActionLog")).toEqual([
        ACTION_LOG_HEADER,
        ["2024-05-01T12:00:00.000Z", "1001", "Анна Иванова (@anna)", "RELOAD", ""],
      ]);
    });
  });
});
