import { BackingStoreError, NotFoundError } from "../domain/errors";
import { InMemoryTabularStore } from "./inMemoryTabularStore";
import { TableCache } from "./tableCache";

/** Serves fetches from the rows present when the fetch started, released on demand. */
class HeldFetchStore extends InMemoryTabularStore {
  private gate: Promise<void> | null = null;
  private open: () => void = () => undefined;

  holdFetches(): void {
    this.gate = new Promise((resolve) => {
      this.open = resolve;
    });
  }

  releaseFetches(): void {
    this.gate = null;
    this.open();
  }

  async fetchAll(table: string): Promise<string[][]> {
    const rows = await super.fetchAll(table);
    const gate = this.gate;
    if (gate) await gate;
    return rows;
  }
}

describe("TableCache", () => {
  const createRemote = () =>
    new InMemoryTabularStore({
      Main: [
        ["Имя", "Фамилия", "Дата рождения"],
        ["Анна", "Иванова", "1990-05-01"],
        ["Борис", "Петров", ""],
      ],
    });

  const createCache = (remote: InMemoryTabularStore) =>
    new TableCache(remote, {
      knownTables: ["Main", "Users"],
      initialHeaders: { Users: ["ID", "Username", "Имя", "Роль"] },
    });

  describe("getTable", () => {
    it("fetches once and serves later reads from memory", async () => {
      const remote = createRemote();
      const cache = createCache(remote);

      const first = await cache.getTable("Main");
      const second = await cache.getTable("Main");

      expect(first.rowCount).toBe(3);
      expect(second).toBe(first);
      expect(remote.callCount("fetchAll", "Main")).toBe(1);
    });

    it("coalesces concurrent misses into one fetch", async () => {
      const remote = createRemote();
      const cache = createCache(remote);

      const [a, b] = await Promise.all([cache.getTable("Main"), cache.getTable("Main")]);

      expect(a).toBe(b);
      expect(remote.callCount("fetchAll", "Main")).toBe(1);
    });

    it("leaves the entry absent after a failed fetch so the next call retries", async () => {
      const remote = createRemote();
      const cache = createCache(remote);
      remote.failOn("fetchAll", new Error("connection reset"));

      await expect(cache.getTable("Main")).rejects.toBeInstanceOf(BackingStoreError);
      expect(cache.isCached("Main")).toBe(false);

      remote.clearFailures();
      const table = await cache.getTable("Main");

      expect(table.recordCount).toBe(2);
      expect(remote.callCount("fetchAll", "Main")).toBe(2);
    });

    it("creates a missing table with its header row", async () => {
      const remote = createRemote();
      const cache = createCache(remote);

      const users = await cache.getTable("Users");

      expect(users.headers).toEqual(["ID", "Username", "Имя", "Роль"]);
      expect(users.recordCount).toBe(0);
      expect(remote.peek("Users")).toEqual([["ID", "Username", "Имя", "Роль"]]);
    });

    it("creates a missing table without headers as empty", async () => {
      const remote = createRemote();
      const cache = createCache(remote);

      const table = await cache.getTable("Scratch");

      expect(table.rowCount).toBe(0);
      expect(remote.callCount("createSheet", "Scratch")).toBe(1);
    });
  });

  describe("getHeaders", () => {
    it("returns the first row", async () => {
      const cache = createCache(createRemote());

      expect(await cache.getHeaders("Main")).toEqual(["Имя", "Фамилия", "Дата рождения"]);
    });
  });

  describe("appendRow", () => {
    it("makes the row visible to the next read without a re-fetch", async () => {
      const remote = createRemote();
      const cache = createCache(remote);
      await cache.getTable("Main");

      const rowCount = await cache.appendRow("Main", ["Вера", 42, null]);
      const table = await cache.getTable("Main");

      expect(rowCount).toBe(4);
      expect(table.values[table.rowCount - 1]).toEqual(["Вера", "42", ""]);
      expect(remote.callCount("fetchAll", "Main")).toBe(1);
      expect(remote.peek("Main")?.[3]).toEqual(["Вера", "42", ""]);
    });

    it("loads the table first when it was not cached", async () => {
      const remote = createRemote();
      const cache = createCache(remote);

      const rowCount = await cache.appendRow("Main", ["Вера", "Смирнова", ""]);

      expect(rowCount).toBe(4);
      expect(remote.callCount("fetchAll", "Main")).toBe(1);
      expect(cache.isCached("Main")).toBe(true);
    });

    it("creates a missing table with its header before appending", async () => {
      const remote = createRemote();
      const cache = createCache(remote);

      const rowCount = await cache.appendRow("Users", ["1001", "anna", "Анна Иванова", "user"]);

      expect(rowCount).toBe(2);
      expect(remote.peek("Users")).toEqual([
        ["ID", "Username", "Имя", "Роль"],
        ["1001", "anna", "Анна Иванова", "user"],
      ]);
      expect((await cache.getTable("Users")).recordCount).toBe(1);
    });

    it("keeps the cached copy unchanged when the remote write fails", async () => {
      const remote = createRemote();
      const cache = createCache(remote);
      const before = await cache.getTable("Main");
      remote.failOn("appendRow");

      await expect(cache.appendRow("Main", ["Вера"])).rejects.toBeInstanceOf(BackingStoreError);

      expect(await cache.getTable("Main")).toBe(before);
    });

    it("serializes concurrent appends to the same table", async () => {
      const remote = createRemote();
      const cache = createCache(remote);
      await cache.getTable("Main");

      const counts = await Promise.all([
        cache.appendRow("Main", ["Вера"]),
        cache.appendRow("Main", ["Глеб"]),
      ]);

      expect(counts).toEqual([4, 5]);
      const table = await cache.getTable("Main");
      expect(table.body.map((row) => row[0])).toEqual(["Анна", "Борис", "Вера", "Глеб"]);
    });
  });

  describe("updateRow", () => {
    it("overwrites the cached row in place", async () => {
      const remote = createRemote();
      const cache = createCache(remote);
      await cache.getTable("Main");

      await cache.updateRow("Main", 3, ["Борис", "Петров", "1985-01-09"]);
      const table = await cache.getTable("Main");

      expect(table.row(3)).toEqual(["Борис", "Петров", "1985-01-09"]);
      expect(remote.callCount("fetchAll", "Main")).toBe(1);
    });

    it("refreshes when the row is beyond the cached rows", async () => {
      const remote = createRemote();
      const cache = createCache(remote);
      await cache.getTable("Main");

      await cache.updateRow("Main", 5, ["Дарья", "Котова", ""]);
      const table = await cache.getTable("Main");

      expect(remote.callCount("fetchAll", "Main")).toBe(2);
      expect(table.row(5)).toEqual(["Дарья", "Котова", ""]);
    });
  });

  describe("deleteRow", () => {
    it("drops the cached copy so the next read re-fetches", async () => {
      const remote = createRemote();
      const cache = createCache(remote);
      await cache.getTable("Main");

      await cache.deleteRow("Main", 2);
      const table = await cache.getTable("Main");

      expect(remote.callCount("fetchAll", "Main")).toBe(2);
      expect(table.body).toEqual([["Борис", "Петров", ""]]);
    });

    it("does not keep rows from a read that started before the delete", async () => {
      const remote = new HeldFetchStore({
        Main: [
          ["Имя", "Фамилия", "Дата рождения"],
          ["Анна", "Иванова", "1990-05-01"],
          ["Борис", "Петров", ""],
        ],
      });
      const cache = createCache(remote);
      remote.holdFetches();

      const reading = cache.getTable("Main");
      await cache.deleteRow("Main", 2);
      remote.releaseFetches();

      expect((await reading).body).toEqual([["Борис", "Петров", ""]]);
      expect((await cache.getTable("Main")).body).toEqual([["Борис", "Петров", ""]]);
      expect(remote.callCount("fetchAll", "Main")).toBe(2);
    });
  });

  describe("deleteColumn", () => {
    it("removes the column by name", async () => {
      const remote = createRemote();
      const cache = createCache(remote);

      await cache.deleteColumn("Main", "Фамилия");

      expect(await cache.getHeaders("Main")).toEqual(["Имя", "Дата рождения"]);
    });

    it("rejects an unknown column without a remote write", async () => {
      const remote = createRemote();
      const cache = createCache(remote);

      await expect(cache.deleteColumn("Main", "Возраст")).rejects.toBeInstanceOf(NotFoundError);
      expect(remote.callCount("deleteColumn")).toBe(0);
    });
  });

  describe("addColumn", () => {
    it("adds a header once and is a no-op the second time", async () => {
      const remote = createRemote();
      const cache = createCache(remote);

      const first = await cache.addColumn("Main", "Телефон");
      const second = await cache.addColumn("Main", "Телефон");
      const headers = await cache.getHeaders("Main");

      expect(first).toBe(true);
      expect(second).toBe(false);
      expect(headers.filter((header) => header === "Телефон")).toHaveLength(1);
      expect(headers).toEqual(["Имя", "Фамилия", "Дата рождения", "Телефон"]);
      expect(remote.callCount("setCellValue")).toBe(1);
    });
  });

  describe("refresh", () => {
    it("replaces a single table with the remote contents", async () => {
      const remote = createRemote();
      const cache = createCache(remote);
      await cache.getTable("Main");
      await remote.appendRow("Main", ["Вера", "Смирнова", ""]);

      const rows = await cache.refresh("Main");

      expect(rows).toBe(4);
      expect((await cache.getTable("Main")).recordCount).toBe(3);
    });

    it("throws for a single table that fails to load", async () => {
      const remote = createRemote();
      const cache = createCache(remote);
      remote.failOn("fetchAll");

      await expect(cache.refresh("Main")).rejects.toBeInstanceOf(BackingStoreError);
    });

    it("refreshes every known table and skips failures", async () => {
      const remote = createRemote();
      const cache = createCache(remote);

      const total = await cache.refresh();

      // Main has 3 rows, Users is created with its header row
      expect(total).toBe(4);
    });
  });
});
