import { Session, transition } from "../domain/session";
import { SessionStore } from "./sessionStore";

describe("SessionStore", () => {
  const TIMEOUT = 30 * 60_000;
  let now: number;

  const createStore = () => new SessionStore({ timeoutMs: TIMEOUT, now: () => now });

  const builderSession = (base: Session): Session =>
    transition(base, {
      state: "BUILDER_MODE",
      mode: "CREATE",
      draft: { Имя: "Иван" },
      step: { name: "MENU" },
      fields: ["Имя"],
    });

  beforeEach(() => {
    now = Date.parse("2024-03-01T10:00:00.000Z");
  });

  describe("get", () => {
    it("creates an IDLE session on first access", async () => {
      const store = createStore();

      const session = await store.get(42);

      expect(session.state).toBe("IDLE");
      expect(session.lastAccess).toBe(now);
      expect(session.createdAt).toBe("2024-03-01T10:00:00.000Z");
      expect(store.size).toBe(1);
    });

    it("returns the saved session within the timeout and extends its lease", async () => {
      const store = createStore();
      await store.save(42, builderSession(await store.get(42)));

      now += TIMEOUT - 1;
      const session = await store.get(42);

      expect(session.state).toBe("BUILDER_MODE");
      expect(session.lastAccess).toBe(now);
    });

    it("returns a fresh IDLE session with no draft once the timeout has elapsed", async () => {
      const store = createStore();
      await store.save(42, builderSession(await store.get(42)));

      now += TIMEOUT;
      const session = await store.get(42);

      expect(session.state).toBe("IDLE");
      expect("draft" in session).toBe(false);
    });
  });

  describe("save", () => {
    it("stamps lastAccess with the current time", async () => {
      const store = createStore();
      const session = await store.get(7);

      now += 5_000;
      await store.save(7, session);
      now += TIMEOUT - 5_000;
      const later = await store.get(7);

      expect(later.createdAt).toBe(session.createdAt);
      expect(later.lastAccess).toBe(now);
    });
  });

  describe("clear", () => {
    it("removes the session so the next get starts over", async () => {
      const store = createStore();
      await store.save(42, builderSession(await store.get(42)));

      await store.clear(42);

      expect(store.size).toBe(0);
      expect((await store.get(42)).state).toBe("IDLE");
    });
  });

  describe("sweepExpired", () => {
    it("removes only sessions idle past the timeout", async () => {
      const store = createStore();
      await store.get(1);
      now += TIMEOUT / 2;
      await store.get(2);

      now += TIMEOUT / 2;
      const removed = await store.sweepExpired();

      expect(removed).toBe(1);
      expect(store.size).toBe(1);
    });
  });

  describe("startSweeper", () => {
    afterEach(() => {
      jest.useRealTimers();
    });

    it("sweeps on the interval until stopped", async () => {
      jest.useFakeTimers();
      const store = createStore();
      const sweep = jest.spyOn(store, "sweepExpired");

      const stop = store.startSweeper(60_000);
      jest.advanceTimersByTime(120_000);
      stop();
      jest.advanceTimersByTime(120_000);

      expect(sweep).toHaveBeenCalledTimes(2);
    });
  });
});
