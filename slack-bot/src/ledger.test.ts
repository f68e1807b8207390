import { describe, it, expect } from "vitest";
import { Ledger, emptyLedger, parseLedgerSnapshot } from "./ledger.js";
import { MemoryStore } from "./storage/fileStore.js";
import { ManualClock } from "./testing/fakes.js";
import type { LedgerSnapshot } from "./types.js";

function setup() {
  const store = new MemoryStore<LedgerSnapshot>(emptyLedger());
  const clock = new ManualClock(1_000);
  const ledger = new Ledger(store, clock);
  return { store, clock, ledger };
}

describe("Ledger", () => {
  describe("balances", () => {
    it("creates unseen accounts at zero", () => {
      const { ledger } = setup();
      expect(ledger.getBalance("u1")).toBe(0);
    });

    it("clamps negative deltas at zero", () => {
      const { ledger } = setup();
      expect(ledger.addPoints("u1", 30)).toBe(30);
      expect(ledger.addPoints("u1", -1000)).toBe(0);
      expect(ledger.getBalance("u1")).toBe(0);
    });

    it("ignores non-finite deltas", () => {
      const { ledger } = setup();
      ledger.addPoints("u1", 10);
      expect(ledger.addPoints("u1", Number.NaN)).toBe(10);
      expect(ledger.addPoints("u1", Number.POSITIVE_INFINITY)).toBe(10);
      expect(ledger.snapshot().points).toEqual({ u1: 10 });
    });

    it("ranks the leaderboard by points", () => {
      const { ledger } = setup();
      ledger.addPoints("a", 5);
      ledger.addPoints("b", 50);
      ledger.addPoints("c", 20);
      expect(ledger.leaderboard(2)).toEqual([
        { userId: "b", points: 50 },
        { userId: "c", points: 20 },
      ]);
    });
  });

  describe("transfer", () => {
    it("moves at most the sender's balance and conserves the total", () => {
      const { ledger } = setup();
      ledger.addPoints("a", 20);
      ledger.addPoints("b", 5);

      const moved = ledger.transfer("a", "b", 50);

      expect(moved).toBe(20);
      expect(ledger.getBalance("a")).toBe(0);
      expect(ledger.getBalance("b")).toBe(25);
    });

    it("moves the full amount when covered", () => {
      const { ledger } = setup();
      ledger.addPoints("a", 40);
      expect(ledger.transfer("a", "b", 15)).toBe(15);
      expect(ledger.getBalance("a")).toBe(25);
      expect(ledger.getBalance("b")).toBe(15);
    });

    it("treats a negative request as nothing", () => {
      const { ledger } = setup();
      ledger.addPoints("a", 10);
      ledger.addPoints("b", 10);
      expect(ledger.transfer("a", "b", -7)).toBe(0);
      expect(ledger.getBalance("a")).toBe(10);
      expect(ledger.getBalance("b")).toBe(10);
    });

    it("treats a non-finite request as nothing", () => {
      const { ledger } = setup();
      ledger.addPoints("a", 10);
      expect(ledger.transfer("a", "b", Number.NaN)).toBe(0);
      expect(ledger.transfer("a", "b", Number.POSITIVE_INFINITY)).toBe(0);
      expect(ledger.getBalance("a")).toBe(10);
      expect(ledger.getBalance("b")).toBe(0);
    });

    it("moves nothing from an empty account", () => {
      const { ledger } = setup();
      expect(ledger.transfer("a", "b", 10)).toBe(0);
      expect(ledger.getBalance("b")).toBe(0);
    });
  });

  describe("cooldowns", () => {
    it("counts down against the clock", () => {
      const { ledger, clock } = setup();
      ledger.setCooldown("u1", "heist", 120);
      expect(ledger.cooldownRemaining("u1", "heist")).toBe(120);

      clock.advance(50);
      expect(ledger.cooldownRemaining("u1", "heist")).toBe(70);

      clock.advance(100);
      expect(ledger.cooldownRemaining("u1", "heist")).toBe(0);
    });

    it("treats a non-finite duration as no cooldown", () => {
      const { ledger } = setup();
      ledger.setCooldown("u1", "heist", Number.NaN);
      expect(ledger.cooldownRemaining("u1", "heist")).toBe(0);
      expect(ledger.snapshot().cooldowns).toEqual({ u1: { heist: 1_000 } });
    });

    it("reports zero for an unknown key", () => {
      const { ledger } = setup();
      expect(ledger.cooldownRemaining("u1", "never")).toBe(0);
    });

    it("stores absolute expiry in the snapshot", () => {
      const { ledger } = setup();
      ledger.setCooldown("u1", "heist", 120);
      expect(ledger.snapshot().cooldowns).toEqual({ u1: { heist: 1_120 } });
    });
  });

  describe("persistence", () => {
    it("writes a snapshot after each mutation", async () => {
      const { ledger, store } = setup();
      ledger.addPoints("u1", 10);
      ledger.transfer("u1", "u2", 4);
      await ledger.flush();

      expect(store.saves).toBe(2);
      expect(store.peek()).toEqual({
        points: { u1: 6, u2: 4 },
        cooldowns: { u1: {}, u2: {} },
      });
    });

    it("keeps playing when a write fails", async () => {
      const { ledger, store } = setup();
      store.failNext = true;

      expect(ledger.addPoints("u1", 5)).toBe(5);
      await ledger.flush();
      expect(store.saves).toBe(0);
      expect(ledger.getBalance("u1")).toBe(5);

      ledger.addPoints("u1", 1);
      await ledger.flush();
      expect(store.peek().points).toEqual({ u1: 6 });
    });

    it("restores balances from the store", async () => {
      const store = new MemoryStore<LedgerSnapshot>({ points: { u1: 42 }, cooldowns: { u1: { heist: 1_060 } } });
      const ledger = new Ledger(store, new ManualClock(1_000));
      await ledger.load();
      expect(ledger.getBalance("u1")).toBe(42);
      expect(ledger.cooldownRemaining("u1", "heist")).toBe(60);
    });
  });

  describe("parseLedgerSnapshot", () => {
    it("drops malformed entries", () => {
      const parsed = parseLedgerSnapshot({
        points: { a: 3.7, b: "x", c: -2 },
        cooldowns: { a: { heist: 100, bad: null }, b: 5 },
      });
      expect(parsed).toEqual({ points: { a: 3, c: 0 }, cooldowns: { a: { heist: 100 } } });
    });

    it("falls back to an empty ledger", () => {
      expect(parseLedgerSnapshot("nope")).toEqual({ points: {}, cooldowns: {} });
    });
  });
});
