import { describe, it, expect } from "vitest";
import { heist, renderLeaderboard, HEIST_COOLDOWN_KEY } from "./economy.js";
import { Ledger, emptyLedger } from "./ledger.js";
import { MemoryStore } from "./storage/fileStore.js";
import { ManualClock, scripted } from "./testing/fakes.js";

function newLedger() {
    const clock = new ManualClock(5_000);
    return { clock, ledger: new Ledger(new MemoryStore(emptyLedger()), clock) };
}

describe("heist", () => {
    it("refuses to target yourself", () => {
        const { ledger } = newLedger();
        const res = heist(ledger, "u1", "u1", scripted([0]));
        expect(res.ok).toBe(false);
        if (!res.ok) expect(res.error.code).toBe("invalid_input");
    });

    it("seeds empty accounts and steals on success", () => {
        const { ledger } = newLedger();
        // 0.1 < 0.55 succeeds; 0 picks the smallest loot
        const res = heist(ledger, "thief", "mark", scripted([0.1, 0]));

        expect(res).toEqual({ ok: true, value: { success: true, amount: 10 } });
        expect(ledger.getBalance("thief")).toBe(60);
        expect(ledger.getBalance("mark")).toBe(40);
        expect(ledger.cooldownRemaining("thief", HEIST_COOLDOWN_KEY)).toBe(120);
    });

    it("pays a fine on failure", () => {
        const { ledger } = newLedger();
        ledger.addPoints("thief", 100);
        ledger.addPoints("mark", 5);
        // 0.9 fails; 0.99 -> 8 + floor(0.99 * 18) = 25
        const res = heist(ledger, "thief", "mark", scripted([0.9, 0.99]));

        expect(res).toEqual({ ok: true, value: { success: false, amount: 25 } });
        expect(ledger.getBalance("thief")).toBe(75);
        expect(ledger.getBalance("mark")).toBe(30);
    });

    it("clamps the loot to what the target holds", () => {
        const { ledger } = newLedger();
        ledger.addPoints("thief", 10);
        ledger.addPoints("mark", 3);
        const res = heist(ledger, "thief", "mark", scripted([0, 0.999]));

        expect(res).toEqual({ ok: true, value: { success: true, amount: 3 } });
        expect(ledger.getBalance("mark")).toBe(0);
        expect(ledger.getBalance("thief")).toBe(13);
    });

    it("is blocked while the cooldown runs", () => {
        const { ledger, clock } = newLedger();
        heist(ledger, "thief", "mark", scripted([0.1, 0]));
        const before = ledger.snapshot();

        clock.advance(30);
        const res = heist(ledger, "thief", "mark", scripted([0.1, 0]));

        expect(res).toEqual({ ok: false, error: { code: "invalid_input", reason: "⏳ Cooldown heist: 90s lagi." } });
        expect(ledger.snapshot()).toEqual(before);
    });
});

describe("renderLeaderboard", () => {
    it("says so when nobody has points", () => {
        const { ledger } = newLedger();
        expect(renderLeaderboard(ledger)).toBe("Belum ada data poin.");
    });

    it("lists accounts by points", () => {
        const { ledger } = newLedger();
        ledger.addPoints("b", 10);
        ledger.addPoints("a", 30);
        expect(renderLeaderboard(ledger)).toBe("🏅 *Leaderboard Poin*\n1. <@a> - 30 poin\n2. <@b> - 10 poin");
    });
});
