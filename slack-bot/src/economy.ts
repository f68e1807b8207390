import { CONFIG } from "./config.js";
import type { Ledger } from "./ledger.js";
import { logger } from "./logger.js";
import { randomInt } from "./random.js";
import { fail, ok, type Random, type Result, type UserId } from "./types.js";

export const HEIST_COOLDOWN_KEY = "heist";

export type HeistOutcome = {
    success: boolean;
    /** Points that actually changed hands. */
    amount: number;
};

export function heist(ledger: Ledger, thiefId: UserId, targetId: UserId, rng: Random = Math.random): Result<HeistOutcome> {
    const cfg = CONFIG.heist;
    if (thiefId === targetId) return fail("invalid_input", "Tidak bisa nge-heist diri sendiri.");

    const remain = ledger.cooldownRemaining(thiefId, HEIST_COOLDOWN_KEY);
    if (remain > 0) return fail("invalid_input", `⏳ Cooldown heist: ${remain}s lagi.`);

    // empty accounts get a starting stake
    if (ledger.getBalance(thiefId) === 0) ledger.addPoints(thiefId, cfg.seedGrant);
    if (ledger.getBalance(targetId) === 0) ledger.addPoints(targetId, cfg.seedGrant);

    const success = rng() < cfg.successChance;
    ledger.setCooldown(thiefId, HEIST_COOLDOWN_KEY, cfg.cooldownSeconds);

    const amount = success
        ? ledger.transfer(targetId, thiefId, randomInt(rng, cfg.loot.min, cfg.loot.max))
        : ledger.transfer(thiefId, targetId, randomInt(rng, cfg.fine.min, cfg.fine.max));

    logger.info("Heist", { thiefId, targetId, success, amount });
    return ok({ success, amount });
}

export function renderLeaderboard(ledger: Ledger, limit = 10): string {
    const rows = ledger.leaderboard(limit);
    if (!rows.length) return "Belum ada data poin.";
    const lines = rows.map((r, i) => `${i + 1}. <@${r.userId}> - ${r.points} poin`);
    return `🏅 *Leaderboard Poin*\n${lines.join("\n")}`;
}
