import type { ChatGateway } from "../chat.js";
import { systemClock, type Clock } from "../clock.js";
import { CONFIG } from "../config.js";
import { logger as rootLogger, errorMessage } from "../logger.js";
import type { SessionRegistry } from "../sessions/registry.js";
import type { DebatePhase, DebateSession, DebateSide, ScoreEntry } from "../sessions/types.js";
import { fail, ok, type ChannelId, type Result, type UserId } from "../types.js";

export type DebateSummary = {
    topic: string;
    turnSeconds: number;
    totalRounds: number;
    pro: UserId[];
    kontra: UserId[];
    proPoints: number;
    kontraPoints: number;
    phase: DebatePhase;
};

type Runner = {
    controller: AbortController;
    done: Promise<void>;
};

const logger = rootLogger.child({ component: "debate" });

const NO_SESSION = "Belum ada sesi debat. Gunakan `/debat_mulai`.";

export function parseSide(raw: string): DebateSide | undefined {
    switch (raw.trim().toLowerCase()) {
        case "pro":
            return "PRO";
        case "kontra":
            return "KONTRA";
        default:
            return undefined;
    }
}

export function sideOf(s: DebateSession, userId: UserId): DebateSide | undefined {
    if (s.pro.includes(userId)) return "PRO";
    if (s.kontra.includes(userId)) return "KONTRA";
    return undefined;
}

function countFor(log: readonly ScoreEntry[], side: DebateSide): number {
    return log.filter((e) => e.side === side).length;
}

export function turnMessage(round: number, totalRounds: number, side: DebateSide, userId: UserId, turnSeconds: number): string {
    return `🕒 Round ${round}/${totalRounds} • Giliran ${side}: <@${userId}> (${turnSeconds}s)`;
}

export function renderSummary(sum: DebateSummary): string {
    const mention = (ids: UserId[]) => ids.map((u) => `<@${u}>`).join(", ") || "-";
    const status = sum.phase === "running" ? "Berjalan" : sum.phase === "finished" ? "Selesai" : "Standby";
    return [
        "📌 *Ringkasan Debat*",
        `*Topik:* ${sum.topic}`,
        `*Peserta PRO:* ${mention(sum.pro)}`,
        `*Peserta KONTRA:* ${mention(sum.kontra)}`,
        `*Jumlah Poin:* PRO: **${sum.proPoints}** | KONTRA: **${sum.kontraPoints}**`,
        `*Status:* ${status}`,
    ].join("\n");
}

/**
 * Structured debates, one per channel.
 *
 * Each started debate gets a background runner that walks the turns
 * round by round, PRO roster then KONTRA roster, in join order. A channel
 * never has more than one live runner: starting again, redefining or
 * stopping aborts the previous one, which then exits at its next turn
 * boundary without posting anything further.
 */
export class DebateScheduler {
    private readonly runners = new Map<ChannelId, Runner>();

    constructor(
        private readonly registry: SessionRegistry,
        private readonly gateway: ChatGateway,
        private readonly clock: Clock = systemClock,
    ) {}

    define(channelId: ChannelId, topic: string, turnSeconds: number, rounds: number): Result<DebateSession> {
        const { minTurnSeconds, minRounds } = CONFIG.debate;
        if (!Number.isInteger(turnSeconds) || !Number.isInteger(rounds) || turnSeconds < minTurnSeconds || rounds < minRounds) {
            return fail("invalid_input", `Minimal \`turn_seconds=${minTurnSeconds}\` dan \`rounds>=${minRounds}\`.`);
        }
        const cleanTopic = topic.trim();
        if (!cleanTopic) return fail("invalid_input", "Topik debat tidak boleh kosong.");

        this.cancel(channelId, "redefined");
        const session: DebateSession = {
            kind: "debate",
            topic: cleanTopic,
            turnSeconds,
            totalRounds: rounds,
            pro: [],
            kontra: [],
            scoreLog: [],
            phase: "defined",
        };
        this.registry.replace(channelId, session);
        return ok(session);
    }

    join(channelId: ChannelId, userId: UserId, rawSide: string): Result<DebateSide> {
        const s = this.registry.get(channelId, "debate");
        if (!s) return fail("not_found", NO_SESSION);
        if (s.phase === "running") return fail("invalid_input", "Debat sudah berjalan, tidak bisa join.");
        const side = parseSide(rawSide);
        if (!side) return fail("invalid_input", "Pilih sisi: `pro` atau `kontra`.");

        s.pro = s.pro.filter((u) => u !== userId);
        s.kontra = s.kontra.filter((u) => u !== userId);
        if (side === "PRO") s.pro.push(userId);
        else s.kontra.push(userId);
        return ok(side);
    }

    leave(channelId: ChannelId, userId: UserId): Result<DebateSide> {
        const s = this.registry.get(channelId, "debate");
        if (!s) return fail("not_found", NO_SESSION);
        if (s.phase === "running") return fail("invalid_input", "Debat sudah berjalan, tidak bisa keluar.");
        const side = sideOf(s, userId);
        if (!side) return fail("invalid_input", "Kamu belum join sisi debat.");
        s.pro = s.pro.filter((u) => u !== userId);
        s.kontra = s.kontra.filter((u) => u !== userId);
        return ok(side);
    }

    /** Attaches a fresh runner, replacing any that is still alive. */
    start(channelId: ChannelId): Result<{ replaced: boolean }> {
        const s = this.registry.get(channelId, "debate");
        if (!s) return fail("not_found", NO_SESSION);
        if (!s.pro.length || !s.kontra.length) {
            return fail("invalid_input", "Kedua sisi harus punya minimal 1 peserta.");
        }

        const replaced = this.cancel(channelId, "restarted");
        s.phase = "running";

        const controller = new AbortController();
        const runner: Runner = { controller, done: Promise.resolve() };
        runner.done = this.run(channelId, s, controller.signal)
            .catch((e: unknown) => {
                logger.error("Debate runner failed", { channelId, error: errorMessage(e) });
                if (!controller.signal.aborted) s.phase = "finished";
            })
            .finally(() => {
                if (this.runners.get(channelId) === runner) this.runners.delete(channelId);
            });
        this.runners.set(channelId, runner);
        logger.info("Debate runner started", { channelId, rounds: s.totalRounds, turnSeconds: s.turnSeconds, replaced });
        return ok({ replaced });
    }

    addPoint(channelId: ChannelId, userId: UserId, note: string): Result<ScoreEntry> {
        const s = this.registry.get(channelId, "debate");
        if (!s) return fail("not_found", NO_SESSION);
        if (s.phase === "finished") return fail("invalid_input", "Debat sudah selesai.");
        const side = sideOf(s, userId);
        if (!side) return fail("invalid_input", "Kamu belum join sisi debat.");
        const entry: ScoreEntry = { userId, side, note: note.trim() };
        s.scoreLog.push(entry);
        return ok(entry);
    }

    summary(channelId: ChannelId): Result<DebateSummary> {
        const s = this.registry.get(channelId, "debate");
        if (!s) return fail("not_found", NO_SESSION);
        return ok({
            topic: s.topic,
            turnSeconds: s.turnSeconds,
            totalRounds: s.totalRounds,
            pro: [...s.pro],
            kontra: [...s.kontra],
            proPoints: countFor(s.scoreLog, "PRO"),
            kontraPoints: countFor(s.scoreLog, "KONTRA"),
            phase: s.phase,
        });
    }

    stop(channelId: ChannelId): Result<void> {
        const s = this.registry.get(channelId, "debate");
        if (!s) return fail("not_found", "Tidak ada sesi debat aktif.");
        s.phase = "finished";
        this.cancel(channelId, "stopped");
        this.registry.end(channelId, "debate");
        return ok(undefined);
    }

    isRunnerAlive(channelId: ChannelId): boolean {
        return this.runners.has(channelId);
    }

    /** Settles when the channel's current runner (if any) has exited. */
    whenIdle(channelId: ChannelId): Promise<void> {
        return this.runners.get(channelId)?.done ?? Promise.resolve();
    }

    async shutdown(): Promise<void> {
        const pending = [...this.runners.keys()].map((channelId) => {
            const done = this.whenIdle(channelId);
            this.cancel(channelId, "shutdown");
            return done;
        });
        await Promise.all(pending);
    }

    private cancel(channelId: ChannelId, reason: string): boolean {
        const runner = this.runners.get(channelId);
        if (!runner) return false;
        runner.controller.abort();
        this.runners.delete(channelId);
        logger.info("Debate runner cancelled", { channelId, reason });
        return true;
    }

    private async run(channelId: ChannelId, s: DebateSession, signal: AbortSignal): Promise<void> {
        const log = logger.child({ channelId });
        const channel = await this.gateway.resolveChannel(channelId);
        if (!channel) {
            log.warn("Debate channel not found; runner exiting");
            if (!signal.aborted) s.phase = "defined";
            return;
        }
        if (signal.aborted) return;

        await channel.send(
            `🎤 Debat dimulai!\nTopik: **${s.topic}**\nDurasi tiap giliran: **${s.turnSeconds}s**`,
        );

        const lineup: Array<[DebateSide, UserId[]]> = [["PRO", [...s.pro]], ["KONTRA", [...s.kontra]]];
        for (let round = 1; round <= s.totalRounds; round++) {
            for (const [side, roster] of lineup) {
                for (const userId of roster) {
                    if (signal.aborted || s.phase !== "running") {
                        log.debug("Debate runner exiting early", { round });
                        return;
                    }
                    await channel.send(turnMessage(round, s.totalRounds, side, userId, s.turnSeconds));
                    await this.clock.sleep(s.turnSeconds * 1000, signal);
                }
            }
        }
        if (signal.aborted || s.phase !== "running") return;

        s.phase = "finished";
        log.info("Debate finished");
        await channel.send(
            "✅ Debat selesai.\n" +
            `Poin tercatat: PRO **${countFor(s.scoreLog, "PRO")}** | KONTRA **${countFor(s.scoreLog, "KONTRA")}**\n` +
            "Gunakan `/debat_ringkas` untuk lihat ringkasan.",
        );
    }
}
