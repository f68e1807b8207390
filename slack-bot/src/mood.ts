import { DateTime } from "luxon";
import type { Clock } from "./clock.js";
import { CONFIG } from "./config.js";
import { logger as rootLogger, errorMessage } from "./logger.js";
import type { SnapshotStore } from "./storage/fileStore.js";
import { isRecord, toCount } from "./storage/sanitize.js";

const logger = rootLogger.child({ component: "mood" });

export type MoodLabel = "positive" | "neutral" | "negative" | "toxic";

export type MoodCounts = Record<MoodLabel, number> & { messages: number };

/** workspace id -> UTC day (`yyyy-MM-dd`) -> counters */
export type MoodSnapshot = Record<string, Record<string, MoodCounts>>;

// order matters: ties go to the earlier label
const LABELS: readonly MoodLabel[] = ["positive", "neutral", "negative", "toxic"];

const LABEL_TEXT: Record<MoodLabel, string> = {
    positive: "POSITIF",
    neutral: "NETRAL",
    negative: "NEGATIF",
    toxic: "TOXIC",
};

export const POSITIVE_WORDS: readonly string[] = [
    "mantap", "bagus", "keren", "thanks", "thank you", "makasih", "wkwk",
    "haha", "lucu", "senang", "happy", "gas", "nice", "good", "great",
];
export const NEGATIVE_WORDS: readonly string[] = [
    "sedih", "cape", "capek", "bad", "jelek", "kesal", "marah",
    "kecewa", "susah", "anjir", "aduh",
];
export const TOXIC_WORDS: readonly string[] = [
    "tolol", "goblok", "anjing", "bangsat", "kontol", "memek",
];

export const emptyMoodCounts = (): MoodCounts => ({ positive: 0, neutral: 0, negative: 0, toxic: 0, messages: 0 });

export const emptyMood = (): MoodSnapshot => ({});

/**
 * Counts how many listed words occur anywhere in the message (substring
 * match, so "capek" also hits "cape"). A message with no hit is neutral.
 */
export function scoreMessage(text: string): MoodCounts {
    const low = text.toLowerCase();
    const hits = (words: readonly string[]) => words.filter((w) => low.includes(w)).length;
    const score = emptyMoodCounts();
    score.positive = hits(POSITIVE_WORDS);
    score.negative = hits(NEGATIVE_WORDS);
    score.toxic = hits(TOXIC_WORDS);
    if (score.positive + score.negative + score.toxic === 0) score.neutral = 1;
    score.messages = 1;
    return score;
}

export function dominantMood(counts: MoodCounts): string {
    let top: MoodLabel = LABELS[0];
    for (const label of LABELS) {
        if (counts[label] > counts[top]) top = label;
    }
    return LABEL_TEXT[top];
}

function addInto(target: MoodCounts, more: MoodCounts) {
    for (const label of LABELS) target[label] += more[label];
    target.messages += more.messages;
}

export function parseMoodSnapshot(raw: unknown): MoodSnapshot {
    const out = emptyMood();
    if (!isRecord(raw)) return out;
    for (const [scope, days] of Object.entries(raw)) {
        if (!isRecord(days)) continue;
        const kept: Record<string, MoodCounts> = {};
        for (const [day, counts] of Object.entries(days)) {
            if (!isRecord(counts)) continue;
            const c = emptyMoodCounts();
            for (const label of LABELS) c[label] = toCount(counts[label]) ?? 0;
            c.messages = toCount(counts.messages) ?? 0;
            kept[day] = c;
        }
        out[scope] = kept;
    }
    return out;
}

/**
 * Per-workspace daily mood counters, fed by every user message. Persisted
 * the same way as the ledger: write-through, failures logged.
 */
export class MoodTracker {
    private state: MoodSnapshot = emptyMood();
    private pending: Promise<void> = Promise.resolve();

    constructor(
        private readonly store: SnapshotStore<MoodSnapshot>,
        private readonly clock: Clock,
    ) {}

    async load(): Promise<void> {
        this.state = parseMoodSnapshot(await this.store.load());
        logger.info("Mood counters restored", { workspaces: Object.keys(this.state).length });
    }

    flush(): Promise<void> {
        return this.pending;
    }

    private dayKey(daysAgo = 0): string {
        return DateTime.fromSeconds(this.clock.nowSeconds(), { zone: "utc" })
            .minus({ days: daysAgo })
            .toFormat("yyyy-MM-dd");
    }

    record(scopeId: string, text: string): MoodCounts {
        const score = scoreMessage(text);
        const day = this.dayKey();
        if (this.state[scopeId] === undefined) this.state[scopeId] = {};
        const days = this.state[scopeId];
        if (days[day] === undefined) days[day] = emptyMoodCounts();
        addInto(days[day], score);
        this.persist();
        return score;
    }

    /** Totals over today and the `days - 1` days before it. */
    summary(scopeId: string, days = 1): MoodCounts {
        const out = emptyMoodCounts();
        const perDay = this.state[scopeId];
        if (!perDay) return out;
        const span = Math.min(Math.max(1, Math.floor(days)), CONFIG.mood.maxDays);
        for (let i = 0; i < span; i++) {
            const c = perDay[this.dayKey(i)];
            if (c) addInto(out, c);
        }
        return out;
    }

    snapshot(): MoodSnapshot {
        return structuredClone(this.state);
    }

    private persist() {
        const snap = this.snapshot();
        this.pending = this.pending.then(async () => {
            try {
                await this.store.save(snap);
            } catch (e: unknown) {
                logger.warn("Mood snapshot write failed", { error: errorMessage(e) });
            }
        });
    }
}

function percent(n: number, total: number): string {
    return `${((n / total) * 100).toFixed(1)}%`;
}

export function renderMood(days: number, c: MoodCounts): string {
    const total = Math.max(1, c.positive + c.neutral + c.negative + c.toxic);
    return [
        "📈 *Mood Server Detector*",
        `Rekap ${days} hari terakhir • ${c.messages} pesan terpantau`,
        `🙂 Positif: ${c.positive} (${percent(c.positive, total)})`,
        `😐 Netral: ${c.neutral} (${percent(c.neutral, total)})`,
        `🙁 Negatif: ${c.negative} (${percent(c.negative, total)})`,
        `☣ Toxic: ${c.toxic} (${percent(c.toxic, total)})`,
        `Kesimpulan: Mood dominan: **${dominantMood(c)}**`,
    ].join("\n");
}

/** `/mood` argument: empty means one day; anything but a positive integer is rejected. */
export function parseMoodDays(text: string): number | null {
    const t = text.trim();
    if (!t) return 1;
    if (!/^\d+$/.test(t)) return null;
    const n = Number(t);
    return n >= 1 ? n : null;
}
