import "dotenv/config";

export type LogLevel = "debug" | "info" | "warn" | "error";

function envInt(name: string, fallback: number): number {
    const raw = process.env[name];
    if (!raw) return fallback;
    const n = Number(raw);
    return Number.isFinite(n) ? Math.floor(n) : fallback;
}

function envLogLevel(raw: string | undefined): LogLevel {
    switch (raw) {
        case "debug":
        case "info":
        case "warn":
        case "error":
            return raw;
        default:
            return "info";
    }
}

export const DATA_DIR = process.env.DATA_DIR || "./data";
export const LEDGER_FILE = process.env.LEDGER_FILE || "game_data.json";
export const LOG_LEVEL = envLogLevel(process.env.LOG_LEVEL);

// point rewards per game
export const REWARDS = {
    wordGuess: envInt("REWARD_WORD_GUESS", 10),
    imageGuess: envInt("REWARD_IMAGE_GUESS", 10),
    trivia: envInt("REWARD_TRIVIA", 12),
    wordChain: envInt("REWARD_WORD_CHAIN", 2),
} as const;

export const HEIST = {
    cooldownSeconds: envInt("HEIST_COOLDOWN_SECONDS", 120),
    successChance: 0.55,
    loot: { min: 10, max: 40 },
    fine: { min: 8, max: 25 },
    seedGrant: 50,
} as const;

export const DEBATE = {
    minTurnSeconds: 10,
    minRounds: 1,
} as const;

export const MOOD = {
    file: process.env.MOOD_FILE || "mood_data.json",
    // widest /mood window
    maxDays: envInt("MOOD_MAX_DAYS", 365),
} as const;

export const CONFIG = {
    dataDir: DATA_DIR,
    ledgerFile: LEDGER_FILE,
    logLevel: LOG_LEVEL,
    rewards: REWARDS,
    heist: HEIST,
    debate: DEBATE,
    mood: MOOD,
    port: envInt("PORT", 3000),
    slack: {
        botToken: process.env.SLACK_BOT_TOKEN,
        appToken: process.env.SLACK_APP_TOKEN,
        signingSecret: process.env.SLACK_SIGNING_SECRET,
    },
} as const;
