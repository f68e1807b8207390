import type { LogLevel } from "./config.js";

const LEVELS: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
};

export type LogContext = Record<string, unknown>;

let currentLevel: LogLevel = "info";

export function setLogLevel(level: LogLevel) {
    currentLevel = level;
}

export function log(level: LogLevel, msg: string, ctx: LogContext = {}) {
    if (LEVELS[level] < LEVELS[currentLevel]) return;
    const line = {
        t: new Date().toISOString(),
        level,
        msg,
        ...ctx,
    };
    console.log(JSON.stringify(line));
}

export function errorMessage(e: unknown): string {
    return e instanceof Error ? e.message : String(e);
}

export type Logger = {
    debug(msg: string, ctx?: LogContext): void;
    info(msg: string, ctx?: LogContext): void;
    warn(msg: string, ctx?: LogContext): void;
    error(msg: string, ctx?: LogContext): void;
    /** A logger that stamps `base` on every line; per-call fields win. */
    child(base: LogContext): Logger;
};

function scoped(base: LogContext): Logger {
    const at = (level: LogLevel) => (msg: string, ctx?: LogContext) => log(level, msg, { ...base, ...ctx });
    return {
        debug: at("debug"),
        info: at("info"),
        warn: at("warn"),
        error: at("error"),
        child: (more) => scoped({ ...base, ...more }),
    };
}

export const logger: Logger = scoped({});
