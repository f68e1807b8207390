export type UserId = string;
export type ChannelId = string;

/** Opaque reference to a posted message (the Slack `ts`). */
export type MessageRef = string;

/** Source of uniform floats in [0, 1). */
export type Random = () => number;

export type ErrorCode = "already_active" | "not_found" | "invalid_input";

export type GameError = {
    code: ErrorCode;
    reason: string;
    /** Machine-readable rule that was broken, when there is more than one. */
    detail?: string;
};

export type Result<T> =
| { ok: true; value: T }
| { ok: false; error: GameError };

export function ok<T>(value: T): Result<T> {
    return { ok: true, value };
}

export function fail<T = never>(code: ErrorCode, reason: string, detail?: string): Result<T> {
    return { ok: false, error: detail === undefined ? { code, reason } : { code, reason, detail } };
}

export type LedgerSnapshot = {
    points: Record<UserId, number>;
    cooldowns: Record<UserId, Record<string, number>>;
};

export type LeaderboardRow = {
    userId: UserId;
    points: number;
};
