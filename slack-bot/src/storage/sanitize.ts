export function isRecord(v: unknown): v is Record<string, unknown> {
    return typeof v === "object" && v !== null && !Array.isArray(v);
}

/** A finite number floored to a non-negative integer, else `undefined`. */
export function toCount(v: unknown): number | undefined {
    return typeof v === "number" && Number.isFinite(v) ? Math.max(0, Math.floor(v)) : undefined;
}
