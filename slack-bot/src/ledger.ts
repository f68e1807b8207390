import type { Clock } from "./clock.js";
import type { SnapshotStore } from "./storage/fileStore.js";
import type { LeaderboardRow, LedgerSnapshot, UserId } from "./types.js";
import { logger, errorMessage } from "./logger.js";
import { isRecord, toCount } from "./storage/sanitize.js";

export const emptyLedger = (): LedgerSnapshot => ({ points: {}, cooldowns: {} });

/** Whole part of `n`, or 0 for NaN and infinities. */
function wholeOrZero(n: number): number {
  return Number.isFinite(n) ? Math.trunc(n) : 0;
}

/** Accepts whatever came off disk and keeps only well-formed entries. */
export function parseLedgerSnapshot(raw: unknown): LedgerSnapshot {
  const out = emptyLedger();
  if (!isRecord(raw)) return out;

  if (isRecord(raw.points)) {
    for (const [uid, v] of Object.entries(raw.points)) {
      const n = toCount(v);
      if (n !== undefined) out.points[uid] = n;
    }
  }
  if (isRecord(raw.cooldowns)) {
    for (const [uid, keys] of Object.entries(raw.cooldowns)) {
      if (!isRecord(keys)) continue;
      const entry: Record<string, number> = {};
      for (const [key, v] of Object.entries(keys)) {
        const n = toCount(v);
        if (n !== undefined) entry[key] = n;
      }
      out.cooldowns[uid] = entry;
    }
  }
  return out;
}

/**
 * Point balances and cooldown expirations per account.
 *
 * Every operation is synchronous and runs to completion, so callers never see
 * a half-applied transfer. Mutations are written through to the store in the
 * background; a failed write is logged and the in-memory state stays current.
 */
export class Ledger {
  private state: LedgerSnapshot = emptyLedger();
  private pending: Promise<void> = Promise.resolve();

  constructor(
    private readonly store: SnapshotStore<LedgerSnapshot>,
    private readonly clock: Clock,
  ) {}

  async load(): Promise<void> {
    this.state = parseLedgerSnapshot(await this.store.load());
    logger.info("Ledger restored", { accounts: Object.keys(this.state.points).length });
  }

  /** Resolves once every snapshot scheduled so far has been written (or failed). */
  flush(): Promise<void> {
    return this.pending;
  }

  private ensureAccount(userId: UserId) {
    if (this.state.points[userId] === undefined) this.state.points[userId] = 0;
    if (this.state.cooldowns[userId] === undefined) this.state.cooldowns[userId] = {};
  }

  private persist() {
    const snap = this.snapshot();
    this.pending = this.pending.then(async () => {
      try {
        await this.store.save(snap);
      } catch (e: unknown) {
        logger.warn("Ledger snapshot write failed", { error: errorMessage(e) });
      }
    });
  }

  getBalance(userId: UserId): number {
    this.ensureAccount(userId);
    return this.state.points[userId];
  }

  addPoints(userId: UserId, delta: number): number {
    this.ensureAccount(userId);
    const next = Math.max(0, this.state.points[userId] + wholeOrZero(delta));
    this.state.points[userId] = next;
    this.persist();
    logger.debug("Points changed", { userId, delta, balanceAfter: next });
    return next;
  }

  /** Moves at most the sender's balance; returns what actually moved. */
  transfer(fromId: UserId, toId: UserId, amount: number): number {
    this.ensureAccount(fromId);
    this.ensureAccount(toId);
    const requested = Math.max(0, wholeOrZero(amount));
    const moved = Math.min(requested, this.state.points[fromId]);
    this.state.points[fromId] -= moved;
    this.state.points[toId] += moved;
    this.persist();
    logger.info("Transfer", { fromId, toId, requested, moved });
    return moved;
  }

  setCooldown(userId: UserId, key: string, durationSeconds: number) {
    this.ensureAccount(userId);
    this.state.cooldowns[userId][key] = this.clock.nowSeconds() + wholeOrZero(durationSeconds);
    this.persist();
  }

  cooldownRemaining(userId: UserId, key: string): number {
    this.ensureAccount(userId);
    const expiry = this.state.cooldowns[userId][key] ?? 0;
    return Math.max(0, expiry - this.clock.nowSeconds());
  }

  leaderboard(limit = 10): LeaderboardRow[] {
    return Object.entries(this.state.points)
      .map(([userId, points]) => ({ userId, points }))
      .sort((a, b) => b.points - a.points)
      .slice(0, limit);
  }

  snapshot(): LedgerSnapshot {
    return structuredClone(this.state);
  }
}
