import { logger as rootLogger } from "../logger.js";
import { fail, ok, type ChannelId, type MessageRef, type Result } from "../types.js";
import type { PromptSession, Session, SessionKind, SessionOf } from "./types.js";

const KIND_LABEL: Record<SessionKind, string> = {
    word_guess: "Tebak Kata",
    image_guess: "Tebak Gambar",
    trivia: "Trivia",
    word_chain: "Sambung Kata",
    debate: "Debat",
};

const logger = rootLogger.child({ component: "sessions" });

function slotKey(channelId: ChannelId, kind: SessionKind): string {
    return `${channelId}:${kind}`;
}

/**
 * One slot per (channel, kind). Sessions of different kinds share a channel
 * freely; a second session of the same kind is refused until the first ends.
 */
export class SessionRegistry {
    private readonly slots = new Map<string, Session>();

    start(channelId: ChannelId, session: Session): Result<Session> {
        const key = slotKey(channelId, session.kind);
        const existing = this.slots.get(key);
        if (existing) {
            logger.debug("Session already active", { channelId, kind: session.kind });
            return fail("already_active", `Masih ada sesi ${KIND_LABEL[session.kind]} aktif di channel ini.`);
        }
        this.slots.set(key, session);
        logger.info("Session started", { channelId, kind: session.kind });
        return ok(session);
    }

    /** Unconditionally installs `session`, dropping whatever held the slot. */
    replace(channelId: ChannelId, session: Session): Session | undefined {
        const key = slotKey(channelId, session.kind);
        const previous = this.slots.get(key);
        this.slots.set(key, session);
        logger.info("Session replaced", { channelId, kind: session.kind, hadPrevious: previous !== undefined });
        return previous;
    }

    get<K extends SessionKind>(channelId: ChannelId, kind: K): SessionOf<K> | undefined {
        const s = this.slots.get(slotKey(channelId, kind));
        return s && isKind(s, kind) ? s : undefined;
    }

    has(channelId: ChannelId, kind: SessionKind): boolean {
        return this.slots.has(slotKey(channelId, kind));
    }

    /** No-op when the slot is empty. */
    end(channelId: ChannelId, kind: SessionKind): boolean {
        const removed = this.slots.delete(slotKey(channelId, kind));
        if (removed) logger.info("Session ended", { channelId, kind });
        return removed;
    }

    /** The word or image session whose prompt message is `promptRef`. */
    findByPrompt(channelId: ChannelId, promptRef: MessageRef): PromptSession | undefined {
        for (const kind of ["word_guess", "image_guess"] as const) {
            const s = this.get(channelId, kind);
            if (s && s.promptRef === promptRef) return s;
        }
        return undefined;
    }

    get size(): number {
        return this.slots.size;
    }
}

function isKind<K extends SessionKind>(s: Session, kind: K): s is SessionOf<K> {
    return s.kind === kind;
}
