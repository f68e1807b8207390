import { CONFIG } from "../config.js";
import type { Ledger } from "../ledger.js";
import { logger as rootLogger, errorMessage } from "../logger.js";
import { EMOJI_BANK, TRIVIA_BANK, TRIVIA_LABELS, WORD_BANK, type TriviaLabel } from "../puzzles/banks.js";
import { imageClue, scramble, wordClue } from "../puzzles/scramble.js";
import { pick } from "../random.js";
import { fail, ok, type ChannelId, type MessageRef, type Random, type Result, type UserId } from "../types.js";
import type { SessionRegistry } from "./registry.js";
import type { PromptSession, TriviaSession } from "./types.js";

export const MIN_CHAIN_WORD = 3;

export type GuessResult =
| { correct: true; answer: string; awarded: number; balance: number }
| { correct: false };

export type ChainViolation = "too_short" | "already_used" | "wrong_start";

export type ChainAccepted = {
    word: string;
    nextLetter: string;
    awarded: number;
    balance: number;
};

export type Banks = {
    words: readonly string[];
    emojis: typeof EMOJI_BANK;
    trivia: typeof TRIVIA_BANK;
};

const logger = rootLogger.child({ component: "games" });

const DEFAULT_BANKS: Banks = { words: WORD_BANK, emojis: EMOJI_BANK, trivia: TRIVIA_BANK };

export function normalizeGuess(s: string): string {
    return s.trim().toLowerCase();
}

/** Lowercase and keep letters only. */
export function cleanChainWord(word: string): string {
    return Array.from(word.toLowerCase().trim())
        .filter((ch) => /\p{L}/u.test(ch))
        .join("");
}

function isTriviaLabel(s: string): s is TriviaLabel {
    return TRIVIA_LABELS.some((l) => l === s);
}

/**
 * The per-channel word games. Every operation is synchronous: a correct
 * answer awards points and closes its session before returning.
 */
export class MiniGames {
    constructor(
        private readonly registry: SessionRegistry,
        private readonly ledger: Ledger,
        private readonly rng: Random = Math.random,
        private readonly banks: Banks = DEFAULT_BANKS,
    ) {}

    // ---- Tebak Kata -------------------------------------------------------

    startWordGuess(channelId: ChannelId): Result<{ scrambled: string }> {
        const answer = normalizeGuess(pick(this.banks.words, this.rng));
        const res = this.registry.start(channelId, { kind: "word_guess", answer });
        if (!res.ok) return res;
        return ok({ scrambled: scramble(answer, this.rng) });
    }

    answerWordGuess(channelId: ChannelId, userId: UserId, guess: string): Result<GuessResult> {
        return this.answerPrompt(channelId, "word_guess", userId, guess, CONFIG.rewards.wordGuess);
    }

    // ---- Tebak Gambar -----------------------------------------------------

    startImageGuess(channelId: ChannelId): Result<{ emojis: string }> {
        const puzzle = pick(this.banks.emojis, this.rng);
        const res = this.registry.start(channelId, { kind: "image_guess", answer: normalizeGuess(puzzle.answer) });
        if (!res.ok) return res;
        return ok({ emojis: puzzle.emojis });
    }

    answerImageGuess(channelId: ChannelId, userId: UserId, guess: string): Result<GuessResult> {
        return this.answerPrompt(channelId, "image_guess", userId, guess, CONFIG.rewards.imageGuess);
    }

    attachPrompt(channelId: ChannelId, kind: PromptSession["kind"], promptRef: MessageRef): boolean {
        const s = this.registry.get(channelId, kind);
        if (!s) return false;
        s.promptRef = promptRef;
        return true;
    }

    /**
     * Posts the prompt for a freshly started session and records its ref.
     * When the post fails or yields no ref the session is ended, so the
     * channel is free for a new game.
     */
    async publishPrompt(
        channelId: ChannelId,
        kind: PromptSession["kind"],
        post: () => Promise<MessageRef | undefined>,
    ): Promise<Result<MessageRef>> {
        let ref: MessageRef | undefined;
        try {
            ref = await post();
        } catch (e: unknown) {
            this.registry.end(channelId, kind);
            logger.warn("Prompt post failed; session dropped", { channelId, kind, error: errorMessage(e) });
            return fail("invalid_input", "Gagal mengirim soal. Coba lagi.");
        }
        if (!ref || !this.attachPrompt(channelId, kind, ref)) {
            this.registry.end(channelId, kind);
            logger.warn("Prompt post returned no message; session dropped", { channelId, kind });
            return fail("invalid_input", "Gagal mengirim soal. Coba lagi.");
        }
        return ok(ref);
    }

    private answerPrompt(
        channelId: ChannelId,
        kind: PromptSession["kind"],
        userId: UserId,
        guess: string,
        reward: number,
    ): Result<GuessResult> {
        const s = this.registry.get(channelId, kind);
        if (!s) {
            const start = kind === "word_guess" ? "/tebakkata" : "/tebakgambar";
            return fail("not_found", `Belum ada game aktif di channel ini. Mulai dengan \`${start}\`.`);
        }
        if (normalizeGuess(guess) !== s.answer) return ok({ correct: false });

        const balance = this.ledger.addPoints(userId, reward);
        this.registry.end(channelId, kind);
        logger.info("Puzzle solved", { channelId, kind, userId, reward });
        return ok({ correct: true, answer: s.answer, awarded: reward, balance });
    }

    // ---- clue / surrender (reply to the prompt) ---------------------------

    clue(channelId: ChannelId, promptRef: MessageRef): Result<string> {
        const s = this.registry.findByPrompt(channelId, promptRef);
        if (!s) return fail("not_found", "Pesan yang kamu reply bukan sesi Tebak Kata/Tebak Gambar yang sedang aktif.");
        return ok(s.kind === "word_guess"
            ? `💡 Clue Tebak Kata: \`${wordClue(s.answer)}\``
            : `💡 Clue Tebak Gambar: ${imageClue(s.answer)}`);
    }

    surrender(channelId: ChannelId, promptRef: MessageRef): Result<{ kind: PromptSession["kind"]; answer: string }> {
        const s = this.registry.findByPrompt(channelId, promptRef);
        if (!s) return fail("not_found", "Pesan yang kamu reply bukan sesi Tebak Kata/Tebak Gambar yang sedang aktif.");
        this.registry.end(channelId, s.kind);
        return ok({ kind: s.kind, answer: s.answer });
    }

    // ---- Trivia -----------------------------------------------------------

    startTrivia(channelId: ChannelId): Result<TriviaSession> {
        const q = pick(this.banks.trivia, this.rng);
        const session: TriviaSession = {
            kind: "trivia",
            question: q.question,
            options: { ...q.options },
            correctLabel: q.answer,
        };
        const res = this.registry.start(channelId, session);
        if (!res.ok) return res;
        return ok(session);
    }

    answerTrivia(channelId: ChannelId, userId: UserId, choice: string): Result<GuessResult> {
        const s = this.registry.get(channelId, "trivia");
        if (!s) return fail("not_found", "Belum ada trivia aktif. Mulai dengan `/trivia`.");
        const label = choice.trim().toUpperCase();
        if (!isTriviaLabel(label)) return fail("invalid_input", "Gunakan pilihan: A, B, C, atau D.");
        if (label !== s.correctLabel) return ok({ correct: false });

        const reward = CONFIG.rewards.trivia;
        const balance = this.ledger.addPoints(userId, reward);
        this.registry.end(channelId, "trivia");
        logger.info("Trivia solved", { channelId, userId, reward });
        return ok({ correct: true, answer: label, awarded: reward, balance });
    }

    // ---- Sambung Kata -----------------------------------------------------

    startWordChain(channelId: ChannelId): Result<{ seed: string }> {
        const seed = cleanChainWord(pick(this.banks.words, this.rng));
        const res = this.registry.start(channelId, { kind: "word_chain", lastWord: seed, usedWords: new Set([seed]) });
        if (!res.ok) return res;
        return ok({ seed });
    }

    submitChainWord(channelId: ChannelId, userId: UserId, word: string): Result<ChainAccepted> {
        const s = this.registry.get(channelId, "word_chain");
        if (!s) return fail("not_found", "Belum ada game sambung kata aktif. Mulai dengan `/sambungkata`.");

        const cleaned = cleanChainWord(word);
        const violation = chainViolation(s.lastWord, s.usedWords, cleaned);
        if (violation) return fail("invalid_input", chainReason(violation, s.lastWord), violation);

        s.usedWords.add(cleaned);
        s.lastWord = cleaned;
        const reward = CONFIG.rewards.wordChain;
        const balance = this.ledger.addPoints(userId, reward);
        return ok({ word: cleaned, nextLetter: lastLetter(cleaned), awarded: reward, balance });
    }

    stopWordChain(channelId: ChannelId): Result<void> {
        if (!this.registry.end(channelId, "word_chain")) {
            return fail("not_found", "Tidak ada game sambung kata aktif di channel ini.");
        }
        return ok(undefined);
    }
}

function lastLetter(word: string): string {
    const chars = Array.from(word);
    return chars[chars.length - 1] ?? "";
}

export function chainViolation(lastWord: string, used: ReadonlySet<string>, cleaned: string): ChainViolation | undefined {
    if (Array.from(cleaned).length < MIN_CHAIN_WORD) return "too_short";
    if (used.has(cleaned)) return "already_used";
    if (!cleaned.startsWith(lastLetter(lastWord))) return "wrong_start";
    return undefined;
}

function chainReason(v: ChainViolation, lastWord: string): string {
    switch (v) {
        case "too_short":
            return `Kata minimal ${MIN_CHAIN_WORD} huruf.`;
        case "already_used":
            return "Kata itu sudah dipakai.";
        case "wrong_start":
            return `Harus dimulai huruf **${lastLetter(lastWord).toUpperCase()}**.`;
    }
}
