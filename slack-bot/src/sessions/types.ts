import type { TriviaLabel } from "../puzzles/banks.js";
import type { MessageRef, UserId } from "../types.js";

export type DebateSide = "PRO" | "KONTRA";
export type DebatePhase = "defined" | "running" | "finished";

export type ScoreEntry = {
    userId: UserId;
    side: DebateSide;
    note: string;
};

export type WordGuessSession = {
    kind: "word_guess";
    answer: string;
    promptRef?: MessageRef;
};

export type ImageGuessSession = {
    kind: "image_guess";
    answer: string;
    promptRef?: MessageRef;
};

export type TriviaSession = {
    kind: "trivia";
    question: string;
    options: Record<TriviaLabel, string>;
    correctLabel: TriviaLabel;
};

export type WordChainSession = {
    kind: "word_chain";
    lastWord: string;
    usedWords: Set<string>;
};

export type DebateSession = {
    kind: "debate";
    topic: string;
    turnSeconds: number;
    totalRounds: number;
    pro: UserId[];
    kontra: UserId[];
    scoreLog: ScoreEntry[];
    phase: DebatePhase;
};

export type Session =
| WordGuessSession
| ImageGuessSession
| TriviaSession
| WordChainSession
| DebateSession;

export type SessionKind = Session["kind"];

export type SessionOf<K extends SessionKind> = Extract<Session, { kind: K }>;

export type PromptSession = WordGuessSession | ImageGuessSession;
