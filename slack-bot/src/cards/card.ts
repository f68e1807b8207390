import { shuffle } from "../random.js";
import type { Random } from "../types.js";

export const SUITS = ["♠️", "♥️", "♦️", "♣️"] as const;
export const RANKS = ["2", "3", "4", "5", "6", "7", "8", "9", "10", "J", "Q", "K", "A"] as const;

export type Suit = (typeof SUITS)[number];
export type Rank = (typeof RANKS)[number];

export type Card = {
    rank: Rank;
    suit: Suit;
};

/** Below this many cards the deck is replaced by a fresh one before drawing. */
export const RESHUFFLE_THRESHOLD = 10;

export function card(rank: Rank, suit: Suit = "♠️"): Card {
    return { rank, suit };
}

export function formatCard(c: Card): string {
    return `${c.rank}${c.suit}`;
}

export function formatHand(cards: readonly Card[]): string {
    return cards.map(formatCard).join(" ");
}

function freshCards(numDecks: number): Card[] {
    const cards: Card[] = [];
    for (let d = 0; d < numDecks; d++) {
        for (const suit of SUITS) {
            for (const rank of RANKS) cards.push({ rank, suit });
        }
    }
    return cards;
}

export class Deck {
    private cards: Card[];

    constructor(
        private readonly numDecks = 1,
        private readonly rng: Random = Math.random,
        stacked?: readonly Card[],
    ) {
        // a stacked deck draws from the end, like a shuffled one
        this.cards = stacked ? stacked.slice() : shuffle(freshCards(numDecks), rng);
    }

    get remaining(): number {
        return this.cards.length;
    }

    /**
     * Running low discards whatever is left and starts over from a full
     * shuffled deck; there is no discard pile.
     */
    draw(): Card {
        if (this.cards.length < RESHUFFLE_THRESHOLD) {
            this.cards = shuffle(freshCards(this.numDecks), this.rng);
        }
        const next = this.cards.pop();
        if (!next) throw new RangeError("Deck is empty");
        return next;
    }
}
