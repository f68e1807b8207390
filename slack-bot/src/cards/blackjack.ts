import { Deck, type Card } from "./card.js";
import { fail, ok, type Result, type UserId } from "../types.js";

export type HandValue = {
    total: number;
    /** An ace is still counted as 11. */
    isSoft: boolean;
};

function baseValue(c: Card): number {
    switch (c.rank) {
        case "J":
        case "Q":
        case "K":
            return 10;
        case "A":
            return 11;
        default:
            return Number(c.rank);
    }
}

export function handValue(cards: readonly Card[]): HandValue {
    let total = 0;
    let softAces = 0;
    for (const c of cards) {
        if (c.rank === "A") softAces++;
        total += baseValue(c);
    }
    while (total > 21 && softAces > 0) {
        total -= 10;
        softAces--;
    }
    return { total, isSoft: softAces > 0 };
}

/** Dealer hits soft 17. */
export function dealerShouldHit(hand: readonly Card[]): boolean {
    const { total, isSoft } = handValue(hand);
    return total < 17 || (total === 17 && isSoft);
}

export function isNatural(hand: readonly Card[]): boolean {
    return hand.length === 2 && handValue(hand).total === 21;
}

export type BlackjackOutcome =
| "player_blackjack"
| "dealer_blackjack"
| "push"
| "bust"
| "win"
| "lose";

export type BlackjackStatus = "player_turn" | "finished";

export class BlackjackGame {
    readonly playerHand: Card[];
    readonly dealerHand: Card[];
    status: BlackjackStatus = "player_turn";
    outcome?: BlackjackOutcome;

    constructor(readonly playerId: UserId, private readonly deck: Deck = new Deck()) {
        this.playerHand = [deck.draw(), deck.draw()];
        this.dealerHand = [deck.draw(), deck.draw()];
        this.checkNaturals();
    }

    get finished(): boolean {
        return this.status === "finished";
    }

    private finish(outcome: BlackjackOutcome) {
        this.status = "finished";
        this.outcome = outcome;
    }

    /**
     * Naturals are settled on the deal, before any hit or stand. The
     * player's natural is checked first and wins even against a dealer natural.
     */
    private checkNaturals() {
        if (isNatural(this.playerHand)) this.finish("player_blackjack");
        else if (isNatural(this.dealerHand)) this.finish("dealer_blackjack");
    }

    hit(): Result<Card> {
        if (this.finished) return fail("invalid_input", "Ronde sudah selesai.");
        const c = this.deck.draw();
        this.playerHand.push(c);
        if (handValue(this.playerHand).total > 21) this.finish("bust");
        return ok(c);
    }

    stand(): Result<BlackjackOutcome> {
        if (this.finished) return fail("invalid_input", "Ronde sudah selesai.");
        while (dealerShouldHit(this.dealerHand)) {
            this.dealerHand.push(this.deck.draw());
        }
        const dealer = handValue(this.dealerHand).total;
        const player = handValue(this.playerHand).total;
        let outcome: BlackjackOutcome;
        if (dealer > 21) outcome = "win";
        else if (player > dealer) outcome = "win";
        else if (player < dealer) outcome = "lose";
        else outcome = "push";
        this.finish(outcome);
        return ok(outcome);
    }
}

/** One open blackjack round per user. */
export class BlackjackTables {
    private readonly games = new Map<UserId, BlackjackGame>();

    constructor(private readonly deckFactory: () => Deck = () => new Deck(1)) {}

    get(userId: UserId): BlackjackGame | undefined {
        return this.games.get(userId);
    }

    deal(userId: UserId): Result<BlackjackGame> {
        if (this.games.has(userId)) {
            return fail("already_active", "Kamu masih punya ronde Blackjack yang belum selesai. Pakai /hit atau /stand.");
        }
        const game = new BlackjackGame(userId, this.deckFactory());
        if (!game.finished) this.games.set(userId, game);
        return ok(game);
    }

    hit(userId: UserId): Result<BlackjackGame> {
        const game = this.games.get(userId);
        if (!game) return fail("not_found", "Belum ada ronde Blackjack. Mulai dengan /blackjack.");
        const res = game.hit();
        if (!res.ok) return res;
        if (game.finished) this.games.delete(userId);
        return ok(game);
    }

    stand(userId: UserId): Result<BlackjackGame> {
        const game = this.games.get(userId);
        if (!game) return fail("not_found", "Belum ada ronde Blackjack. Mulai dengan /blackjack.");
        const res = game.stand();
        if (!res.ok) return res;
        this.games.delete(userId);
        return ok(game);
    }
}
