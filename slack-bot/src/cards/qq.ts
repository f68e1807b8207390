import { Deck, type Card } from "./card.js";

export type QQOutcome = "win" | "lose" | "tie";

export type QQRound = {
    playerHand: Card[];
    dealerHand: Card[];
    playerValue: number;
    dealerValue: number;
    outcome: QQOutcome;
};

export function qqCardValue(c: Card): number {
    switch (c.rank) {
        case "10":
        case "J":
        case "Q":
        case "K":
            return 0;
        case "A":
            return 1;
        default:
            return Number(c.rank);
    }
}

export function qqHandValue(cards: readonly Card[]): number {
    return cards.reduce((sum, c) => sum + qqCardValue(c), 0) % 10;
}

export function qqValueLabel(value: number): string {
    return value === 0 ? "QQ" : `QQ ${value}`;
}

export function compareQQ(player: number, dealer: number): QQOutcome {
    if (player > dealer) return "win";
    if (player < dealer) return "lose";
    return "tie";
}

/** Three cards each, no further drawing. */
export function playQQ(deck: Deck = new Deck()): QQRound {
    const playerHand = [deck.draw(), deck.draw(), deck.draw()];
    const dealerHand = [deck.draw(), deck.draw(), deck.draw()];
    const playerValue = qqHandValue(playerHand);
    const dealerValue = qqHandValue(dealerHand);
    return {
        playerHand,
        dealerHand,
        playerValue,
        dealerValue,
        outcome: compareQQ(playerValue, dealerValue),
    };
}
