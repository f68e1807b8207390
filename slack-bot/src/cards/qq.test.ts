import { describe, it, expect } from "vitest";
import { compareQQ, playQQ, qqCardValue, qqHandValue, qqValueLabel } from "./qq.js";
import { Deck, card, type Card, type Rank } from "./card.js";

const hand = (...ranks: Rank[]) => ranks.map((r) => card(r));

describe("QQ", () => {
  it("values tens and faces at zero and the ace at one", () => {
    expect(hand("10", "J", "Q", "K").map(qqCardValue)).toEqual([0, 0, 0, 0]);
    expect(qqCardValue(card("A"))).toBe(1);
    expect(qqCardValue(card("7"))).toBe(7);
  });

  it("scores a hand as its sum mod 10", () => {
    expect(qqHandValue(hand("10", "10", "A"))).toBe(1);
    expect(qqHandValue(hand("9", "9", "9"))).toBe(7);
    expect(qqHandValue(hand("K", "Q", "J"))).toBe(0);
  });

  it("compares values", () => {
    expect(compareQQ(7, 1)).toBe("win");
    expect(compareQQ(1, 7)).toBe("lose");
    expect(compareQQ(4, 4)).toBe("tie");
  });

  it("labels values", () => {
    expect(qqValueLabel(0)).toBe("QQ");
    expect(qqValueLabel(5)).toBe("QQ 5");
  });

  it("deals three cards to each side", () => {
    const pad: Card[] = Array.from({ length: 12 }, () => card("2", "♣️"));
    const order = hand("10", "10", "A", "9", "9", "9");
    const round = playQQ(new Deck(1, Math.random, [...pad, ...order.reverse()]));

    expect(round.playerHand.map((c) => c.rank)).toEqual(["10", "10", "A"]);
    expect(round.dealerHand.map((c) => c.rank)).toEqual(["9", "9", "9"]);
    expect(round.playerValue).toBe(1);
    expect(round.dealerValue).toBe(7);
    expect(round.outcome).toBe("lose");
  });
});
