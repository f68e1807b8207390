import { describe, it, expect } from "vitest";
import { renderBlackjack, renderQQ, renderTrivia } from "./render.js";
import { BlackjackGame } from "./cards/blackjack.js";
import { Deck, card, type Card, type Rank } from "./cards/card.js";
import { playQQ } from "./cards/qq.js";

const PAD: Card[] = Array.from({ length: 12 }, () => card("2", "♣️"));

function stacked(...drawOrder: Rank[]): Deck {
    return new Deck(1, Math.random, [...PAD, ...drawOrder.map((r) => card(r)).reverse()]);
}

describe("renderBlackjack", () => {
    it("hides the dealer's hole card during the player's turn", () => {
        const game = new BlackjackGame("u1", stacked("10", "9", "5", "6"));
        expect(renderBlackjack(game)).toBe([
            "🃏 *Blackjack*",
            "🎴 Dealer [?]: 5♠️ 🂠",
            "👤 Anda [19]: 10♠️ 9♠️",
            "📊 Status: Pilih `/hit` atau `/stand`",
        ].join("\n"));
    });

    it("shows both hands and the verdict once finished", () => {
        const game = new BlackjackGame("u1", stacked("10", "9", "5", "6", "10"));
        game.stand();
        expect(renderBlackjack(game)).toBe([
            "🃏 *Blackjack*",
            "🎴 Dealer [21]: 5♠️ 6♠️ 10♠️",
            "👤 Anda [19]: 10♠️ 9♠️",
            "📊 Hasil: ❌ KALAH! Anda: 19 vs Dealer: 21",
        ].join("\n"));
    });

    it("announces a player natural", () => {
        const game = new BlackjackGame("u1", stacked("A", "K", "9", "7"));
        expect(renderBlackjack(game)).toBe([
            "🃏 *Blackjack*",
            "🎴 Dealer [16]: 9♠️ 7♠️",
            "👤 Anda [21] (soft): A♠️ K♠️",
            "📊 Hasil: ⭐ BLACKJACK! Anda mendapatkan 21 dengan 2 kartu!",
        ].join("\n"));
    });

    it("marks soft hands and dealer busts", () => {
        const game = new BlackjackGame("u1", stacked("A", "6", "10", "6", "K"));
        expect(renderBlackjack(game).split("\n")[2]).toBe("👤 Anda [17] (soft): A♠️ 6♠️");
        game.stand();
        expect(renderBlackjack(game).split("\n")[3]).toBe("📊 Hasil: ✅ MENANG! Dealer BUST! Anda: 17 vs Dealer: BUST");
    });
});

describe("renderQQ", () => {
    it("labels both values", () => {
        expect(renderQQ(playQQ(stacked("7", "8", "K", "A", "2", "10")))).toBe([
            "🀄 *QQ*",
            "Dealer [QQ 3]: A♠️ 2♠️ 10♠️",
            "Anda [QQ 5]: 7♠️ 8♠️ K♠️",
            "Hasil: MENANG! Anda: 5 vs Dealer: 3",
        ].join("\n"));
    });
});

describe("renderTrivia", () => {
    it("lists the options in label order", () => {
        const text = renderTrivia({
            kind: "trivia",
            question: "2 + 2 = ?",
            options: { A: "3", B: "4", C: "5", D: "22" },
            correctLabel: "B",
        });
        expect(text).toBe("🧠 *Trivia Quiz*\n2 + 2 = ?\n*A.* 3\n*B.* 4\n*C.* 5\n*D.* 22\nJawab dengan `/jawabtrivia <A/B/C/D>`");
    });
});
