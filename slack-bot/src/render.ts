import { handValue, type BlackjackGame, type BlackjackOutcome } from "./cards/blackjack.js";
import { formatCard, formatHand } from "./cards/card.js";
import { qqValueLabel, type QQRound } from "./cards/qq.js";
import type { TriviaSession } from "./sessions/types.js";
import { TRIVIA_LABELS } from "./puzzles/banks.js";

function outcomeText(outcome: BlackjackOutcome, player: number, dealer: number): string {
    switch (outcome) {
        case "player_blackjack":
            return "⭐ BLACKJACK! Anda mendapatkan 21 dengan 2 kartu!";
        case "dealer_blackjack":
            return "❌ Dealer BLACKJACK! Anda kalah.";
        case "bust":
            return "❌ BUST! Kartu Anda melebihi 21!";
        case "win":
            return dealer > 21
                ? `✅ MENANG! Dealer BUST! Anda: ${player} vs Dealer: BUST`
                : `✅ MENANG! Anda: ${player} vs Dealer: ${dealer}`;
        case "lose":
            return `❌ KALAH! Anda: ${player} vs Dealer: ${dealer}`;
        case "push":
            return `🤝 SERI! Anda: ${player} vs Dealer: ${dealer}`;
    }
}

export function renderBlackjack(game: BlackjackGame): string {
    const player = handValue(game.playerHand);
    const dealer = handValue(game.dealerHand);
    const soft = player.isSoft ? " (soft)" : "";
    const lines = ["🃏 *Blackjack*"];
    if (game.finished) {
        lines.push(`🎴 Dealer [${dealer.total}]: ${formatHand(game.dealerHand)}`);
    } else {
        // hole card stays hidden during the player's turn
        lines.push(`🎴 Dealer [?]: ${formatCard(game.dealerHand[0])} 🂠`);
    }
    lines.push(`👤 Anda [${player.total}]${soft}: ${formatHand(game.playerHand)}`);
    lines.push(game.outcome
        ? `📊 Hasil: ${outcomeText(game.outcome, player.total, dealer.total)}`
        : "📊 Status: Pilih `/hit` atau `/stand`");
    return lines.join("\n");
}

export function renderQQ(round: QQRound): string {
    const verdict = round.outcome === "win" ? "MENANG!" : round.outcome === "lose" ? "KALAH!" : "SERI!";
    return [
        "🀄 *QQ*",
        `Dealer [${qqValueLabel(round.dealerValue)}]: ${formatHand(round.dealerHand)}`,
        `Anda [${qqValueLabel(round.playerValue)}]: ${formatHand(round.playerHand)}`,
        `Hasil: ${verdict} Anda: ${round.playerValue} vs Dealer: ${round.dealerValue}`,
    ].join("\n");
}

export function renderTrivia(q: TriviaSession): string {
    const options = TRIVIA_LABELS.map((l) => `*${l}.* ${q.options[l]}`).join("\n");
    return `🧠 *Trivia Quiz*\n${q.question}\n${options}\nJawab dengan \`/jawabtrivia <A/B/C/D>\``;
}
