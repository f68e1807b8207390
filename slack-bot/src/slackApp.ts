import { App, LogLevel, type RespondFn } from "@slack/bolt";
import type { BlackjackTables } from "./cards/blackjack.js";
import { Deck } from "./cards/card.js";
import { playQQ } from "./cards/qq.js";
import type { ChannelHandle, ChatGateway } from "./chat.js";
import { CONFIG } from "./config.js";
import type { DebateScheduler } from "./debate/scheduler.js";
import { renderSummary } from "./debate/scheduler.js";
import { heist, renderLeaderboard } from "./economy.js";
import type { Ledger } from "./ledger.js";
import { logger, errorMessage } from "./logger.js";
import { renderBlackjack, renderQQ, renderTrivia } from "./render.js";
import type { MiniGames } from "./sessions/games.js";
import { parseMoodDays, renderMood, type MoodTracker } from "./mood.js";
import type { ChannelId, Random } from "./types.js";

export type SlackClient = App["client"];

export type BotDeps = {
    ledger: Ledger;
    games: MiniGames;
    debates: DebateScheduler;
    tables: BlackjackTables;
    mood: MoodTracker;
    rng: Random;
};

const DEFAULT_WORKSPACE = "default";

export function parseUserMention(text: string): string | null {
    const m = text.match(/<@([UW][A-Z0-9]+)(?:\|[^>]+)?>/i);
    return m ? m[1] : null;
}

/** `/debat_mulai 60 2 Sekolah lima hari` -> seconds, rounds, topic */
export function parseDebateArgs(text: string): { turnSeconds: number; rounds: number; topic: string } | null {
    const m = text.trim().match(/^(\d+)\s+(\d+)\s+(.+)$/s);
    if (!m) return null;
    return { turnSeconds: Number(m[1]), rounds: Number(m[2]), topic: m[3] };
}

export function slackGateway(client: SlackClient): ChatGateway {
    return {
        async resolveChannel(channelId: ChannelId): Promise<ChannelHandle | undefined> {
            try {
                const info = await client.conversations.info({ channel: channelId });
                if (!info.ok || !info.channel) return undefined;
            } catch (e: unknown) {
                logger.warn("Channel lookup failed", { channelId, error: errorMessage(e) });
                return undefined;
            }
            return {
                id: channelId,
                async send(text: string) {
                    const res = await client.chat.postMessage({ channel: channelId, text });
                    return res.ts ?? "";
                },
            };
        },
    };
}

async function say(respond: RespondFn, text: string) {
    await respond({ response_type: "in_channel", text });
}

async function whisper(respond: RespondFn, text: string) {
    await respond({ response_type: "ephemeral", text });
}

export function createSlackApp(): App {
    return new App({
        token: CONFIG.slack.botToken,
        socketMode: true,
        appToken: CONFIG.slack.appToken,
        signingSecret: CONFIG.slack.signingSecret,
        logLevel: LogLevel.WARN,
    });
}

export function registerCommands(app: App, deps: BotDeps): App {
    const { ledger, games, debates, tables, mood, rng } = deps;

    // ---- mood: every plain user message is scored -------------------------

    app.message(async ({ message, context }) => {
        if (message.subtype !== undefined || message.bot_id !== undefined || !message.text) return;
        mood.record(message.team ?? context.teamId ?? DEFAULT_WORKSPACE, message.text);
    });

    app.command("/mood", async ({ ack, respond, command }) => {
        await ack();
        const days = parseMoodDays(command.text);
        if (days === null) return whisper(respond, "Usage: /mood [hari]");
        await say(respond, renderMood(days, mood.summary(command.team_id || DEFAULT_WORKSPACE, days)));
    });

    // ---- economy ----------------------------------------------------------

    app.command("/poin", async ({ ack, respond, command }) => {
        await ack();
        await whisper(respond, `🏆 Kamu punya **${ledger.getBalance(command.user_id)} poin**.`);
    });

    app.command("/leaderboard", async ({ ack, respond }) => {
        await ack();
        await say(respond, renderLeaderboard(ledger));
    });

    app.command("/heist", async ({ ack, respond, command }) => {
        await ack();
        const target = parseUserMention(command.text);
        if (!target) {
            await whisper(respond, "Usage: /heist @user");
            return;
        }
        const res = heist(ledger, command.user_id, target, rng);
        if (!res.ok) {
            await whisper(respond, res.error.reason);
            return;
        }
        await say(respond, res.value.success
            ? `💰 <@${command.user_id}> berhasil nge-heist <@${target}> dan dapat **${res.value.amount} poin**!`
            : `🚨 Heist gagal! <@${command.user_id}> ketahuan dan bayar denda **${res.value.amount} poin** ke <@${target}>.`);
    });

    // ---- word & image guessing -------------------------------------------

    app.command("/tebakkata", async ({ ack, respond, command, client }) => {
        await ack();
        const res = games.startWordGuess(command.channel_id);
        if (!res.ok) {
            await whisper(respond, res.error.reason);
            return;
        }
        const { scrambled } = res.value;
        const posted = await games.publishPrompt(command.channel_id, "word_guess", async () => {
            const prompt = await client.chat.postMessage({
                channel: command.channel_id,
                text: `🔤 Tebak kata: **${scrambled}**\nJawab dengan \`/jawabkata <kata>\`\nBalas di thread pesan ini dengan \`!clue\` atau \`!surrend\``,
            });
            return prompt.ts;
        });
        if (!posted.ok) await whisper(respond, posted.error.reason);
    });

    app.command("/jawabkata", async ({ ack, respond, command }) => {
        await ack();
        const res = games.answerWordGuess(command.channel_id, command.user_id, command.text);
        if (!res.ok) return whisper(respond, res.error.reason);
        await say(respond, res.value.correct
            ? `✅ Benar, <@${command.user_id}>! +${res.value.awarded} poin. Total kamu: **${res.value.balance}**`
            : "❌ Salah. Coba lagi.");
    });

    app.command("/tebakgambar", async ({ ack, respond, command, client }) => {
        await ack();
        const res = games.startImageGuess(command.channel_id);
        if (!res.ok) {
            await whisper(respond, res.error.reason);
            return;
        }
        const { emojis } = res.value;
        const posted = await games.publishPrompt(command.channel_id, "image_guess", async () => {
            const prompt = await client.chat.postMessage({
                channel: command.channel_id,
                text: `🧩 Tebak gambar dari emoji ini: ${emojis}\nJawab dengan \`/jawabgambar <jawaban>\`\nBalas di thread pesan ini dengan \`!clue\` atau \`!surrend\``,
            });
            return prompt.ts;
        });
        if (!posted.ok) await whisper(respond, posted.error.reason);
    });

    app.command("/jawabgambar", async ({ ack, respond, command }) => {
        await ack();
        const res = games.answerImageGuess(command.channel_id, command.user_id, command.text);
        if (!res.ok) return whisper(respond, res.error.reason);
        await say(respond, res.value.correct
            ? `✅ Tepat! +${res.value.awarded} poin, <@${command.user_id}>. Total: **${res.value.balance}**`
            : "❌ Belum tepat. Coba lagi.");
    });

    // clue / surrender are thread replies to the prompt message
    app.message(/^!(clue|surrend|surrender)\b/i, async ({ message, say: post }) => {
        if (message.subtype !== undefined) return;
        const threadTs = message.thread_ts;
        if (!threadTs) {
            await post("Gunakan `!clue` / `!surrend` dengan cara balas di thread pesan game dari bot.");
            return;
        }
        const isClue = (message.text ?? "").trim().toLowerCase().startsWith("!clue");
        if (isClue) {
            const res = games.clue(message.channel, threadTs);
            await post({ text: res.ok ? res.value : res.error.reason, thread_ts: threadTs });
            return;
        }
        const res = games.surrender(message.channel, threadTs);
        const label = res.ok && res.value.kind === "word_guess" ? "Tebak Kata" : "Tebak Gambar";
        await post({
            text: res.ok ? `🏳️ Menyerah. Jawaban ${label}: **${res.value.answer}**` : res.error.reason,
            thread_ts: threadTs,
        });
    });

    // ---- trivia -----------------------------------------------------------

    app.command("/trivia", async ({ ack, respond, command }) => {
        await ack();
        const res = games.startTrivia(command.channel_id);
        if (!res.ok) return whisper(respond, res.error.reason);
        await say(respond, renderTrivia(res.value));
    });

    app.command("/jawabtrivia", async ({ ack, respond, command }) => {
        await ack();
        const res = games.answerTrivia(command.channel_id, command.user_id, command.text);
        if (!res.ok) return whisper(respond, res.error.reason);
        await say(respond, res.value.correct
            ? `✅ Jawaban benar, <@${command.user_id}>! +${res.value.awarded} poin. Total kamu: **${res.value.balance}**`
            : "❌ Salah. Coba lagi.");
    });

    // ---- word chain -------------------------------------------------------

    app.command("/sambungkata", async ({ ack, respond, command }) => {
        await ack();
        const res = games.startWordChain(command.channel_id);
        if (!res.ok) return whisper(respond, res.error.reason);
        await say(respond, `🔗 Sambung Kata dimulai!\nKata awal: **${res.value.seed}**\nLanjut pakai \`/kata <kata>\``);
    });

    app.command("/kata", async ({ ack, respond, command }) => {
        await ack();
        const res = games.submitChainWord(command.channel_id, command.user_id, command.text);
        if (!res.ok) return whisper(respond, res.error.reason);
        const v = res.value;
        await say(respond,
            `✅ Valid: **${v.word}**\nKata berikutnya harus dimulai huruf **${v.nextLetter.toUpperCase()}**.\n` +
            `+${v.awarded} poin untuk <@${command.user_id}>. Total: **${v.balance}**`);
    });

    app.command("/sambungstop", async ({ ack, respond, command }) => {
        await ack();
        const res = games.stopWordChain(command.channel_id);
        await say(respond, res.ok ? "🛑 Game sambung kata dihentikan." : res.error.reason);
    });

    // ---- cards ------------------------------------------------------------

    app.command("/blackjack", async ({ ack, respond, command }) => {
        await ack();
        const res = tables.deal(command.user_id);
        if (!res.ok) return whisper(respond, res.error.reason);
        await say(respond, renderBlackjack(res.value));
    });

    app.command("/hit", async ({ ack, respond, command }) => {
        await ack();
        const res = tables.hit(command.user_id);
        if (!res.ok) return whisper(respond, res.error.reason);
        await say(respond, renderBlackjack(res.value));
    });

    app.command("/stand", async ({ ack, respond, command }) => {
        await ack();
        const res = tables.stand(command.user_id);
        if (!res.ok) return whisper(respond, res.error.reason);
        await say(respond, renderBlackjack(res.value));
    });

    app.command("/qq", async ({ ack, respond }) => {
        await ack();
        await say(respond, renderQQ(playQQ(new Deck(1, rng))));
    });

    // ---- debate -----------------------------------------------------------

    app.command("/debat_mulai", async ({ ack, respond, command }) => {
        await ack();
        const args = parseDebateArgs(command.text);
        if (!args) return whisper(respond, "Usage: /debat_mulai <detik> <round> <topik>");
        const res = debates.define(command.channel_id, args.topic, args.turnSeconds, args.rounds);
        if (!res.ok) return whisper(respond, res.error.reason);
        await say(respond,
            `🧠 Sesi debat dibuat.\nTopik: **${res.value.topic}**\n` +
            `Turn: **${res.value.turnSeconds}s** • Rounds: **${res.value.totalRounds}**\n` +
            "Join dengan `/debat_join pro` atau `/debat_join kontra`, lalu start `/debat_start`.");
    });

    app.command("/debat_join", async ({ ack, respond, command }) => {
        await ack();
        const res = debates.join(command.channel_id, command.user_id, command.text);
        if (!res.ok) return whisper(respond, res.error.reason);
        await say(respond, `✅ <@${command.user_id}> masuk sisi **${res.value}**.`);
    });

    app.command("/debat_leave", async ({ ack, respond, command }) => {
        await ack();
        const res = debates.leave(command.channel_id, command.user_id);
        if (!res.ok) return whisper(respond, res.error.reason);
        await say(respond, `👋 <@${command.user_id}> keluar dari sisi **${res.value}**.`);
    });

    app.command("/debat_start", async ({ ack, respond, command }) => {
        await ack();
        const res = debates.start(command.channel_id);
        if (!res.ok) return whisper(respond, res.error.reason);
        await say(respond, res.value.replaced ? "🔁 Timer debat diulang dari awal." : "🚀 Timer debat dijalankan.");
    });

    app.command("/debat_poin", async ({ ack, respond, command }) => {
        await ack();
        const res = debates.addPoint(command.channel_id, command.user_id, command.text);
        if (!res.ok) return whisper(respond, res.error.reason);
        await say(respond, `📝 Poin ${res.value.side} dicatat dari <@${command.user_id}>: ${res.value.note}`);
    });

    app.command("/debat_ringkas", async ({ ack, respond, command }) => {
        await ack();
        const res = debates.summary(command.channel_id);
        if (!res.ok) return whisper(respond, res.error.reason);
        await say(respond, renderSummary(res.value));
    });

    app.command("/debat_stop", async ({ ack, respond, command }) => {
        await ack();
        const res = debates.stop(command.channel_id);
        await say(respond, res.ok ? "🛑 Sesi debat dihentikan dan direset." : res.error.reason);
    });

    app.error(async (error) => {
        logger.error("Slack handler error", { error: errorMessage(error) });
    });

    return app;
}

export async function startSlackApp(app: App) {
    await app.start({ port: CONFIG.port });
    logger.info("Slack app running (SOCKET)", { port: CONFIG.port });
}
