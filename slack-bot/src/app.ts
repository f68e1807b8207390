import { CONFIG } from "./config.js";
import { setLogLevel, logger, errorMessage } from "./logger.js";
import { FileStore } from "./storage/fileStore.js";
import { Ledger, emptyLedger, parseLedgerSnapshot } from "./ledger.js";
import { systemClock } from "./clock.js";
import { MoodTracker, emptyMood, parseMoodSnapshot } from "./mood.js";
import { SessionRegistry } from "./sessions/registry.js";
import { MiniGames } from "./sessions/games.js";
import { DebateScheduler } from "./debate/scheduler.js";
import { BlackjackTables } from "./cards/blackjack.js";
import { createSlackApp, registerCommands, slackGateway, startSlackApp } from "./slackApp.js";

async function init() {
  setLogLevel(CONFIG.logLevel);

  const store = new FileStore(CONFIG.dataDir, CONFIG.ledgerFile, emptyLedger, parseLedgerSnapshot);
  const ledger = new Ledger(store, systemClock);
  await ledger.load();

  const mood = new MoodTracker(new FileStore(CONFIG.dataDir, CONFIG.mood.file, emptyMood, parseMoodSnapshot), systemClock);
  await mood.load();

  const registry = new SessionRegistry();
  const games = new MiniGames(registry, ledger);
  const tables = new BlackjackTables();

  const app = createSlackApp();
  // the scheduler posts through the same client the commands use
  const debates = new DebateScheduler(registry, slackGateway(app.client), systemClock);
  registerCommands(app, { ledger, games, debates, tables, mood, rng: Math.random });

  logger.info("Initial config", {
    dataDir: CONFIG.dataDir,
    ledgerFile: CONFIG.ledgerFile,
    moodFile: CONFIG.mood.file,
    logLevel: CONFIG.logLevel,
  });

  await startSlackApp(app);

  const shutdown = async (signal: string) => {
    logger.info("Shutting down", { signal });
    await debates.shutdown();
    await ledger.flush();
    await mood.flush();
    await app.stop();
    process.exit(0);
  };
  const onSignal = (signal: NodeJS.Signals) => {
    shutdown(signal).catch((e: unknown) => {
      logger.error("Shutdown failed", { error: errorMessage(e) });
      process.exit(1);
    });
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);
}

init().catch((e: unknown) => {
  logger.error("Fatal init error", { error: errorMessage(e) });
  process.exit(1);
});
