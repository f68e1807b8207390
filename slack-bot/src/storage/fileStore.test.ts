import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { promises as fs } from "fs";
import * as os from "os";
import * as path from "path";
import { FileStore } from "./fileStore.js";
import { emptyLedger, parseLedgerSnapshot } from "../ledger.js";

describe("FileStore", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "arena-bot-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("returns the defaults when no file exists", async () => {
    const store = new FileStore(dir, "game_data.json", emptyLedger, parseLedgerSnapshot);
    expect(await store.load()).toEqual({ points: {}, cooldowns: {} });
  });

  it("round-trips a snapshot in the persisted layout", async () => {
    const store = new FileStore(dir, "game_data.json", emptyLedger, parseLedgerSnapshot);
    await store.save({ points: { u1: 12 }, cooldowns: { u1: { heist: 1_700_000_120 } } });

    const raw = JSON.parse(await fs.readFile(path.join(dir, "game_data.json"), "utf8"));
    expect(raw).toEqual({ points: { u1: 12 }, cooldowns: { u1: { heist: 1_700_000_120 } } });
    expect(await store.load()).toEqual(raw);
  });

  it("keeps the last of several concurrent saves", async () => {
    const store = new FileStore(dir, "game_data.json", emptyLedger, parseLedgerSnapshot);
    await Promise.all([
      store.save({ points: { u1: 1 }, cooldowns: {} }),
      store.save({ points: { u1: 2 }, cooldowns: {} }),
      store.save({ points: { u1: 3 }, cooldowns: {} }),
    ]);
    expect((await store.load()).points).toEqual({ u1: 3 });
  });

  it("starts empty when the file is corrupt", async () => {
    await fs.writeFile(path.join(dir, "game_data.json"), "{not json", "utf8");
    const store = new FileStore(dir, "game_data.json", emptyLedger, parseLedgerSnapshot);
    expect(await store.load()).toEqual({ points: {}, cooldowns: {} });
  });
});
