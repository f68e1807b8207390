import { afterEach, describe, it, expect, vi } from "vitest";
import { logger, setLogLevel } from "./logger.js";

function lines(spy: { mock: { calls: unknown[][] } }): Record<string, unknown>[] {
    return spy.mock.calls.map((args) => JSON.parse(String(args[0])));
}

describe("logger", () => {
    afterEach(() => {
        setLogLevel("info");
        vi.restoreAllMocks();
    });

    it("drops lines below the minimum level", () => {
        const spy = vi.spyOn(console, "log").mockImplementation(() => {});
        setLogLevel("warn");

        logger.info("quiet");
        logger.warn("loud", { n: 1 });

        const out = lines(spy);
        expect(out).toHaveLength(1);
        expect(out[0]).toMatchObject({ level: "warn", msg: "loud", n: 1 });
    });

    it("stamps child context on every line and lets call fields win", () => {
        const spy = vi.spyOn(console, "log").mockImplementation(() => {});
        const debate = logger.child({ component: "debate" }).child({ channelId: "C1" });

        debate.info("Turn", { round: 2 });
        debate.info("Moved", { channelId: "C2" });

        const out = lines(spy);
        expect(out[0]).toMatchObject({ level: "info", msg: "Turn", component: "debate", channelId: "C1", round: 2 });
        expect(out[1]).toMatchObject({ component: "debate", channelId: "C2" });
    });
});
