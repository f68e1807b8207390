import { describe, it, expect } from "vitest";
import { parseDebateArgs, parseUserMention } from "./slackApp.js";

describe("parseUserMention", () => {
    it("extracts the user id from a mention", () => {
        expect(parseUserMention("<@U123ABC>")).toBe("U123ABC");
        expect(parseUserMention("rampok <@W42|budi> sekarang")).toBe("W42");
    });

    it("returns null without a mention", () => {
        expect(parseUserMention("budi")).toBeNull();
        expect(parseUserMention("<#C123|umum>")).toBeNull();
    });
});

describe("parseDebateArgs", () => {
    it("splits seconds, rounds and a multi-word topic", () => {
        expect(parseDebateArgs("60 2 Sekolah lima hari")).toEqual({ turnSeconds: 60, rounds: 2, topic: "Sekolah lima hari" });
        expect(parseDebateArgs("  10 1 AI  ")).toEqual({ turnSeconds: 10, rounds: 1, topic: "AI" });
    });

    it("rejects missing numbers or topic", () => {
        expect(parseDebateArgs("Sekolah lima hari")).toBeNull();
        expect(parseDebateArgs("60 Sekolah")).toBeNull();
        expect(parseDebateArgs("60 2")).toBeNull();
    });
});
