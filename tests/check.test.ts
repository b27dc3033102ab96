import { describe, expect, it } from "vitest";

import { ExitCode, runCheck, USAGE } from "@/cli/check.ts";
import { createCapturedLogger } from "./helpers.ts";

describe("runCheck", () => {
    it("logs a valid token by its ID", () => {
        const { logger, entries } = createCapturedLogger();

        expect(runCheck(["check", "abcdef.abcdef0123456789"], logger)).toBe(ExitCode.OK);
        expect(entries()).toHaveLength(1);
        expect(entries()[0]).toMatchObject({
            level: "info",
            index: 0,
            token: { id: "abcdef" },
            msg: "Token is valid",
        });
    });

    it("reports an invalid token by position without echoing it", () => {
        const { logger, entries, raw } = createCapturedLogger();

        expect(runCheck(["check", "abcdef.ABCDEF0123456789"], logger)).toBe(ExitCode.INVALID);
        expect(entries()[0]).toMatchObject({
            level: "warn",
            index: 0,
            code: "INVALID_TOKEN_SECRET",
            msg: "Token secret must be 16 or 24 characters of [a-z0-9]",
        });
        expect(raw[0]).not.toContain("ABCDEF0123456789");
    });

    it("fails when any token is invalid", () => {
        const { logger, entries } = createCapturedLogger();

        expect(runCheck(["check", "abcdef.abcdef0123456789", "abcdef:abcdef0123456789"], logger)).toBe(
            ExitCode.INVALID,
        );
        expect(entries().map(entry => entry.level)).toEqual(["info", "warn"]);
        expect(entries()[1]).toMatchObject({ index: 1, code: "MALFORMED_TOKEN" });
    });

    it("decodes JSON literals with --json", () => {
        const { logger, entries } = createCapturedLogger();

        expect(runCheck(["check", "--json", '"abcdef.abcdef0123456789"'], logger)).toBe(ExitCode.OK);
        expect(runCheck(["check", "--json", "abcdef.abcdef0123456789"], logger)).toBe(ExitCode.INVALID);
        expect(entries()[1]).toMatchObject({ level: "warn", code: "DECODE_ERROR" });
    });

    it("summarizes at debug level", () => {
        const { logger, entries } = createCapturedLogger("debug");

        runCheck(["check", "abcdef.abcdef0123456789", "nope"], logger);

        expect(entries()[2]).toMatchObject({ level: "debug", checked: 2, failures: 1, msg: "Check complete" });
    });

    it.each<{ argv: string[] }>([
        { argv: [] },
        { argv: ["check"] },
        { argv: ["check", "--json"] },
        { argv: ["verify", "abcdef.abcdef0123456789"] },
    ])("prints usage for $argv", ({ argv }) => {
        const { logger, entries } = createCapturedLogger();

        expect(runCheck(argv, logger)).toBe(ExitCode.USAGE);
        expect(entries()[0]).toMatchObject({ level: "error", msg: USAGE });
    });
});
