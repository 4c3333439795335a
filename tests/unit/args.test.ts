import { describe, expect, it } from "vitest";

import { DEFAULT_SCRIPT, isValidScriptName, parseCompileArgs } from "../../src/utils/args.js";

describe("parseCompileArgs", () => {
    it("defaults to the standard script name", () => {
        expect(parseCompileArgs([])).toEqual({ script: DEFAULT_SCRIPT });
    });

    it("reads the script and the strictness flag", () => {
        expect(parseCompileArgs(["story.csv", "--strict"])).toEqual({ script: "story.csv", strict: true });
        expect(parseCompileArgs(["--lenient"])).toEqual({ script: "scenario.csv", strict: false });
    });

    it("rejects unknown options and extra scripts", () => {
        expect(() => parseCompileArgs(["--watch"])).toThrow("Unknown option '--watch'");
        expect(() => parseCompileArgs(["a.csv", "b.csv"])).toThrow("Unexpected argument 'b.csv'");
    });
});

describe("isValidScriptName", () => {
    it("accepts bare table file names only", () => {
        expect(isValidScriptName("scenario.csv")).toBe(true);
        expect(isValidScriptName("Chapter 2.TSV")).toBe(true);
        expect(isValidScriptName("../scenario.csv")).toBe(false);
        expect(isValidScriptName("dir\\scenario.csv")).toBe(false);
        expect(isValidScriptName(".hidden.csv")).toBe(false);
        expect(isValidScriptName("scenario.html")).toBe(false);
    });
});
