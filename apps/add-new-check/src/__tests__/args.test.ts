/**
 * @fileoverview Unit tests for argument parsing
 *
 * @module cli/__tests__/args
 */

import { describe, it, expect } from "vitest";
import { parseArgs, UsageError, kUSAGE_LINES } from "../cli/args.js";

describe("parseArgs", () => {
    it("should take the module and the check name", () => {
        expect(parseArgs(["misc", "awesome-functions"])).toEqual({
            group: "misc",
            entry: "awesome-functions",
        });
    });

    it("should reject a missing check name", () => {
        expect(() => parseArgs(["misc"])).toThrow(UsageError);
    });

    it("should reject extra arguments", () => {
        expect(() => parseArgs(["misc", "awesome-functions", "extra"])).toThrow(
            "Expected 2 arguments, got 3"
        );
    });

    it("should name the error", () => {
        expect(new UsageError("x").name).toBe("UsageError");
    });
});

describe("kUSAGE_LINES", () => {
    it("should show the invocation and an example", () => {
        expect(kUSAGE_LINES).toEqual([
            "Usage: add-new-check <module> <check>, e.g.",
            "add-new-check misc awesome-functions",
        ]);
    });
});
