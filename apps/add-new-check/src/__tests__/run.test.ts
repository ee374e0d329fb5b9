/**
 * @fileoverview Unit tests for the add-new-check command
 *
 * Tests cover:
 * - Usage output on a wrong argument count
 * - Progress lines for a new check
 * - Skip line for an existing check
 * - Dry runs leaving the tree untouched
 * - Fatal errors and the exit code
 *
 * @module cli/__tests__/run
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { InMemoryArtifactStore, type ScaffoldLogger } from "@tidy-scaffold/engine";
import { run } from "../cli/run.js";
import type { ScaffoldConfig } from "../config/index.js";

const ROOT = "/llvm/clang-tidy";
const MANIFEST_PATH = "/llvm/clang-tidy/misc/CMakeLists.txt";
const REGISTRATION_PATH = "/llvm/clang-tidy/misc/MiscTidyModule.cpp";

const MANIFEST = `add_clang_library(clangTidyMiscModule
  ArgumentCommentCheck.cpp
  MiscTidyModule.cpp

  LINK_LIBS
  clangTidy
  )
`;

const REGISTRATION = `#include "../ClangTidyModule.h"
#include "ArgumentCommentCheck.h"

class MiscModule : public ClangTidyModule {
public:
  void addCheckFactories(ClangTidyCheckFactories &CheckFactories) override {
    CheckFactories.registerCheck<ArgumentCommentCheck>("misc-argument-comment");
  }
};
`;

const WRITTEN = [
    MANIFEST_PATH,
    "/llvm/clang-tidy/misc/AwesomeFunctionsCheck.h",
    "/llvm/clang-tidy/misc/AwesomeFunctionsCheck.cpp",
    REGISTRATION_PATH,
    "/llvm/test/clang-tidy/misc-awesome-functions.cpp",
];

function createMockLogger(): ScaffoldLogger {
    return {
        debug: vi.fn(),
        info : vi.fn(),
        warn : vi.fn(),
        error: vi.fn(),
    };
}

describe("run", () => {
    let store: InMemoryArtifactStore;
    let print: ReturnType<typeof vi.fn>;
    let printError: ReturnType<typeof vi.fn>;
    let config: ScaffoldConfig;

    beforeEach(() => {
        store = new InMemoryArtifactStore({
            files: { [MANIFEST_PATH]: MANIFEST, [REGISTRATION_PATH]: REGISTRATION },
        });
        print = vi.fn();
        printError = vi.fn();
        config = { root: ROOT, dryRun: false, verbose: false };
    });

    function invoke(argv: string[], overrides: Partial<ScaffoldConfig> = {}): number {
        return run(argv, {
            config: { ...config, ...overrides },
            store,
            logger: createMockLogger(),
            print,
            printError,
        });
    }

    describe("usage", () => {
        // Scenario: No arguments
        it("should print the usage and exit 0 without touching the tree", () => {
            expect(invoke([])).toBe(0);

            expect(print.mock.calls).toEqual([
                ["Usage: add-new-check <module> <check>, e.g."],
                ["add-new-check misc awesome-functions"],
            ]);
            expect(store.writtenPaths()).toEqual([]);
        });

        // Scenario: Too many arguments
        it("should print the usage for three arguments", () => {
            expect(invoke(["misc", "awesome-functions", "now"])).toBe(0);

            expect(print).toHaveBeenCalledTimes(2);
            expect(store.writtenPaths()).toEqual([]);
        });
    });

    describe("new check", () => {
        // Scenario: Every written file is reported in order
        it("should report each write and exit 0", () => {
            expect(invoke(["misc", "awesome-functions"])).toBe(0);

            expect(print.mock.calls).toEqual(WRITTEN.map((path) => [`[WRITE] ${path}`]));
            expect(store.writtenPaths()).toEqual(WRITTEN);
            expect(printError).not.toHaveBeenCalled();
        });

        // Scenario: Registration file gains both entries
        it("should register the check in the module", () => {
            invoke(["misc", "awesome-functions"]);

            expect(store.get(REGISTRATION_PATH)).toBe(`#include "../ClangTidyModule.h"
#include "ArgumentCommentCheck.h"
#include "AwesomeFunctionsCheck.h"

class MiscModule : public ClangTidyModule {
public:
  void addCheckFactories(ClangTidyCheckFactories &CheckFactories) override {
    CheckFactories.registerCheck<ArgumentCommentCheck>("misc-argument-comment");
    CheckFactories.registerCheck<AwesomeFunctionsCheck>(
        "misc-awesome-functions");
  }
};
`);
        });
    });

    describe("existing check", () => {
        // Scenario: Second invocation
        it("should print a skip line and write nothing", () => {
            invoke(["misc", "awesome-functions"]);
            print.mockClear();

            expect(invoke(["misc", "awesome-functions"])).toBe(0);

            expect(print.mock.calls).toEqual([
                [`[SKIP] misc-awesome-functions is already listed in ${MANIFEST_PATH}`],
            ]);
            expect(store.writtenPaths()).toHaveLength(5);
        });
    });

    describe("dry run", () => {
        // Scenario: Dry run reads the tree but never writes it
        it("should report every write without writing", () => {
            expect(invoke(["misc", "awesome-functions"], { dryRun: true })).toBe(0);

            expect(print.mock.calls).toEqual([
                ["[INFO] Dry run: nothing will be written to disk"],
                ...WRITTEN.map((path) => [`[DRY RUN] ${path}`]),
            ]);
            expect(store.writtenPaths()).toEqual([]);
            expect(store.get(MANIFEST_PATH)).toBe(MANIFEST);
        });
    });

    describe("failures", () => {
        // Scenario: Unknown module
        it("should print a fatal error and exit 1", () => {
            expect(invoke(["nosuch", "thing"])).toBe(1);

            expect(printError).toHaveBeenCalledWith(
                "[FATAL] Failed to add check: Failed to read /llvm/clang-tidy/nosuch/CMakeLists.txt: no such file"
            );
            expect(print).not.toHaveBeenCalled();
        });
    });
});
