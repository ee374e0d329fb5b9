/**
 * @fileoverview add-new-check command
 *
 * Wires the configuration, artifact store and engine together for one
 * invocation and reports progress from the engine's events.
 *
 * Output:
 * - `[WRITE] <path>` for every file written
 * - `[DRY RUN] <path>` instead, when nothing is written to disk
 * - `[SKIP] ...` when the check is already listed in its module
 * - `[FATAL] ...` on the first failing read or write
 *
 * @module cli/run
 */

import {
    ScaffoldEngine,
    FileArtifactStore,
    InMemoryArtifactStore,
    type ArtifactStore,
    type ScaffoldLogger,
} from "@tidy-scaffold/engine";
import type { ScaffoldConfig } from "../config/index.js";
import { kUSAGE_LINES, parseArgs, UsageError, type CheckArguments } from "./args.js";
import { createCliLogger } from "./logger.js";

/**
 * Dependencies of one invocation.
 */
export interface RunOptions {
    /** Resolved configuration */
    readonly config: ScaffoldConfig;

    /** Store for the source tree (default: FileArtifactStore) */
    readonly store?: ArtifactStore;

    /** Logger handed to the engine (default: console, debug only if verbose) */
    readonly logger?: ScaffoldLogger;

    /** Line printer for progress output (default: console.log) */
    readonly print?: (line: string) => void;

    /** Line printer for fatal errors (default: console.error) */
    readonly printError?: (line: string) => void;
}

/**
 * Run add-new-check.
 *
 * @param argv - Arguments after the program name
 * @returns Process exit code
 *
 * @example
 * ```typescript
 * process.exitCode = run(["misc", "awesome-functions"], { config });
 * ```
 */
export function run(argv: readonly string[], options: RunOptions): number {
    const print = options.print ?? console.log;
    const printError = options.printError ?? console.error;

    let args: CheckArguments;
    try {
        args = parseArgs(argv);
    }
    catch (error) {
        if (error instanceof UsageError) {
            kUSAGE_LINES.forEach((line) => print(line));
            return 0;
        }
        throw error;
    }

    const { config } = options;
    const base = options.store ?? new FileArtifactStore();
    const store = config.dryRun ? new InMemoryArtifactStore({ fallback: base }) : base;

    const engine = new ScaffoldEngine({
        root  : config.root,
        store,
        logger: options.logger ?? createCliLogger(config.verbose),
    });

    const writeTag = config.dryRun ? "[DRY RUN]" : "[WRITE]";
    if (config.dryRun) {
        print("[INFO] Dry run: nothing will be written to disk");
    }

    engine.eventBus.subscribe("artifact:written", (event) => {
        print(`${writeTag} ${String(event.data?.path)}`);
    });

    engine.eventBus.subscribe("scaffold:skipped", (event) => {
        print(`[SKIP] ${String(event.data?.check)} is already listed in ${String(event.data?.manifest)}`);
    });

    try {
        engine.addCheck(args.group, args.entry);
        return 0;
    }
    catch (error) {
        printError(`[FATAL] Failed to add check: ${error instanceof Error ? error.message : String(error)}`);
        return 1;
    }
}
