/**
 * @fileoverview Command-line arguments
 *
 * @module cli/args
 */

/**
 * Usage text, one entry per printed line.
 */
export const kUSAGE_LINES: readonly string[] = [
    "Usage: add-new-check <module> <check>, e.g.",
    "add-new-check misc awesome-functions",
];

/**
 * Parsed invocation.
 */
export interface CheckArguments {
    /** Module directory, e.g. "misc" */
    readonly group: string;

    /** Dash-separated check name, e.g. "awesome-functions" */
    readonly entry: string;
}

/**
 * Wrong invocation. Reported with the usage text, not as a failure.
 */
export class UsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "UsageError";
    }
}

/**
 * Parse the arguments after the program name.
 *
 * @throws UsageError unless exactly two arguments are given
 */
export function parseArgs(argv: readonly string[]): CheckArguments {
    if (argv.length !== 2) {
        throw new UsageError(`Expected 2 arguments, got ${argv.length}`);
    }

    const [group, entry] = argv;
    return { group, entry };
}
