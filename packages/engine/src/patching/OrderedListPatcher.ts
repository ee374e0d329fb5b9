/**
 * @fileoverview Ordered List Patcher
 *
 * Finds where a new entry belongs in a sorted, duplicate-free run of lines
 * embedded in a larger file.
 *
 * A line belongs to the list when the artifact's key extractor yields a key
 * for it. The list starts at the first such line and ends at the first
 * following line that yields none. Keys are compared byte-wise with the
 * string operators, never with `localeCompare`.
 *
 * @module @tidy-scaffold/engine/patching/OrderedListPatcher
 */

import type { InsertionDecision } from "../contracts/InsertionDecision.js";
import { kALREADY_PRESENT, insertAt } from "../contracts/InsertionDecision.js";

/**
 * Returns the sort key of a list entry, or null when the line is not one.
 */
export type EntryKeyExtractor = (line: string) => string | null;

/**
 * Result of scanning one ordered list.
 */
export interface OrderedListScan {
    /** The candidate key is already listed */
    readonly alreadyPresent: boolean;

    /** Index of the first entry sorting after the candidate, if any */
    readonly firstGreaterLine: number | null;

    /** Index of the first entry of the list, null for an empty list */
    readonly regionStart: number | null;

    /** Index one past the last entry of the list, null for an empty list */
    readonly regionEnd: number | null;
}

/**
 * Options for {@link decideInsertion}.
 */
export interface DecideInsertionOptions {
    /** Line to start scanning from (default: 0) */
    readonly fromLine?: number;

    /** Insertion index when the list is empty (default: end of file) */
    readonly emptyListLine?: number;
}

/**
 * Scan one ordered list for a candidate key.
 *
 * Scanning stops at an exact match or at the end of the list region.
 *
 * @param lines - Artifact lines
 * @param candidate - Key of the new entry
 * @param keyOf - Recognizes list entries
 * @param fromLine - Line to start scanning from
 */
export function scanOrderedList(
    lines: readonly string[],
    candidate: string,
    keyOf: EntryKeyExtractor,
    fromLine = 0
): OrderedListScan {
    let regionStart: number | null = null;
    let regionEnd: number | null = null;
    let firstGreaterLine: number | null = null;

    for (let i = fromLine; i < lines.length; i++) {
        const key = keyOf(lines[i]);

        if (key === null) {
            if (regionStart !== null) {
                break;
            }
            continue;
        }

        regionStart ??= i;
        regionEnd = i + 1;

        if (key === candidate) {
            return { alreadyPresent: true, firstGreaterLine, regionStart, regionEnd };
        }

        if (firstGreaterLine === null && key > candidate) {
            firstGreaterLine = i;
        }
    }

    return { alreadyPresent: false, firstGreaterLine, regionStart, regionEnd };
}

/**
 * Decide where a candidate entry goes.
 *
 * - Already listed: `alreadyPresent`
 * - Some entry sorts after it: insert before the first such entry
 * - It sorts after every entry: insert right after the last entry
 * - The list is empty: insert at `emptyListLine`
 *
 * @example
 * ```typescript
 * const lines = ["add_library(x", "  a.cpp", "  c.cpp", ")"];
 * decideInsertion(lines, "b.cpp", (l) => (l.trim().endsWith(".cpp") ? l.trim() : null));
 * // => { alreadyPresent: false, insertAtLine: 2 }
 * ```
 */
export function decideInsertion(
    lines: readonly string[],
    candidate: string,
    keyOf: EntryKeyExtractor,
    options: DecideInsertionOptions = {}
): InsertionDecision {
    const scan = scanOrderedList(lines, candidate, keyOf, options.fromLine ?? 0);

    if (scan.alreadyPresent) {
        return kALREADY_PRESENT;
    }

    if (scan.firstGreaterLine !== null) {
        return insertAt(scan.firstGreaterLine);
    }

    return insertAt(scan.regionEnd ?? options.emptyListLine ?? lines.length);
}

/**
 * Leading whitespace of a line.
 */
export function indentationOf(line: string): string {
    const match = /^\s*/.exec(line);
    return match ? match[0] : "";
}
