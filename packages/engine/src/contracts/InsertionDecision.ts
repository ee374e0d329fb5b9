/**
 * Insertion Decision
 *
 * Where a new entry goes in an ordered list, or that it is already there.
 * Produced by the patchers, consumed by the rewriter.
 */

/**
 * Outcome of looking up a candidate entry in an ordered list.
 *
 * @example
 * ```typescript
 * // Candidate already listed: nothing is written
 * { alreadyPresent: true }
 *
 * // Candidate goes before the entry currently on line 4
 * { alreadyPresent: false, insertAtLine: 4 }
 * ```
 */
export type InsertionDecision =
    | { readonly alreadyPresent: true }
    | { readonly alreadyPresent: false; readonly insertAtLine: number };

/**
 * Decision for an entry that is already listed.
 */
export const kALREADY_PRESENT: InsertionDecision = Object.freeze({ alreadyPresent: true });

/**
 * Decision to insert before the given line.
 */
export function insertAt(line: number): InsertionDecision {
    return Object.freeze({ alreadyPresent: false, insertAtLine: line });
}
