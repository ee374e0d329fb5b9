/**
 * @fileoverview Registration Patcher
 *
 * Registers a new check in its module's `<Module>TidyModule.cpp`, which holds
 * two independently sorted lists:
 *
 * ```cpp
 * #include "ArgumentCommentCheck.h"
 * #include "AwesomeFunctionsCheck.h"                          <- include list
 * #include "BoolPointerImplicitConversion.h"
 * ...
 *   void addCheckFactories(ClangTidyCheckFactories &CheckFactories) override {
 *     CheckFactories.registerCheck<ArgumentCommentCheck>("misc-argument-comment");
 *     CheckFactories.registerCheck<AwesomeFunctionsCheck>(    <- registration list
 *         "misc-awesome-functions");
 *   }
 * ```
 *
 * Both lists are patched in a single forward pass. Each list is tracked by its
 * own small state machine (notFound → scanning → inserted, or present when
 * the check is already listed) driven by the shared line cursor. The
 * registration list is only looked at once the include list is settled, so
 * the end-of-function marker of the second list can never be mistaken for
 * the end of the first.
 *
 * Existing lists are assumed sorted. An unsorted list still receives exactly
 * one insertion, before its first entry sorting after the candidate, but is
 * not reordered.
 *
 * @module @tidy-scaffold/engine/patching/RegistrationPatcher
 */

import type { Artifact } from "../contracts/Artifact.js";
import type { EntryIdentifier } from "../contracts/EntryIdentifier.js";
import type { EntryKeyExtractor } from "./OrderedListPatcher.js";

/**
 * Suffix of the registration file name, after the module name.
 */
export const kREGISTRATION_FILE_SUFFIX = "TidyModule.cpp";

/**
 * Trimmed text of the line closing `addCheckFactories`.
 */
export const kEND_OF_FUNCTION_MARKER = "}";

const kINCLUDE_PATTERN = /^\s*#\s*include\s+"([^"]*)"/;
const kREGISTER_CALL_PATTERN = /registerCheck<([^>]*)>/;

/**
 * State of one list during the pass.
 */
export type ListState = "notFound" | "scanning" | "inserted" | "present";

/**
 * Final outcome for one list.
 */
export interface ListOutcome {
    /**
     * inserted: the entry was added;
     * present: the entry was already listed;
     * notFound/scanning: the list or its end was never found, nothing added.
     */
    readonly state: ListState;

    /** Line of the input artifact the entry was inserted before */
    readonly insertAtLine: number | null;
}

/**
 * Result of patching the registration artifact.
 */
export interface RegistrationPatch {
    readonly artifact: Artifact;
    readonly includes: ListOutcome;
    readonly registrations: ListOutcome;
}

/**
 * Key of an include line: the included path.
 */
export const includeEntryKey: EntryKeyExtractor = (line) => {
    const match = kINCLUDE_PATTERN.exec(line);
    return match ? match[1] : null;
};

/**
 * Key of a registration call: the registered class name.
 */
export const registrationEntryKey: EntryKeyExtractor = (line) => {
    const match = kREGISTER_CALL_PATTERN.exec(line);
    return match ? match[1] : null;
};

/**
 * Registration file name of a module, e.g. "MiscTidyModule.cpp".
 */
export function registrationFileName(identifier: EntryIdentifier): string {
    return identifier.moduleName + kREGISTRATION_FILE_SUFFIX;
}

/**
 * Include line for the check's header.
 */
export function formatInclude(identifier: EntryIdentifier): string {
    return `#include "${identifier.symbolName}.h"`;
}

/**
 * Factory registration for the check, as two lines.
 */
export function formatRegistration(identifier: EntryIdentifier): string[] {
    return [
        `    CheckFactories.registerCheck<${identifier.symbolName}>(`,
        `        "${identifier.qualifiedName}");`,
    ];
}

/**
 * One ordered list, fed one line at a time.
 */
class OrderedListCursor {
    private state: ListState = "notFound";
    private insertedAt: number | null = null;

    constructor(
        private readonly candidate: string,
        private readonly keyOf: EntryKeyExtractor,
        private readonly endsList: (line: string, scanning: boolean) => boolean
    ) {}

    /** The list needs no more lines */
    get settled(): boolean {
        return this.state === "inserted" || this.state === "present";
    }

    get scanning(): boolean {
        return this.state === "scanning";
    }

    /**
     * Feed the line at `index`.
     *
     * @returns True when the entry must be inserted before this line
     */
    step(line: string, index: number): boolean {
        if (this.settled) {
            return false;
        }

        const key = this.keyOf(line);

        if (key !== null) {
            this.state = "scanning";
            if (key === this.candidate) {
                this.state = "present";
                return false;
            }
            return key > this.candidate ? this.insert(index) : false;
        }

        return this.endsList(line, this.state === "scanning") ? this.insert(index) : false;
    }

    /** Record an insertion at `index` */
    insert(index: number): true {
        this.state = "inserted";
        this.insertedAt = index;
        return true;
    }

    outcome(): ListOutcome {
        return { state: this.state, insertAtLine: this.insertedAt };
    }
}

/**
 * Add the check's include and factory registration to the module file.
 *
 * An include list that runs to the end of the file gets the include
 * appended. A registration list without an end-of-function marker gets
 * nothing.
 *
 * @param artifact - The module's registration artifact
 * @param identifier - The new check
 */
export function patchRegistration(artifact: Artifact, identifier: EntryIdentifier): RegistrationPatch {
    const includes = new OrderedListCursor(
        `${identifier.symbolName}.h`,
        includeEntryKey,
        (_line, scanning) => scanning
    );
    const registrations = new OrderedListCursor(
        identifier.symbolName,
        registrationEntryKey,
        (line) => line.trim() === kEND_OF_FUNCTION_MARKER
    );

    const output: string[] = [];

    artifact.lines.forEach((line, index) => {
        if (includes.step(line, index)) {
            output.push(formatInclude(identifier));
        }

        if (includes.settled && registrations.step(line, index)) {
            output.push(...formatRegistration(identifier));
        }

        output.push(line);
    });

    if (includes.scanning) {
        includes.insert(artifact.lines.length);
        output.push(formatInclude(identifier));
    }

    return {
        artifact     : {
            path           : artifact.path,
            lines          : output,
            trailingNewline: artifact.trailingNewline,
        },
        includes     : includes.outcome(),
        registrations: registrations.outcome(),
    };
}
