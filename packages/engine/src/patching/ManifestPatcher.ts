/**
 * @fileoverview Build Manifest Patcher
 *
 * Adds the implementation file of a new check to the module's CMakeLists.txt
 * source list, e.g.
 *
 * ```cmake
 * add_clang_library(clangTidyMiscModule
 *   ArgumentCommentCheck.cpp
 *   AwesomeFunctionsCheck.cpp   <- inserted
 *   BoolPointerImplicitConversion.cpp
 *
 *   LINK_LIBS
 * ```
 *
 * @module @tidy-scaffold/engine/patching/ManifestPatcher
 */

import type { Artifact } from "../contracts/Artifact.js";
import type { EntryIdentifier } from "../contracts/EntryIdentifier.js";
import type { InsertionDecision } from "../contracts/InsertionDecision.js";
import { applyInsertion } from "../rewriter/ArtifactRewriter.js";
import { decideInsertion, indentationOf } from "./OrderedListPatcher.js";

/**
 * File name of the build manifest inside a module directory.
 */
export const kMANIFEST_FILE = "CMakeLists.txt";

/**
 * Suffix every source list entry ends in.
 */
export const kSOURCE_SUFFIX = ".cpp";

/**
 * Result of patching the build manifest.
 */
export interface ManifestPatch {
    readonly decision: InsertionDecision;

    /** Patched artifact, or the input unchanged when already present */
    readonly artifact: Artifact;
}

/**
 * Key of a source list line: its trimmed text when it names a source file.
 */
export function manifestEntryKey(line: string): string | null {
    const trimmed = line.trim();
    return trimmed.endsWith(kSOURCE_SUFFIX) ? trimmed : null;
}

/**
 * Source file name of a check, e.g. "AwesomeFunctionsCheck.cpp".
 */
export function sourceFileName(identifier: EntryIdentifier): string {
    return identifier.symbolName + kSOURCE_SUFFIX;
}

/**
 * Insert the check's source file into the manifest's source list.
 *
 * The new line takes the indentation of its neighbouring entry; in an empty
 * list it has none.
 *
 * @param artifact - The build manifest
 * @param identifier - The new check
 */
export function patchBuildManifest(artifact: Artifact, identifier: EntryIdentifier): ManifestPatch {
    const fileName = sourceFileName(identifier);
    const decision = decideInsertion(artifact.lines, fileName, manifestEntryKey);

    if (decision.alreadyPresent) {
        return { decision, artifact };
    }

    const index = decision.insertAtLine;
    const lines = artifact.lines;
    let indent = "";

    if (index < lines.length && manifestEntryKey(lines[index]) !== null) {
        indent = indentationOf(lines[index]);
    }
    else if (index > 0 && manifestEntryKey(lines[index - 1]) !== null) {
        indent = indentationOf(lines[index - 1]);
    }

    return {
        decision,
        artifact: applyInsertion(artifact, decision, [indent + fileName]),
    };
}
