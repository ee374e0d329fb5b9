/**
 * Artifact
 *
 * The full verbatim content of one file, held as lines. Parsing and
 * serializing an unmodified artifact reproduces the original bytes.
 *
 * Design principles:
 * - Immutable: edits produce a new artifact
 * - Lossless: the trailing newline (or its absence) is recorded
 */

/**
 * One on-disk file held in memory.
 */
export interface Artifact {
    /** Path the artifact was read from and will be written to */
    readonly path: string;

    /** Lines without their "\n" terminators */
    readonly lines: readonly string[];

    /** Whether the last line was terminated by "\n" */
    readonly trailingNewline: boolean;
}

/**
 * Split file content into an artifact.
 *
 * @param path - Path of the file
 * @param content - Full file content
 */
export function parseArtifact(path: string, content: string): Artifact {
    if (content === "") {
        return { path, lines: [], trailingNewline: false };
    }

    const lines = content.split("\n");
    const trailingNewline = lines[lines.length - 1] === "";
    if (trailingNewline) {
        lines.pop();
    }

    return { path, lines, trailingNewline };
}

/**
 * Join an artifact back into file content.
 */
export function serializeArtifact(artifact: Artifact): string {
    const body = artifact.lines.join("\n");
    return artifact.trailingNewline ? `${body}\n` : body;
}

/**
 * Return a copy of the artifact with `entryLines` inserted before line `index`.
 *
 * An artifact that had no lines at all gains a trailing newline, so that a
 * list created from an empty file is newline-terminated like the rest of
 * the tree.
 *
 * @param artifact - Artifact to copy
 * @param index - Line index to insert before; `lines.length` appends
 * @param entryLines - Lines of the inserted entry
 * @throws RangeError if index is outside `[0, lines.length]`
 */
export function insertLines(artifact: Artifact, index: number, entryLines: readonly string[]): Artifact {
    if (!Number.isInteger(index) || index < 0 || index > artifact.lines.length) {
        throw new RangeError(`Insertion index ${index} is outside ${artifact.path} (${artifact.lines.length} lines)`);
    }

    return {
        path           : artifact.path,
        lines          : [
            ...artifact.lines.slice(0, index),
            ...entryLines,
            ...artifact.lines.slice(index),
        ],
        trailingNewline: artifact.trailingNewline || artifact.lines.length === 0,
    };
}
