/**
 * @fileoverview Artifact Rewriter
 *
 * Reads artifacts whole, applies edits in memory and writes them back whole.
 *
 * Writes are staged: every new file content of a run is computed before the
 * first byte is written, then committed in order. An interruption during the
 * commit can still leave the tree partially updated, but an error while
 * reading or patching leaves it untouched.
 *
 * @module @tidy-scaffold/engine/rewriter/ArtifactRewriter
 */

import type { Artifact } from "../contracts/Artifact.js";
import { insertLines, parseArtifact, serializeArtifact } from "../contracts/Artifact.js";
import type { ArtifactStore } from "../contracts/ArtifactStore.js";
import type { InsertionDecision } from "../contracts/InsertionDecision.js";

/**
 * The five artifacts a check touches.
 */
export type ArtifactKind =
    | "manifest"
    | "header"
    | "implementation"
    | "registration"
    | "testFixture";

/**
 * How a staged write relates to the file on disk.
 * - patched: an existing file gains an entry
 * - generated: the file is (over)written from a template
 * - unchanged: nothing to write
 */
export type ArtifactChange = "patched" | "generated" | "unchanged";

/**
 * A file content waiting to be committed.
 */
export interface StagedWrite {
    readonly kind: ArtifactKind;
    readonly path: string;
    readonly content: string;
    readonly change: ArtifactChange;
}

/**
 * Apply an insertion decision to an artifact.
 *
 * @param artifact - Artifact to edit
 * @param decision - Where the entry goes, or that it is already there
 * @param entryLines - Lines of the entry
 * @returns The edited copy, or the same artifact when already present
 */
export function applyInsertion(
    artifact: Artifact,
    decision: InsertionDecision,
    entryLines: readonly string[]
): Artifact {
    if (decision.alreadyPresent) {
        return artifact;
    }

    return insertLines(artifact, decision.insertAtLine, entryLines);
}

/**
 * Stages and commits whole-file writes through an {@link ArtifactStore}.
 *
 * @example
 * ```typescript
 * const rewriter = new ArtifactRewriter(new FileArtifactStore());
 *
 * const manifest = rewriter.load("misc/CMakeLists.txt");
 * const staged = [
 *     rewriter.stage("manifest", applyInsertion(manifest, decision, ["  FooCheck.cpp"]), "patched"),
 *     rewriter.stageContent("header", "misc/FooCheck.h", renderHeader(id)),
 * ];
 *
 * rewriter.commit(staged);
 * ```
 */
export class ArtifactRewriter {
    constructor(private readonly store: ArtifactStore) {}

    /**
     * Read a whole artifact.
     *
     * @throws ArtifactIOError if the file cannot be read
     */
    load(path: string): Artifact {
        return parseArtifact(path, this.store.read(path));
    }

    /**
     * Stage an edited artifact.
     */
    stage(kind: ArtifactKind, artifact: Artifact, change: ArtifactChange): StagedWrite {
        return {
            kind,
            path   : artifact.path,
            content: serializeArtifact(artifact),
            change,
        };
    }

    /**
     * Stage a generated file.
     */
    stageContent(kind: ArtifactKind, path: string, content: string): StagedWrite {
        return { kind, path, content, change: "generated" };
    }

    /**
     * Write staged contents in order. Unchanged entries are skipped.
     *
     * @param writes - Staged writes
     * @param onWritten - Called after each file is written
     * @returns The writes that reached the store
     * @throws ArtifactIOError from the first failing write; later writes are not attempted
     */
    commit(writes: readonly StagedWrite[], onWritten?: (write: StagedWrite) => void): StagedWrite[] {
        const written: StagedWrite[] = [];

        for (const write of writes) {
            if (write.change === "unchanged") {
                continue;
            }

            this.store.write(write.path, write.content);
            written.push(write);
            onWritten?.(write);
        }

        return written;
    }
}
