/**
 * @fileoverview Rewriter barrel exports
 *
 * @module @tidy-scaffold/engine/rewriter
 */

export {
    ArtifactRewriter,
    applyInsertion,
    type ArtifactKind,
    type ArtifactChange,
    type StagedWrite,
} from "./ArtifactRewriter.js";
