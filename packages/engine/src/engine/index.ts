/**
 * @fileoverview Engine barrel exports
 *
 * @module @tidy-scaffold/engine/engine
 */

export {
    ScaffoldEngine,
    resolveArtifactPaths,
    type ArtifactPaths,
    type ScaffoldEngineConfig,
    type ScaffoldPlan,
    type ScaffoldResult,
} from "./ScaffoldEngine.js";
