/**
 * @fileoverview tidy-scaffold engine
 *
 * Adds new checks to a clang-tidy source tree, keeping the module's build
 * manifest, registration file, generated sources and test fixture in step.
 *
 * The engine provides:
 * - Identifier derivation (class name, header guard, registered name)
 * - Ordered-list insertion that leaves every other line byte-identical
 * - Dual-list patching of the module registration file in one pass
 * - Staged whole-file rewrites through a pluggable artifact store
 *
 * @module @tidy-scaffold/engine
 * @example
 * ```typescript
 * import { ScaffoldEngine, FileArtifactStore } from "@tidy-scaffold/engine";
 *
 * const engine = new ScaffoldEngine({ root: clangTidyDir, store: new FileArtifactStore() });
 * engine.addCheck("misc", "awesome-functions");
 * ```
 */

// ============================================================================
// Contract exports
// ============================================================================

export type {
    EntryIdentifier,
    Artifact,
    InsertionDecision,
    ArtifactStore,
    ScaffoldLogger,
    EventBus,
    EventPayload,
    EventHandler,
    ScaffoldEventType,
    Subscription,
} from "./contracts/index.js";
export {
    deriveIdentifier,
    capitalize,
    parseArtifact,
    serializeArtifact,
    insertLines,
    kALREADY_PRESENT,
    insertAt,
    ArtifactIOError,
    defaultLogger,
    createEvent,
} from "./contracts/index.js";

// ============================================================================
// Patcher exports
// ============================================================================

export {
    decideInsertion,
    scanOrderedList,
    patchBuildManifest,
    patchRegistration,
    type EntryKeyExtractor,
    type ManifestPatch,
    type ListOutcome,
    type RegistrationPatch,
} from "./patching/index.js";

// ============================================================================
// Rewriter exports
// ============================================================================

export {
    ArtifactRewriter,
    applyInsertion,
    type ArtifactKind,
    type ArtifactChange,
    type StagedWrite,
} from "./rewriter/index.js";

// ============================================================================
// Template exports
// ============================================================================

export {
    renderHeader,
    renderImplementation,
    renderTestFixture,
} from "./templates/index.js";

// ============================================================================
// Implementation exports
// ============================================================================

export {
    InMemoryEventBus,
    FileArtifactStore,
    InMemoryArtifactStore,
} from "./impl/index.js";

// ============================================================================
// Engine exports
// ============================================================================

export {
    ScaffoldEngine,
    resolveArtifactPaths,
    type ArtifactPaths,
    type ScaffoldEngineConfig,
    type ScaffoldPlan,
    type ScaffoldResult,
} from "./engine/index.js";
