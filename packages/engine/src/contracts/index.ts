/**
 * @fileoverview Contract barrel exports
 *
 * Interfaces and value types shared by the patchers, the rewriter and the
 * engine.
 *
 * @module @tidy-scaffold/engine/contracts
 */

// Entry identifier
export type { EntryIdentifier } from "./EntryIdentifier.js";
export { deriveIdentifier, capitalize } from "./EntryIdentifier.js";

// Artifact
export type { Artifact } from "./Artifact.js";
export {
    parseArtifact,
    serializeArtifact,
    insertLines,
} from "./Artifact.js";

// Insertion decision
export type { InsertionDecision } from "./InsertionDecision.js";
export { kALREADY_PRESENT, insertAt } from "./InsertionDecision.js";

// Artifact store contract
export type { ArtifactStore } from "./ArtifactStore.js";
export { ArtifactIOError } from "./ArtifactStore.js";

// Logger
export type { ScaffoldLogger } from "./ScaffoldLogger.js";
export { defaultLogger } from "./ScaffoldLogger.js";

// EventBus contract
export type {
    EventBus,
    EventPayload,
    EventHandler,
    ScaffoldEventType,
    Subscription,
} from "./EventBus.js";
export { createEvent } from "./EventBus.js";
