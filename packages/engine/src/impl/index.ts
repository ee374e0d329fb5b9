/**
 * @fileoverview Implementation barrel exports
 *
 * Concrete implementations of engine contracts.
 *
 * @module @tidy-scaffold/engine/impl
 */

export { InMemoryEventBus } from "./InMemoryEventBus.js";
export { FileArtifactStore } from "./FileArtifactStore.js";
export {
    InMemoryArtifactStore,
    type InMemoryArtifactStoreOptions,
} from "./InMemoryArtifactStore.js";
