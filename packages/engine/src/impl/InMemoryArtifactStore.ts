/**
 * @fileoverview In-Memory Artifact Store
 *
 * Keeps files in a map. With a fallback store, reads of files it does not
 * hold go to the fallback while every write stays in memory, which is how
 * dry runs see the real tree without touching it.
 *
 * @module @tidy-scaffold/engine/impl/InMemoryArtifactStore
 */

import { ArtifactIOError, type ArtifactStore } from "../contracts/ArtifactStore.js";

/**
 * Options for {@link InMemoryArtifactStore}.
 */
export interface InMemoryArtifactStoreOptions {
    /** Initial files, by path */
    readonly files?: Record<string, string>;

    /** Store to read through to for files not held in memory */
    readonly fallback?: ArtifactStore;
}

/**
 * {@link ArtifactStore} held in memory.
 *
 * @example
 * ```typescript
 * const store = new InMemoryArtifactStore({
 *     files: { "/src/misc/CMakeLists.txt": "add_clang_library(x\n  A.cpp\n  )\n" },
 * });
 *
 * store.write("/src/misc/B.h", "...");
 * store.writtenPaths(); // ["/src/misc/B.h"]
 * ```
 */
export class InMemoryArtifactStore implements ArtifactStore {
    private readonly files: Map<string, string>;
    private readonly fallback?: ArtifactStore;
    private readonly writes: string[] = [];

    constructor(options: InMemoryArtifactStoreOptions = {}) {
        this.files = new Map(Object.entries(options.files ?? {}));
        this.fallback = options.fallback;
    }

    read(path: string): string {
        const content = this.files.get(path);
        if (content !== undefined) {
            return content;
        }

        if (this.fallback) {
            return this.fallback.read(path);
        }

        throw new ArtifactIOError("read", path, new Error("no such file"));
    }

    write(path: string, content: string): void {
        this.files.set(path, content);
        this.writes.push(path);
    }

    /**
     * Content held for a path, if any.
     */
    get(path: string): string | undefined {
        return this.files.get(path);
    }

    /**
     * Paths written so far, in write order, repeated writes included.
     */
    writtenPaths(): string[] {
        return [...this.writes];
    }
}
