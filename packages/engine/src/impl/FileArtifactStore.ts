/**
 * @fileoverview File-system Artifact Store
 *
 * Reads and writes artifacts as UTF-8 files. Directories are never created:
 * a missing module or test directory is an I/O failure.
 *
 * @module @tidy-scaffold/engine/impl/FileArtifactStore
 */

import { readFileSync, writeFileSync } from "fs";
import { ArtifactIOError, type ArtifactStore } from "../contracts/ArtifactStore.js";

/**
 * {@link ArtifactStore} backed by the local file system.
 */
export class FileArtifactStore implements ArtifactStore {
    read(path: string): string {
        try {
            return readFileSync(path, "utf-8");
        }
        catch (error) {
            throw new ArtifactIOError("read", path, error);
        }
    }

    write(path: string, content: string): void {
        try {
            writeFileSync(path, content, "utf-8");
        }
        catch (error) {
            throw new ArtifactIOError("write", path, error);
        }
    }
}
