/**
 * Artifact Store Contract
 *
 * The only I/O boundary of the scaffolder. Files are always read and written
 * whole; there are no partial writes.
 *
 * Implementations:
 * - FileArtifactStore: the local file system
 * - InMemoryArtifactStore: a map of paths, for tests and dry runs
 */

/**
 * Whole-file read/write access.
 *
 * Both methods are synchronous. Failures are reported by throwing
 * {@link ArtifactIOError}.
 */
export interface ArtifactStore {
    /**
     * Read the full content of a file.
     *
     * @param path - File path
     * @returns File content
     * @throws ArtifactIOError if the file cannot be read
     */
    read(path: string): string;

    /**
     * Replace the full content of a file, creating it if needed.
     *
     * @param path - File path
     * @param content - New content
     * @throws ArtifactIOError if the file cannot be written
     */
    write(path: string, content: string): void;
}

/**
 * Failure to read or write an artifact.
 *
 * The original error is kept as `cause`.
 */
export class ArtifactIOError extends Error {
    readonly path: string;
    readonly operation: "read" | "write";

    constructor(operation: "read" | "write", path: string, cause?: unknown) {
        const reason = cause instanceof Error ? cause.message : String(cause ?? "unknown error");
        super(`Failed to ${operation} ${path}: ${reason}`, { cause });
        this.name = "ArtifactIOError";
        this.path = path;
        this.operation = operation;
    }
}
