/**
 * @fileoverview ScaffoldEngine
 *
 * Adds a new check to a clang-tidy source tree.
 *
 * Pipeline flow:
 * 1. Derive the check's identifier
 * 2. Patch the module's CMakeLists.txt (stop here if the check is listed)
 * 3. Generate the header
 * 4. Generate the implementation
 * 5. Patch the module's registration file
 * 6. Generate the test fixture
 *
 * Steps 2-6 are staged first and committed afterwards, in that order. A
 * second run for the same check stops at step 2 and writes nothing.
 *
 * Layout, relative to the clang-tidy source root:
 *
 * ```
 * <root>/<group>/CMakeLists.txt
 * <root>/<group>/<Symbol>.h
 * <root>/<group>/<Symbol>.cpp
 * <root>/<group>/<Module>TidyModule.cpp
 * <root>/../test/clang-tidy/<group>-<entry>.cpp
 * ```
 *
 * @module @tidy-scaffold/engine/engine/ScaffoldEngine
 */

import { join } from "path";
import type { ArtifactStore } from "../contracts/ArtifactStore.js";
import type { EntryIdentifier } from "../contracts/EntryIdentifier.js";
import { deriveIdentifier } from "../contracts/EntryIdentifier.js";
import type { EventBus, EventPayload } from "../contracts/EventBus.js";
import { createEvent } from "../contracts/EventBus.js";
import type { ScaffoldLogger } from "../contracts/ScaffoldLogger.js";
import { defaultLogger } from "../contracts/ScaffoldLogger.js";
import { InMemoryEventBus } from "../impl/InMemoryEventBus.js";
import { kMANIFEST_FILE, patchBuildManifest, sourceFileName } from "../patching/ManifestPatcher.js";
import type { ListOutcome } from "../patching/RegistrationPatcher.js";
import { patchRegistration, registrationFileName } from "../patching/RegistrationPatcher.js";
import { ArtifactRewriter, type StagedWrite } from "../rewriter/ArtifactRewriter.js";
import { headerFileName, renderHeader } from "../templates/HeaderTemplate.js";
import { renderImplementation } from "../templates/ImplementationTemplate.js";
import { renderTestFixture, testFixtureFileName } from "../templates/TestFixtureTemplate.js";

/**
 * Where the five artifacts of a check live.
 */
export interface ArtifactPaths {
    readonly manifest: string;
    readonly header: string;
    readonly implementation: string;
    readonly registration: string;
    readonly testFixture: string;
}

/**
 * Engine configuration options.
 */
export interface ScaffoldEngineConfig {
    /** The clang-tidy source directory holding one directory per module */
    readonly root: string;

    /** Where artifacts are read from and written to */
    readonly store: ArtifactStore;

    /** Custom EventBus (default: InMemoryEventBus) */
    readonly eventBus?: EventBus;

    /** Logger for engine operations */
    readonly logger?: ScaffoldLogger;
}

/**
 * Staged changes for one check.
 */
export type ScaffoldPlan =
    | {
        readonly status: "exists";
        readonly identifier: EntryIdentifier;
        readonly paths: ArtifactPaths;
    }
    | {
        readonly status: "ready";
        readonly identifier: EntryIdentifier;
        readonly paths: ArtifactPaths;
        readonly writes: readonly StagedWrite[];
        readonly includes: ListOutcome;
        readonly registrations: ListOutcome;
    };

/**
 * Outcome of adding a check.
 */
export type ScaffoldResult =
    | {
        readonly status: "exists";
        readonly identifier: EntryIdentifier;
    }
    | {
        readonly status: "created";
        readonly identifier: EntryIdentifier;
        readonly written: readonly StagedWrite[];
        readonly includes: ListOutcome;
        readonly registrations: ListOutcome;
    };

/**
 * Derive the artifact paths of a check below a clang-tidy source root.
 */
export function resolveArtifactPaths(root: string, identifier: EntryIdentifier): ArtifactPaths {
    const moduleDir = join(root, identifier.groupName);

    return {
        manifest      : join(moduleDir, kMANIFEST_FILE),
        header        : join(moduleDir, headerFileName(identifier)),
        implementation: join(moduleDir, sourceFileName(identifier)),
        registration  : join(moduleDir, registrationFileName(identifier)),
        testFixture   : join(root, "..", "test", "clang-tidy", testFixtureFileName(identifier)),
    };
}

/**
 * ScaffoldEngine - adds checks to a clang-tidy tree.
 *
 * @example
 * ```typescript
 * const engine = new ScaffoldEngine({
 *     root : "/llvm/tools/clang/tools/extra/clang-tidy",
 *     store: new FileArtifactStore(),
 * });
 *
 * engine.eventBus.subscribe("artifact:written", (event) => {
 *     console.log("Wrote", event.data?.path);
 * });
 *
 * const result = engine.addCheck("misc", "awesome-functions");
 * // result.status === "created", or "exists" on a second run
 * ```
 */
export class ScaffoldEngine {
    private readonly root: string;
    private readonly rewriter: ArtifactRewriter;
    private readonly logger: ScaffoldLogger;

    /** Public access to the event bus for external subscriptions */
    public readonly eventBus: EventBus;

    constructor(config: ScaffoldEngineConfig) {
        this.root = config.root;
        this.rewriter = new ArtifactRewriter(config.store);
        this.eventBus = config.eventBus ?? new InMemoryEventBus();
        this.logger = config.logger ?? defaultLogger;
    }

    /**
     * Compute every change for a check without writing anything.
     *
     * @param groupName - Module directory, e.g. "misc"
     * @param entryName - Dash-separated check name, e.g. "awesome-functions"
     * @throws ArtifactIOError if the manifest or registration file cannot be read
     */
    plan(groupName: string, entryName: string): ScaffoldPlan {
        const identifier = deriveIdentifier(groupName, entryName);
        const paths = resolveArtifactPaths(this.root, identifier);

        const manifest = patchBuildManifest(this.rewriter.load(paths.manifest), identifier);
        if (manifest.decision.alreadyPresent) {
            this.logger.debug("Check already listed in manifest", {
                check   : identifier.qualifiedName,
                manifest: paths.manifest,
            });
            return { status: "exists", identifier, paths };
        }

        const registration = patchRegistration(this.rewriter.load(paths.registration), identifier);
        const registrationChanged =
            registration.includes.state === "inserted" || registration.registrations.state === "inserted";

        for (const [list, outcome] of [
            ["include", registration.includes],
            ["registration", registration.registrations],
        ] as const) {
            if (outcome.state === "notFound" || outcome.state === "scanning") {
                this.logger.warn(`No ${list} list position found; entry not added`, {
                    path : paths.registration,
                    state: outcome.state,
                });
            }
        }

        const writes: StagedWrite[] = [
            this.rewriter.stage("manifest", manifest.artifact, "patched"),
            this.rewriter.stageContent("header", paths.header, renderHeader(identifier)),
            this.rewriter.stageContent("implementation", paths.implementation, renderImplementation(identifier)),
            this.rewriter.stage("registration", registration.artifact, registrationChanged ? "patched" : "unchanged"),
            this.rewriter.stageContent("testFixture", paths.testFixture, renderTestFixture(identifier)),
        ];

        for (const write of writes) {
            this.emit(createEvent("artifact:planned", {
                kind  : write.kind,
                path  : write.path,
                change: write.change,
            }));
        }

        return {
            status       : "ready",
            identifier,
            paths,
            writes,
            includes     : registration.includes,
            registrations: registration.registrations,
        };
    }

    /**
     * Add a check: plan every change, then commit it.
     *
     * @param groupName - Module directory, e.g. "misc"
     * @param entryName - Dash-separated check name, e.g. "awesome-functions"
     * @returns "exists" when the manifest already lists the check, "created" otherwise
     * @throws ArtifactIOError on the first failing read or write
     */
    addCheck(groupName: string, entryName: string): ScaffoldResult {
        this.emit(createEvent("scaffold:started", { group: groupName, entry: entryName }));
        this.logger.info("Adding check", { group: groupName, entry: entryName });

        try {
            const plan = this.plan(groupName, entryName);

            if (plan.status === "exists") {
                this.emit(createEvent("scaffold:skipped", {
                    check   : plan.identifier.qualifiedName,
                    manifest: plan.paths.manifest,
                }));
                this.logger.info("Check already exists; nothing written", {
                    check: plan.identifier.qualifiedName,
                });
                return { status: "exists", identifier: plan.identifier };
            }

            const written = this.rewriter.commit(plan.writes, (write) => {
                this.emit(createEvent("artifact:written", {
                    kind  : write.kind,
                    path  : write.path,
                    change: write.change,
                }));
            });

            this.emit(createEvent("scaffold:completed", {
                check  : plan.identifier.qualifiedName,
                written: written.length,
            }));
            this.logger.info("Check added", {
                check  : plan.identifier.qualifiedName,
                written: written.length,
            });

            return {
                status       : "created",
                identifier   : plan.identifier,
                written,
                includes     : plan.includes,
                registrations: plan.registrations,
            };
        }
        catch (error) {
            this.logger.error("Adding check failed", {
                group: groupName,
                entry: entryName,
                error: error instanceof Error ? error.message : String(error),
            });
            this.emit(createEvent("scaffold:failed", {
                group: groupName,
                entry: entryName,
                error: error instanceof Error ? error.message : String(error),
            }));
            throw error;
        }
    }

    /**
     * Emit an event on the bus.
     */
    private emit(event: EventPayload): void {
        this.eventBus.emit(event);
    }
}
