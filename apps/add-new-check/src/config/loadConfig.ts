/**
 * @fileoverview Scaffold Configuration Loader
 *
 * Loads the optional `tidy-scaffold.yml` from the working directory and
 * applies environment overrides on top of it.
 *
 * ```yaml
 * root: /llvm/tools/clang/tools/extra/clang-tidy
 * dryRun: false
 * verbose: true
 * ```
 *
 * Precedence: environment, then file, then defaults.
 *
 * @module config/loadConfig
 */

import { readFileSync, existsSync } from "fs";
import { resolve } from "path";
import { parse as parseYaml } from "yaml";

/**
 * Name of the configuration file looked up in the working directory.
 */
export const kCONFIG_FILE = "tidy-scaffold.yml";

/**
 * Resolved CLI configuration.
 */
export interface ScaffoldConfig {
    /** clang-tidy source directory holding one directory per module */
    root: string;

    /** Compute and report every write without touching the tree */
    dryRun: boolean;

    /** Show debug output */
    verbose: boolean;
}

/**
 * Environment variables read by the loader.
 */
export type ScaffoldEnv = Readonly<Record<string, string | undefined>>;

/**
 * Default configuration.
 *
 * The root defaults to the directory npm was invoked from, else the current
 * working directory.
 */
export function getDefaultConfig(env: ScaffoldEnv = process.env): ScaffoldConfig {
    return {
        root   : env.INIT_CWD ?? process.cwd(),
        dryRun : false,
        verbose: false,
    };
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseFlag(value: string): boolean {
    const normalized = value.trim().toLowerCase();
    return normalized === "1" || normalized === "true";
}

/**
 * Apply `TIDY_SCAFFOLD_*` environment overrides.
 */
export function applyEnvOverrides(config: ScaffoldConfig, env: ScaffoldEnv = process.env): ScaffoldConfig {
    const result = { ...config };

    if (env.TIDY_SCAFFOLD_ROOT) {
        result.root = resolve(env.TIDY_SCAFFOLD_ROOT);
    }
    if (env.TIDY_SCAFFOLD_DRY_RUN !== undefined) {
        result.dryRun = parseFlag(env.TIDY_SCAFFOLD_DRY_RUN);
    }
    if (env.TIDY_SCAFFOLD_VERBOSE !== undefined) {
        result.verbose = parseFlag(env.TIDY_SCAFFOLD_VERBOSE);
    }

    return result;
}

/**
 * Load the configuration file, if present.
 *
 * A missing file yields the defaults. A relative `root` is resolved against
 * the file's directory.
 *
 * @param filePath - Path to tidy-scaffold.yml
 * @param env - Environment to read defaults and overrides from
 * @throws Error if the file is not a YAML mapping or a field has the wrong type
 *
 * @example
 * ```typescript
 * const config = loadScaffoldConfig("/work/tidy-scaffold.yml");
 * // { root: "/work/clang-tidy", dryRun: false, verbose: false }
 * ```
 */
export function loadScaffoldConfig(filePath: string, env: ScaffoldEnv = process.env): ScaffoldConfig {
    const config = getDefaultConfig(env);

    if (!existsSync(filePath)) {
        return applyEnvOverrides(config, env);
    }

    const parsed: unknown = parseYaml(readFileSync(filePath, "utf-8"));

    // An empty file parses to null
    if (parsed !== null && parsed !== undefined) {
        if (!isRecord(parsed)) {
            throw new Error(`Invalid config file format: expected a mapping in ${filePath}`);
        }

        if (parsed.root !== undefined) {
            if (typeof parsed.root !== "string" || parsed.root.length === 0) {
                throw new Error("Invalid config: 'root' must be a non-empty string");
            }
            config.root = resolve(filePath, "..", parsed.root);
        }

        for (const key of ["dryRun", "verbose"] as const) {
            const value = parsed[key];
            if (value === undefined) {
                continue;
            }
            if (typeof value !== "boolean") {
                throw new Error(`Invalid config: '${key}' must be a boolean`);
            }
            config[key] = value;
        }
    }

    return applyEnvOverrides(config, env);
}

/**
 * Load the configuration, falling back to defaults if the file is invalid.
 *
 * @param filePath - Path to tidy-scaffold.yml
 * @param env - Environment to read defaults and overrides from
 */
export function loadScaffoldConfigWithFallback(filePath: string, env: ScaffoldEnv = process.env): ScaffoldConfig {
    try {
        return loadScaffoldConfig(filePath, env);
    }
    catch (error) {
        console.warn(`Failed to load config from ${filePath}:`, error);
        return applyEnvOverrides(getDefaultConfig(env), env);
    }
}
