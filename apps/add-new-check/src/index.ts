/**
 * @fileoverview add-new-check - Main Entry Point
 *
 * Adds a new check to a clang-tidy source tree:
 *
 * ```
 * add-new-check misc awesome-functions
 * ```
 *
 * Configuration comes from `tidy-scaffold.yml` in the working directory and
 * `TIDY_SCAFFOLD_*` environment variables (a `.env` file is honored).
 *
 * @module add-new-check
 */

// Load .env before any other imports that depend on environment variables
import "dotenv/config";

import { join } from "path";
import { kCONFIG_FILE, loadScaffoldConfigWithFallback } from "./config/index.js";
import { run } from "./cli/index.js";

/**
 * Main entry point
 */
function main(): void {
    const config = loadScaffoldConfigWithFallback(join(process.cwd(), kCONFIG_FILE));

    process.exitCode = run(process.argv.slice(2), { config });
}

try {
    main();
}
catch (error) {
    console.error("[FATAL] Unexpected failure:", error);
    process.exitCode = 1;
}
