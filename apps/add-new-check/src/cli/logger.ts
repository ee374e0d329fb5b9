/**
 * @fileoverview CLI logger
 *
 * @module cli/logger
 */

import { defaultLogger, type ScaffoldLogger } from "@tidy-scaffold/engine";

/**
 * Logger that drops debug output unless verbose.
 */
export function createCliLogger(verbose: boolean, base: ScaffoldLogger = defaultLogger): ScaffoldLogger {
    return {
        debug: (message, data) => {
            if (verbose) {
                base.debug(message, data);
            }
        },
        info : (message, data) => base.info(message, data),
        warn : (message, data) => base.warn(message, data),
        error: (message, data) => base.error(message, data),
    };
}
