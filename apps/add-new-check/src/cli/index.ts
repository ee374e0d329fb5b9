/**
 * @fileoverview CLI barrel exports
 *
 * @module cli
 */

export { run, type RunOptions } from "./run.js";
export { parseArgs, UsageError, kUSAGE_LINES, type CheckArguments } from "./args.js";
export { createCliLogger } from "./logger.js";
