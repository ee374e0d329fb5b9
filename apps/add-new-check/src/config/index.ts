/**
 * @fileoverview Configuration barrel exports
 *
 * @module config
 */

export {
    kCONFIG_FILE,
    loadScaffoldConfig,
    loadScaffoldConfigWithFallback,
    applyEnvOverrides,
    getDefaultConfig,
    type ScaffoldConfig,
    type ScaffoldEnv,
} from "./loadConfig.js";
