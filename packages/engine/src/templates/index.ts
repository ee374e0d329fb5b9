/**
 * @fileoverview Template barrel exports
 *
 * @module @tidy-scaffold/engine/templates
 */

export {
    bannerLine,
    kBANNER_WIDTH,
    kHEADER_BANNER_CLOSE,
    kSOURCE_BANNER_CLOSE,
    kLICENSE_BLOCK,
} from "./banner.js";
export { renderHeader, headerFileName } from "./HeaderTemplate.js";
export { renderImplementation } from "./ImplementationTemplate.js";
export { renderTestFixture, testFixtureFileName } from "./TestFixtureTemplate.js";
