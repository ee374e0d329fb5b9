/**
 * @fileoverview Header Template
 *
 * Declares the new check class with the two operations every check
 * overrides: `registerMatchers` and `check`.
 *
 * @module @tidy-scaffold/engine/templates/HeaderTemplate
 */

import type { EntryIdentifier } from "../contracts/EntryIdentifier.js";
import { bannerLine, kHEADER_BANNER_CLOSE, kLICENSE_BLOCK } from "./banner.js";

/**
 * Header file name of a check, e.g. "AwesomeFunctionsCheck.h".
 */
export function headerFileName(identifier: EntryIdentifier): string {
    return `${identifier.symbolName}.h`;
}

/**
 * Render the header of a new check.
 */
export function renderHeader(identifier: EntryIdentifier): string {
    const { symbolName: name, guardToken: guard } = identifier;

    return `${bannerLine(headerFileName(identifier), kHEADER_BANNER_CLOSE)}
${kLICENSE_BLOCK}

#ifndef ${guard}
#define ${guard}

#include "../ClangTidy.h"

namespace clang {
namespace tidy {

class ${name} : public ClangTidyCheck {
public:
  ${name}(StringRef Name, ClangTidyContext *Context)
      : ClangTidyCheck(Name, Context) {}
  void registerMatchers(ast_matchers::MatchFinder *Finder) override;
  void check(const ast_matchers::MatchFinder::MatchResult &Result) override;
};

} // namespace tidy
} // namespace clang

#endif // ${guard}

`;
}
