/**
 * @fileoverview Implementation Template
 *
 * A working placeholder check: it flags every function whose name does not
 * start with `awesome_` and offers a fix-it that adds the prefix.
 *
 * @module @tidy-scaffold/engine/templates/ImplementationTemplate
 */

import type { EntryIdentifier } from "../contracts/EntryIdentifier.js";
import { sourceFileName } from "../patching/ManifestPatcher.js";
import { bannerLine, kLICENSE_BLOCK, kSOURCE_BANNER_CLOSE } from "./banner.js";

/**
 * Render the implementation file of a new check.
 */
export function renderImplementation(identifier: EntryIdentifier): string {
    const name = identifier.symbolName;

    return `${bannerLine(sourceFileName(identifier), kSOURCE_BANNER_CLOSE)}
${kLICENSE_BLOCK}

#include "${name}.h"
#include "clang/AST/ASTContext.h"
#include "clang/ASTMatchers/ASTMatchFinder.h"

using namespace clang::ast_matchers;

namespace clang {
namespace tidy {

void ${name}::registerMatchers(MatchFinder *Finder) {
  // FIXME: Add matchers.
  Finder->addMatcher(functionDecl().bind("x"), this);
}

void ${name}::check(const MatchFinder::MatchResult &Result) {
  // FIXME: Add callback implementation.
  const auto *MatchedDecl = Result.Nodes.getNodeAs<FunctionDecl>("x");
  if (MatchedDecl->getName().startswith("awesome_"))
    return;
  diag(MatchedDecl->getLocation(), "function '%0' is insufficiently awesome")
      << MatchedDecl->getName()
      << FixItHint::CreateInsertion(MatchedDecl->getLocation(), "awesome_");
}

} // namespace tidy
} // namespace clang

`;
}
