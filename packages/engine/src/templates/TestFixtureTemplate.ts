/**
 * @fileoverview Test Fixture Template
 *
 * A lit test for the new check, run by `check_clang_tidy.sh`. Its
 * expectations match the placeholder implementation.
 *
 * @module @tidy-scaffold/engine/templates/TestFixtureTemplate
 */

import type { EntryIdentifier } from "../contracts/EntryIdentifier.js";

/**
 * Fixture file name of a check, e.g. "misc-awesome-functions.cpp".
 */
export function testFixtureFileName(identifier: EntryIdentifier): string {
    return `${identifier.qualifiedName}.cpp`;
}

/**
 * Render the test fixture of a new check.
 */
export function renderTestFixture(identifier: EntryIdentifier): string {
    const check = identifier.qualifiedName;

    return `// RUN: $(dirname %s)/check_clang_tidy.sh %s ${check} %t
// REQUIRES: shell

// FIXME: Add something that triggers the check here.
void f();
// CHECK-MESSAGES: :[[@LINE-1]]:6: warning: function 'f' is insufficiently awesome [${check}]

// FIXME: Verify the applied fix.
//   * Make the CHECK patterns specific enough and try to make verified lines
//     unique to avoid incorrect matches.
//   * Use {{}} for regular expressions.
// CHECK-FIXES: {{^}}void awesome_f();{{$}}

// FIXME: Add something that doesn't trigger the check here.
void awesome_f2();
`;
}
