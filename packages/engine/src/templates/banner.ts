/**
 * @fileoverview File banner shared by the generated header and implementation
 *
 * @module @tidy-scaffold/engine/templates/banner
 */

/**
 * Column width every banner line fills.
 */
export const kBANNER_WIDTH = 80;

const kBANNER_OPEN = "//===--- ";
const kBANNER_TOOL = " - clang-tidy";

/**
 * Banner closing of a header, which carries the C++ mode line.
 */
export const kHEADER_BANNER_CLOSE = "*- C++ -*-===//";

/**
 * Banner closing of an implementation file.
 */
export const kSOURCE_BANNER_CLOSE = "-===//";

/**
 * License block that follows the banner line.
 */
export const kLICENSE_BLOCK = [
    "//",
    "//                     The LLVM Compiler Infrastructure",
    "//",
    "// This file is distributed under the University of Illinois Open Source",
    "// License. See LICENSE.TXT for details.",
    "//",
    "//===----------------------------------------------------------------------===//",
].join("\n");

/**
 * First line of a generated file, padded with dashes to {@link kBANNER_WIDTH}.
 *
 * Names too long to fit get no padding.
 *
 * @param fileName - Base name of the generated file
 * @param close - Banner closing
 *
 * @example
 * ```typescript
 * bannerLine("FooCheck.h", kHEADER_BANNER_CLOSE);
 * // "//===--- FooCheck.h - clang-tidy---...---*- C++ -*-===//"
 * ```
 */
export function bannerLine(fileName: string, close: string): string {
    const fixed = kBANNER_OPEN.length + kBANNER_TOOL.length + close.length;
    const padding = Math.max(0, kBANNER_WIDTH - fixed - fileName.length);
    return kBANNER_OPEN + fileName + kBANNER_TOOL + "-".repeat(padding) + close;
}
