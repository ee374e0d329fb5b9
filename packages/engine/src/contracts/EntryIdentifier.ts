/**
 * Entry Identifier
 *
 * Names a check within its group and derives every symbol the generated
 * artifacts refer to. All derived values are pure functions of the two raw
 * names, so any generator can re-derive them independently.
 */

/**
 * Suffix appended to the PascalCase check name.
 */
const kSYMBOL_SUFFIX = "Check";

/**
 * Prefix shared by every header guard in the clang-tidy tree.
 */
const kGUARD_PREFIX = "LLVM_CLANG_TOOLS_EXTRA_CLANG_TIDY_";

/**
 * A check, as named on the command line.
 *
 * @example
 * ```typescript
 * const id = deriveIdentifier("misc", "awesome-functions");
 * id.symbolName;    // "AwesomeFunctionsCheck"
 * id.guardToken;    // "LLVM_CLANG_TOOLS_EXTRA_CLANG_TIDY_MISC_AWESOME_FUNCTIONS_H"
 * id.qualifiedName; // "misc-awesome-functions"
 * id.moduleName;    // "Misc"
 * ```
 */
export interface EntryIdentifier {
    /** Group (module directory) the check belongs to, e.g. "misc" */
    readonly groupName: string;

    /** Dash-separated check name, e.g. "awesome-functions" */
    readonly entryName: string;

    /** Class name of the check, e.g. "AwesomeFunctionsCheck" */
    readonly symbolName: string;

    /** Include guard of the generated header */
    readonly guardToken: string;

    /** Name the check is registered and diagnosed under, e.g. "misc-awesome-functions" */
    readonly qualifiedName: string;

    /** Capitalized group name used for the module's registration file, e.g. "Misc" */
    readonly moduleName: string;
}

/**
 * Upper-case the first character and lower-case the rest.
 */
export function capitalize(token: string): string {
    return token.charAt(0).toUpperCase() + token.slice(1).toLowerCase();
}

function toGuardSegment(name: string): string {
    return name.toUpperCase().replace(/-/g, "_");
}

/**
 * Derive the identifier of a check from its group and dash-separated name.
 *
 * @param groupName - Module directory, e.g. "misc"
 * @param entryName - Check name, e.g. "awesome-functions"
 * @returns Frozen identifier with all derived names
 */
export function deriveIdentifier(groupName: string, entryName: string): EntryIdentifier {
    const symbolName = entryName
        .split("-")
        .map(capitalize)
        .join("") + kSYMBOL_SUFFIX;

    const guardToken = `${kGUARD_PREFIX}${toGuardSegment(groupName)}_${toGuardSegment(entryName)}_H`;

    return Object.freeze({
        groupName,
        entryName,
        symbolName,
        guardToken,
        qualifiedName: `${groupName}-${entryName}`,
        moduleName   : capitalize(groupName),
    });
}
