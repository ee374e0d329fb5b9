/**
 * @fileoverview Patcher barrel exports
 *
 * @module @tidy-scaffold/engine/patching
 */

export {
    decideInsertion,
    scanOrderedList,
    indentationOf,
    type EntryKeyExtractor,
    type OrderedListScan,
    type DecideInsertionOptions,
} from "./OrderedListPatcher.js";

export {
    patchBuildManifest,
    manifestEntryKey,
    sourceFileName,
    kMANIFEST_FILE,
    kSOURCE_SUFFIX,
    type ManifestPatch,
} from "./ManifestPatcher.js";

export {
    patchRegistration,
    includeEntryKey,
    registrationEntryKey,
    registrationFileName,
    formatInclude,
    formatRegistration,
    kREGISTRATION_FILE_SUFFIX,
    kEND_OF_FUNCTION_MARKER,
    type ListState,
    type ListOutcome,
    type RegistrationPatch,
} from "./RegistrationPatcher.js";
