/**
 * @fileoverview Unit tests for the registration patcher
 *
 * Tests cover:
 * - Both lists patched in one pass (include list and registerCheck calls)
 * - Entry sorting first, last, into an empty call list
 * - Entry already present in one or both lists
 * - End-of-function marker only honored after the include list
 * - Files missing a list
 *
 * @module @tidy-scaffold/engine/__tests__/RegistrationPatcher
 */

import { describe, it, expect } from "vitest";
import { parseArtifact, serializeArtifact } from "../contracts/Artifact.js";
import { deriveIdentifier } from "../contracts/EntryIdentifier.js";
import {
    patchRegistration,
    includeEntryKey,
    registrationEntryKey,
    registrationFileName,
    formatRegistration,
} from "../patching/RegistrationPatcher.js";
import { REGISTRATION, REGISTRATION_PATH } from "./helpers/moduleTree.js";

function patch(content: string, groupName: string, entryName: string) {
    return patchRegistration(parseArtifact(REGISTRATION_PATH, content), deriveIdentifier(groupName, entryName));
}

describe("patchRegistration", () => {
    // Scenario: Both lists gain the entry in sorted position
    it("should insert into the include list and the call list in one pass", () => {
        const input = [
            "#include \"ACheck.h\"",
            "#include \"CCheck.h\"",
            "",
            "void addCheckFactories(Factories &CheckFactories) {",
            "    CheckFactories.registerCheck<ACheck>(\"m-a\");",
            "    CheckFactories.registerCheck<CCheck>(\"m-c\");",
            "}",
            "",
        ].join("\n");

        const result = patch(input, "m", "b");

        expect(result.artifact.lines).toEqual([
            "#include \"ACheck.h\"",
            "#include \"BCheck.h\"",
            "#include \"CCheck.h\"",
            "",
            "void addCheckFactories(Factories &CheckFactories) {",
            "    CheckFactories.registerCheck<ACheck>(\"m-a\");",
            "    CheckFactories.registerCheck<BCheck>(",
            "        \"m-b\");",
            "    CheckFactories.registerCheck<CCheck>(\"m-c\");",
            "}",
        ]);
        expect(result.includes).toEqual({ state: "inserted", insertAtLine: 1 });
        expect(result.registrations).toEqual({ state: "inserted", insertAtLine: 5 });
    });

    // Scenario: Real module file
    it("should patch the misc module file", () => {
        const result = patch(REGISTRATION, "misc", "awesome-functions");

        const expected = REGISTRATION
            .replace(
                "#include \"BoolPointerImplicitConversion.h\"\n",
                "#include \"AwesomeFunctionsCheck.h\"\n#include \"BoolPointerImplicitConversion.h\"\n"
            )
            .replace(
                "    CheckFactories.registerCheck<BoolPointerImplicitConversion>(\n",
                "    CheckFactories.registerCheck<AwesomeFunctionsCheck>(\n" +
                "        \"misc-awesome-functions\");\n" +
                "    CheckFactories.registerCheck<BoolPointerImplicitConversion>(\n"
            );

        expect(serializeArtifact(result.artifact)).toBe(expected);
        expect(result.includes).toEqual({ state: "inserted", insertAtLine: 6 });
        expect(result.registrations).toEqual({ state: "inserted", insertAtLine: 16 });
    });

    // Scenario: Entry sorting last in both lists
    it("should append after the last include and before the closing brace", () => {
        const result = patch(REGISTRATION, "misc", "zzz");
        const lines = result.artifact.lines;

        expect(result.includes).toEqual({ state: "inserted", insertAtLine: 8 });
        expect(result.registrations).toEqual({ state: "inserted", insertAtLine: 19 });
        expect(lines[8]).toBe("#include \"ZzzCheck.h\"");
        expect(lines.slice(19, 23)).toEqual([
            "    CheckFactories.registerCheck<UseOverride>(\"misc-use-override\");",
            "    CheckFactories.registerCheck<ZzzCheck>(",
            "        \"misc-zzz\");",
            "  }",
        ]);
    });

    // Scenario: Entry sorting first in both lists
    it("should insert before the first check include and the first call", () => {
        const result = patch(REGISTRATION, "misc", "aaa");

        expect(result.includes).toEqual({ state: "inserted", insertAtLine: 5 });
        expect(result.registrations).toEqual({ state: "inserted", insertAtLine: 15 });
    });

    // Scenario: Empty call list
    it("should insert before the closing brace of an empty factory function", () => {
        const input = "#include \"ACheck.h\"\n\n  void addCheckFactories(F &CheckFactories) override {\n  }\n";

        const result = patch(input, "m", "b");

        expect(serializeArtifact(result.artifact)).toBe(
            "#include \"ACheck.h\"\n" +
            "#include \"BCheck.h\"\n" +
            "\n" +
            "  void addCheckFactories(F &CheckFactories) override {\n" +
            "    CheckFactories.registerCheck<BCheck>(\n" +
            "        \"m-b\");\n" +
            "  }\n"
        );
    });

    // Scenario: Entry already present in both lists
    it("should leave a file that already registers the check unchanged", () => {
        const input = [
            "#include \"ACheck.h\"",
            "#include \"BCheck.h\"",
            "  void f() {",
            "    CheckFactories.registerCheck<ACheck>(\"m-a\");",
            "    CheckFactories.registerCheck<BCheck>(\"m-b\");",
            "  }",
        ].join("\n");

        const result = patch(input, "m", "b");

        expect(serializeArtifact(result.artifact)).toBe(input);
        expect(result.includes.state).toBe("present");
        expect(result.registrations.state).toBe("present");
    });

    // Scenario: Include present, registration missing
    it("should add only the missing registration", () => {
        const input = [
            "#include \"BCheck.h\"",
            "  void f() {",
            "    CheckFactories.registerCheck<ACheck>(\"m-a\");",
            "    CheckFactories.registerCheck<CCheck>(\"m-c\");",
            "  }",
        ].join("\n");

        const result = patch(input, "m", "b");

        expect(result.includes).toEqual({ state: "present", insertAtLine: null });
        expect(result.registrations).toEqual({ state: "inserted", insertAtLine: 3 });
        expect(result.artifact.lines.filter((line) => line.includes("BCheck"))).toEqual([
            "#include \"BCheck.h\"",
            "    CheckFactories.registerCheck<BCheck>(",
        ]);
    });

    // Scenario: A closing brace before the includes is not the end of the call list
    it("should only look for the end-of-function marker after the include list", () => {
        const input = ["}", "#include \"ACheck.h\"", "  void f() {", "  }"].join("\n");

        const result = patch(input, "m", "b");

        expect(result.artifact.lines).toEqual([
            "}",
            "#include \"ACheck.h\"",
            "#include \"BCheck.h\"",
            "  void f() {",
            "    CheckFactories.registerCheck<BCheck>(",
            "        \"m-b\");",
            "  }",
        ]);
    });

    // Scenario: Include list running to the end of the file
    it("should append the include when the include list ends the file", () => {
        const result = patch("#include \"ACheck.h\"\n", "m", "b");

        expect(serializeArtifact(result.artifact)).toBe("#include \"ACheck.h\"\n#include \"BCheck.h\"\n");
        expect(result.includes).toEqual({ state: "inserted", insertAtLine: 1 });
        expect(result.registrations).toEqual({ state: "notFound", insertAtLine: null });
    });

    // Scenario: File without any include
    it("should change nothing in a file without includes", () => {
        const input = "int x;\n}\n";

        const result = patch(input, "m", "b");

        expect(serializeArtifact(result.artifact)).toBe(input);
        expect(result.includes.state).toBe("notFound");
        expect(result.registrations.state).toBe("notFound");
    });
});

describe("registration helpers", () => {
    it("should extract include paths", () => {
        expect(includeEntryKey("#include \"FooCheck.h\"")).toBe("FooCheck.h");
        expect(includeEntryKey("#include <vector>")).toBeNull();
        expect(includeEntryKey("// #include \"FooCheck.h\"")).toBeNull();
    });

    it("should extract registered class names", () => {
        expect(registrationEntryKey("    CheckFactories.registerCheck<FooCheck>(\"misc-foo\");")).toBe("FooCheck");
        expect(registrationEntryKey("        \"misc-foo\");")).toBeNull();
    });

    it("should name the module file after the capitalized group", () => {
        expect(registrationFileName(deriveIdentifier("google", "explicit"))).toBe("GoogleTidyModule.cpp");
    });

    it("should format the registration over two lines", () => {
        expect(formatRegistration(deriveIdentifier("misc", "awesome-functions"))).toEqual([
            "    CheckFactories.registerCheck<AwesomeFunctionsCheck>(",
            "        \"misc-awesome-functions\");",
        ]);
    });
});
