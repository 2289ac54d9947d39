import { describe, expect, test } from "vitest";
import { parseFixProposal } from "../src/oracle/parseProposal.js";

describe("parseFixProposal", () => {
  test("reads an append proposal for gradle.properties", () => {
    const raw = ["Error_Type: DEPENDENCY_RESOLUTION", "Target_File: gradle.properties", "Fix_Content:", "foo=2.0"].join(
      "\n"
    );

    expect(parseFixProposal(raw)).toEqual({
      action: "append",
      targetFile: "properties",
      content: "foo=2.0",
      classification: "DEPENDENCY_RESOLUTION"
    });
  });

  test("reads a replace proposal and unwraps a regex literal and code fence", () => {
    const raw = [
      "Error_Type: VERSION_CONFLICT",
      "Target_File: `build.gradle.kts`",
      "Match_Pattern: /^foo=.*$/",
      "Fix_Content:",
      "```properties",
      "foo=2.0",
      "```"
    ].join("\n");

    expect(parseFixProposal(raw)).toEqual({
      action: "replace_match",
      targetFile: "build_script",
      matchPattern: "^foo=.*$",
      content: "foo=2.0",
      classification: "VERSION_CONFLICT"
    });
  });

  test("keeps quotes that belong to a Groovy match pattern", () => {
    const raw = [
      "Error_Type: VERSION_CONFLICT",
      "Target_File: build.gradle",
      "Match_Pattern: implementation 'com.example:foo:1.0'",
      "Fix_Content: implementation 'com.example:foo:2.0'"
    ].join("\n");

    expect(parseFixProposal(raw)).toEqual({
      action: "replace_match",
      targetFile: "build_script",
      matchPattern: "implementation 'com.example:foo:1.0'",
      content: "implementation 'com.example:foo:2.0'",
      classification: "VERSION_CONFLICT"
    });
  });

  test("removes one matching pair of quotes around tag values", () => {
    const raw = [
      "Error_Type: X",
      "Target_File: 'gradle.properties'",
      "Match_Pattern: `^foo=.*$`",
      "Fix_Content: foo=2.0"
    ].join("\n");

    expect(parseFixProposal(raw)).toEqual({
      action: "replace_match",
      targetFile: "properties",
      matchPattern: "^foo=.*$",
      content: "foo=2.0",
      classification: "X"
    });
  });

  test("carries case-insensitive and dotall flags from a regex literal", () => {
    const raw = ["Error_Type: X", "Target_File: gradle.properties", "Match_Pattern: /^FOO=.*$/si", "Fix_Content: foo=2.0"].join(
      "\n"
    );

    expect(parseFixProposal(raw)).toEqual({
      action: "replace_match",
      targetFile: "properties",
      matchPattern: "^FOO=.*$",
      matchFlags: "is",
      content: "foo=2.0",
      classification: "X"
    });
  });

  test("drops the implied global and multiline flags", () => {
    const raw = ["Error_Type: X", "Target_File: gradle.properties", "Match_Pattern: /^foo=.*$/gm", "Fix_Content: foo=2.0"].join(
      "\n"
    );

    const proposal = parseFixProposal(raw);

    expect(proposal.action).toBe("replace_match");
    expect(proposal.action === "replace_match" && proposal.matchFlags).toBeUndefined();
  });

  test("rejects regex flags it cannot honour", () => {
    const raw = ["Error_Type: X", "Target_File: gradle.properties", "Match_Pattern: /foo/y", "Fix_Content: foo=2.0"].join("\n");

    const proposal = parseFixProposal(raw);

    expect(proposal.action === "invalid" && proposal.reason).toBe("unsupported Match_Pattern flag(s): y");
  });

  test("keeps multi-line fix content up to the end of the response", () => {
    const raw = [
      "Error_Type: MISSING_REPOSITORY",
      "Target_File: app/build.gradle",
      "Fix_Content: repositories {",
      "    mavenCentral()",
      "}"
    ].join("\n");

    const proposal = parseFixProposal(raw);

    expect(proposal.action).toBe("append");
    expect(proposal.targetFile).toBe("build_script");
    expect(proposal.content).toBe("repositories {\n    mavenCentral()\n}");
  });

  test("treats an absent-looking match pattern as an append", () => {
    const raw = ["Error_Type: X", "Target_File: gradle.properties", "Match_Pattern: none", "Fix_Content: a=b"].join("\n");

    expect(parseFixProposal(raw).action).toBe("append");
  });

  test("reports NO_FIX in the fix content", () => {
    const raw = ["Error_Type: NETWORK", "Target_File: none", "Fix_Content: NO_FIX"].join("\n");

    expect(parseFixProposal(raw)).toEqual({
      action: "no_fix",
      targetFile: "none",
      content: "",
      classification: "NETWORK"
    });
  });

  test("reports a quoted NO_FIX", () => {
    for (const sentinel of ["`NO_FIX`", "'NO_FIX'", '"NO_FIX"']) {
      const raw = ["Error_Type: NETWORK", "Target_File: none", `Fix_Content: ${sentinel}`].join("\n");

      expect(parseFixProposal(raw)).toEqual({
        action: "no_fix",
        targetFile: "none",
        content: "",
        classification: "NETWORK"
      });
    }
  });

  test("reports a bare NO_FIX line", () => {
    expect(parseFixProposal("I cannot help with this one.\nNO_FIX\n")).toEqual({
      action: "no_fix",
      targetFile: "none",
      content: "",
      classification: undefined
    });
  });

  test("rejects missing tags", () => {
    expect(parseFixProposal("Target_File: gradle.properties")).toEqual({
      action: "invalid",
      targetFile: "none",
      content: "",
      reason: "missing tag(s): Error_Type, Fix_Content"
    });
  });

  test("rejects tags out of order", () => {
    const raw = ["Target_File: gradle.properties", "Error_Type: X", "Fix_Content: a=b"].join("\n");

    const proposal = parseFixProposal(raw);

    expect(proposal.action).toBe("invalid");
    expect(proposal.action === "invalid" && proposal.reason).toBe(
      "tags out of order; expected Error_Type, Target_File, Fix_Content"
    );
  });

  test("rejects an unknown target file", () => {
    const raw = ["Error_Type: X", "Target_File: settings.gradle", "Fix_Content: a=b"].join("\n");

    const proposal = parseFixProposal(raw);

    expect(proposal.action === "invalid" && proposal.reason).toBe("unknown target file: settings.gradle");
  });

  test("rejects empty fix content", () => {
    const raw = ["Error_Type: X", "Target_File: gradle.properties", "Fix_Content:", "   "].join("\n");

    const proposal = parseFixProposal(raw);

    expect(proposal.action === "invalid" && proposal.reason).toBe("empty fix content");
  });

  test("rejects a match pattern that does not compile", () => {
    const raw = ["Error_Type: X", "Target_File: gradle.properties", "Match_Pattern: foo(", "Fix_Content: a=b"].join(
      "\n"
    );

    const proposal = parseFixProposal(raw);

    expect(proposal.action).toBe("invalid");
    expect(proposal.action === "invalid" && proposal.reason.startsWith("invalid Match_Pattern:")).toBe(true);
  });

  test("ignores tag-like lines inside the fix content", () => {
    const raw = [
      "Error_Type: X",
      "Target_File: gradle.properties",
      "Fix_Content:",
      "# Match_Pattern: not a tag",
      "foo=2.0"
    ].join("\n");

    expect(parseFixProposal(raw)).toEqual({
      action: "append",
      targetFile: "properties",
      content: "# Match_Pattern: not a tag\nfoo=2.0",
      classification: "X"
    });
  });
});
