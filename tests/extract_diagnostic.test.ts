import { describe, expect, test } from "vitest";
import { extractDiagnostic } from "../src/build/extractDiagnostic.js";

const unresolvedOutput = [
  "> Task :app:compileJava FAILED",
  "",
  "FAILURE: Build failed with an exception.",
  "",
  "* What went wrong:",
  "Execution failed for task ':app:compileJava'.",
  "> Could not resolve all dependencies for configuration ':app:compileClasspath'.",
  "",
  "* Try:",
  "> Run with --info option to get more log output.",
  "",
  "BUILD FAILED in 3s"
].join("\n");

describe("extractDiagnostic", () => {
  test("keeps the failure banner and the what-went-wrong body, skipping contained matches", () => {
    const excerpt = extractDiagnostic(unresolvedOutput);

    expect(excerpt.fallback).toBe(false);
    expect(excerpt.matchedPatterns).toEqual(["build_failed", "what_went_wrong"]);
    expect(excerpt.text).toBe(
      [
        "FAILURE: Build failed with an exception.",
        "Execution failed for task ':app:compileJava'.",
        "> Could not resolve all dependencies for configuration ':app:compileClasspath'."
      ].join("\n")
    );
  });

  test("keeps the project path of an unresolved configuration", () => {
    const excerpt = extractDiagnostic("Could not resolve all files for configuration ':lib:runtimeClasspath'.");

    expect(excerpt.matchedPatterns).toEqual(["unresolved_dependencies"]);
    expect(excerpt.text).toBe("Could not resolve all files for configuration ':lib:runtimeClasspath'.");
  });

  test("matches compiler errors regardless of case up to the next blank line", () => {
    const raw = ["Foo.java:3: error: cannot find symbol", "  symbol: class Bar", "", "1 error"].join("\n");

    const excerpt = extractDiagnostic(raw);

    expect(excerpt.matchedPatterns).toEqual(["error_line"]);
    expect(excerpt.text).toBe("error: cannot find symbol\n  symbol: class Bar");
  });

  test("stops adding snippets once the budget is reached", () => {
    const raw = Array.from(
      { length: 9 },
      (_, i) => `Caused by: java.lang.IllegalStateException: failure number ${i + 1}`
    ).join("\n\n");

    const excerpt = extractDiagnostic(raw, { budget: 100 });

    expect(excerpt.text.split("\n")).toEqual([
      "Caused by: java.lang.IllegalStateException: failure number 1",
      "Caused by: java.lang.IllegalStateException: failure number 2"
    ]);
  });

  test("drops repeated snippets", () => {
    const raw = "Caused by: java.io.IOException: disk full\n\nCaused by: java.io.IOException: disk full";

    expect(extractDiagnostic(raw).text).toBe("Caused by: java.io.IOException: disk full");
  });

  test("falls back to the last lines when nothing matches", () => {
    const raw = Array.from({ length: 60 }, (_, i) => `line ${i + 1}`).join("\n");

    const excerpt = extractDiagnostic(raw, { tailLines: 50 });

    expect(excerpt.fallback).toBe(true);
    expect(excerpt.matchedPatterns).toEqual([]);
    expect(excerpt.text.split("\n")).toHaveLength(50);
    expect(excerpt.text.startsWith("line 11\n")).toBe(true);
    expect(excerpt.text.endsWith("line 60")).toBe(true);
  });

  test("returns short output unchanged as the fallback", () => {
    expect(extractDiagnostic("something odd happened").text).toBe("something odd happened");
  });
});
