import type { OracleRequest } from "./types.js";

export const NO_FIX_SENTINEL = "NO_FIX";

export const ORACLE_SYSTEM_PROMPT = [
  "You are an expert Gradle build engineer.",
  "You repair failing builds by editing exactly one of two files: gradle.properties or the build script.",
  "Answer with these tags, one per line, in this order and nothing else:",
  "Error_Type: <short classification of the failure, e.g. DEPENDENCY_RESOLUTION>",
  "Target_File: <gradle.properties | build.gradle>",
  "Match_Pattern: <optional JavaScript regular expression matching the text to replace; omit this line to append>",
  "Fix_Content: <the exact text to append, or to put in place of the first match>",
  `If you cannot fix the build, answer with the single line: Fix_Content: ${NO_FIX_SENTINEL}`
].join("\n");

const clip = (value: string, max: number): string =>
  value.length > max ? `${value.slice(0, max)}\n...<truncated ${value.length - max} chars>` : value;

export const buildOracleUserPrompt = (request: OracleRequest, maxFileChars: number): string => {
  const { properties, build_script: buildScript } = request.files;
  return [
    `Repair attempt ${request.attempt} of ${request.maxAttempts}. The Gradle build failed with:`,
    "--- ERROR ---",
    request.diagnostic,
    "--- END ERROR ---",
    "",
    `Current content of ${properties.fileName}:`,
    `--- ${properties.fileName.toUpperCase()} ---`,
    clip(properties.content, maxFileChars),
    `--- END ${properties.fileName.toUpperCase()} ---`,
    "",
    `Current content of ${buildScript.fileName}:`,
    `--- ${buildScript.fileName.toUpperCase()} ---`,
    clip(buildScript.content, maxFileChars),
    `--- END ${buildScript.fileName.toUpperCase()} ---`
  ].join("\n");
};
