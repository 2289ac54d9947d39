import { NO_FIX_SENTINEL } from "./prompts.js";
import type { ConfigFileId, FixProposal } from "./types.js";

type TagHit = { index: number; value: string; end: number };

const findTag = (text: string, tag: string): TagHit | undefined => {
  const match = new RegExp(`^[ \\t]*${tag}:[ \\t]*(.*)$`, "m").exec(text);
  if (!match) return undefined;
  return { index: match.index, value: match[1].trim(), end: match.index + match[0].length };
};

const stripFences = (value: string): string => {
  const fenced = value.match(/^```[\w.+-]*[ \t]*\r?\n([\s\S]*?)\r?\n?```$/);
  return fenced ? fenced[1] : value;
};

const QUOTE_CHARS = new Set(["`", "'", '"']);

/** Removes one surrounding pair of matching quotes; inner quotes are part of the value. */
const stripQuotes = (value: string): string => {
  const first = value.charAt(0);
  if (value.length >= 2 && QUOTE_CHARS.has(first) && value.endsWith(first)) {
    return value.slice(1, -1);
  }
  return value;
};

const resolveTarget = (value: string): ConfigFileId | undefined => {
  const name = stripQuotes(value).split(/[\\/]/).pop()?.toLowerCase() ?? "";
  if (name === "gradle.properties") return "properties";
  if (name === "build.gradle" || name === "build.gradle.kts") return "build_script";
  return undefined;
};

const ABSENT_PATTERN_VALUES = new Set(["", "none", "n/a", "-"]);

// `m` is always on and only the first match is replaced, so `g` is moot.
const IMPLIED_FLAGS = new Set(["g", "m"]);
const CARRIED_FLAGS = new Set(["i", "s", "u"]);

type PatternSpec = { source: string; flags: string } | { unsupported: string };

const normalizePattern = (value: string): PatternSpec | undefined => {
  const unquoted = stripQuotes(value);
  if (ABSENT_PATTERN_VALUES.has(unquoted.toLowerCase())) return undefined;
  const literal = unquoted.match(/^\/(.+)\/([a-z]*)$/);
  if (!literal) return { source: unquoted, flags: "" };
  const flags = [...new Set(literal[2])].filter((flag) => !IMPLIED_FLAGS.has(flag)).sort();
  const unsupported = flags.filter((flag) => !CARRIED_FLAGS.has(flag));
  if (unsupported.length > 0) return { unsupported: unsupported.join("") };
  return { source: literal[1], flags: flags.join("") };
};

const invalid = (reason: string): FixProposal => ({ action: "invalid", targetFile: "none", content: "", reason });

/**
 * Grammar: `Error_Type:`, `Target_File:`, optional `Match_Pattern:`, then
 * `Fix_Content:` whose value runs to the end of the response. A `NO_FIX`
 * fix content (or a bare `NO_FIX` line with no fix content tag) wins over
 * everything else.
 */
export const parseFixProposal = (raw: string): FixProposal => {
  const errorType = findTag(raw, "Error_Type");
  const fix = findTag(raw, "Fix_Content");
  const classification = errorType && errorType.value.length > 0 ? errorType.value : undefined;

  const content = fix ? stripFences(`${fix.value}${raw.slice(fix.end)}`.trim()).trim() : undefined;

  if (content !== undefined && stripQuotes(content.split(/\r?\n/, 1)[0].trim()) === NO_FIX_SENTINEL) {
    return { action: "no_fix", targetFile: "none", content: "", classification };
  }
  if (!fix && new RegExp(`^[ \\t]*${NO_FIX_SENTINEL}[ \\t]*$`, "m").test(raw)) {
    return { action: "no_fix", targetFile: "none", content: "", classification };
  }

  const target = findTag(raw, "Target_File");
  const missing = [
    classification ? undefined : "Error_Type",
    target ? undefined : "Target_File",
    fix ? undefined : "Fix_Content"
  ].filter((tag): tag is string => tag !== undefined);
  if (missing.length > 0 || !errorType || !target || !fix || content === undefined) {
    return invalid(`missing tag(s): ${missing.join(", ")}`);
  }

  if (!(errorType.index < target.index && target.index < fix.index)) {
    return invalid("tags out of order; expected Error_Type, Target_File, Fix_Content");
  }

  const targetFile = resolveTarget(target.value);
  if (!targetFile) {
    return invalid(`unknown target file: ${target.value || "<empty>"}`);
  }

  if (content.length === 0) {
    return invalid("empty fix content");
  }

  const patternTag = findTag(raw.slice(0, fix.index), "Match_Pattern");
  const pattern = patternTag ? normalizePattern(patternTag.value) : undefined;
  if (!patternTag || pattern === undefined) {
    return { action: "append", targetFile, content, classification: classification ?? "" };
  }

  if (patternTag.index < target.index) {
    return invalid("Match_Pattern must follow Target_File");
  }

  if ("unsupported" in pattern) {
    return invalid(`unsupported Match_Pattern flag(s): ${pattern.unsupported}`);
  }

  try {
    new RegExp(pattern.source, `m${pattern.flags}`);
  } catch (error) {
    return invalid(`invalid Match_Pattern: ${error instanceof Error ? error.message : pattern.source}`);
  }

  return {
    action: "replace_match",
    targetFile,
    matchPattern: pattern.source,
    ...(pattern.flags ? { matchFlags: pattern.flags } : {}),
    content,
    classification: classification ?? ""
  };
};
