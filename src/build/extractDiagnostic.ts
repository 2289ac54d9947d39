import type { DiagnosticExcerpt } from "./types.js";

export type DiagnosticPattern = {
  id: string;
  regex: RegExp;
  /** Which part of a match goes into the excerpt: the whole match or its first group. */
  capture: "match" | "body";
};

export const DEFAULT_EXCERPT_BUDGET = 1500;
export const DEFAULT_TAIL_LINES = 50;

// Ordered by priority; the first patterns get the budget first.
export const DEFAULT_DIAGNOSTIC_PATTERNS: DiagnosticPattern[] = [
  { id: "build_failed", regex: /FAILURE: Build failed with an exception\./gi, capture: "match" },
  { id: "what_went_wrong", regex: /\* What went wrong:([\s\S]*?)\* Try:/gi, capture: "body" },
  {
    id: "unresolved_dependencies",
    regex: /Could not resolve (?:all )?(?:dependencies|files|artifacts) for configuration '[^'\n]*'\.?/gi,
    capture: "match"
  },
  { id: "task_failed", regex: /Execution failed for task '[^'\n]*'\.?/gi, capture: "match" },
  { id: "caused_by", regex: /Caused by:[\s\S]*?(?=\n[ \t]*\n|$)/g, capture: "match" },
  { id: "error_line", regex: /Error:[\s\S]*?(?=\n[ \t]*\n|$)/gi, capture: "match" }
];

const tail = (rawOutput: string, lines: number): string => {
  const all = rawOutput.split(/\r?\n/);
  return all.length > lines ? all.slice(-lines).join("\n") : rawOutput;
};

export const extractDiagnostic = (
  rawOutput: string,
  opts: { budget?: number; tailLines?: number; patterns?: DiagnosticPattern[] } = {}
): DiagnosticExcerpt => {
  const budget = opts.budget ?? DEFAULT_EXCERPT_BUDGET;
  const patterns = opts.patterns ?? DEFAULT_DIAGNOSTIC_PATTERNS;
  const snippets: string[] = [];
  const matchedPatterns: string[] = [];
  let length = 0;
  let full = false;

  for (const pattern of patterns) {
    if (full) break;
    const flags = pattern.regex.flags.includes("g") ? pattern.regex.flags : `${pattern.regex.flags}g`;
    const regex = new RegExp(pattern.regex.source, flags);

    for (const match of rawOutput.matchAll(regex)) {
      if (length >= budget) {
        full = true;
        break;
      }
      const snippet = (pattern.capture === "body" ? (match[1] ?? "") : match[0]).trim();
      if (snippet.length === 0) continue;
      if (snippets.some((existing) => existing.includes(snippet))) continue;

      length += (snippets.length > 0 ? 1 : 0) + snippet.length;
      snippets.push(snippet);
      if (!matchedPatterns.includes(pattern.id)) {
        matchedPatterns.push(pattern.id);
      }
    }
  }

  if (snippets.length > 0) {
    return { text: snippets.join("\n"), matchedPatterns, fallback: false };
  }

  return { text: tail(rawOutput, opts.tailLines ?? DEFAULT_TAIL_LINES), matchedPatterns: [], fallback: true };
};
