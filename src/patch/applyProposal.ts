import { readFile } from "node:fs/promises";
import type { ActionableProposal } from "../oracle/types.js";
import { PatchWriteError } from "../runtime/errors.js";
import { writeFileAtomic } from "./atomicWrite.js";
import { commentPrefixFor } from "./targets.js";

export const FIX_MARKER = "gradle-mend: suggested fix";

export type PatchOutcome = {
  applied: boolean;
  filePath: string;
  bytesBefore: number;
  bytesAfter: number;
  note?: string;
};

const readIfExists = async (filePath: string): Promise<string | undefined> => {
  try {
    return await readFile(filePath, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return undefined;
    }
    throw new PatchWriteError(filePath, error);
  }
};

const byteLength = (text: string): number => Buffer.byteLength(text, "utf8");

export const appendWithMarker = (existing: string, content: string, commentPrefix: string): string => {
  const separator = existing.length === 0 ? "" : existing.endsWith("\n") ? "\n" : "\n\n";
  const body = content.endsWith("\n") ? content : `${content}\n`;
  return `${existing}${separator}${commentPrefix} ${FIX_MARKER}\n${body}`;
};

/** First non-empty match only; the content is inserted verbatim. */
export const replaceFirstMatch = (
  existing: string,
  pattern: string,
  content: string,
  flags = ""
): string | undefined => {
  const match = new RegExp(pattern, `m${flags}`).exec(existing);
  if (!match || match[0].length === 0) return undefined;
  return `${existing.slice(0, match.index)}${content}${existing.slice(match.index + match[0].length)}`;
};

/**
 * Appends are never deduplicated: applying the same proposal twice grows the
 * file twice.
 */
export const applyProposal = async (
  proposal: ActionableProposal,
  filePath: string,
  opts: { signal?: AbortSignal } = {}
): Promise<PatchOutcome> => {
  opts.signal?.throwIfAborted();
  const existing = await readIfExists(filePath);
  const bytesBefore = existing === undefined ? 0 : byteLength(existing);

  switch (proposal.action) {
    case "append": {
      const next = appendWithMarker(existing ?? "", proposal.content, commentPrefixFor(proposal.targetFile));
      await writeFileAtomic(filePath, next, opts);
      return {
        applied: true,
        filePath,
        bytesBefore,
        bytesAfter: byteLength(next),
        note: existing === undefined ? "created" : undefined
      };
    }
    case "replace_match": {
      if (existing === undefined) {
        return { applied: false, filePath, bytesBefore, bytesAfter: bytesBefore, note: "target file missing" };
      }
      const next = replaceFirstMatch(existing, proposal.matchPattern, proposal.content, proposal.matchFlags);
      if (next === undefined) {
        return { applied: false, filePath, bytesBefore, bytesAfter: bytesBefore, note: "pattern not found" };
      }
      if (next === existing) {
        return { applied: true, filePath, bytesBefore, bytesAfter: bytesBefore, note: "already up to date" };
      }
      await writeFileAtomic(filePath, next, opts);
      return { applied: true, filePath, bytesBefore, bytesAfter: byteLength(next) };
    }
    default: {
      const unreachable: never = proposal;
      throw new Error(`Unsupported proposal: ${JSON.stringify(unreachable)}`);
    }
  }
};
