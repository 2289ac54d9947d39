import { readFile } from "node:fs/promises";
import { writeFileAtomic } from "./atomicWrite.js";

const isComment = (trimmed: string): boolean => trimmed.startsWith("#") || trimmed.startsWith("!");

const splitProperty = (line: string): { key: string; value: string } | null => {
  const trimmed = line.trim();
  if (trimmed.length === 0 || isComment(trimmed)) return null;

  const idx = trimmed.search(/[=:]/);
  if (idx <= 0) return null;
  return { key: trimmed.slice(0, idx).trim(), value: trimmed.slice(idx + 1).trim() };
};

/** Later definitions of a key win, as Gradle reads them. */
export const parseProperties = (text: string): Map<string, string> => {
  const props = new Map<string, string>();
  for (const line of text.split(/\r?\n/)) {
    const parsed = splitProperty(line);
    if (parsed) props.set(parsed.key, parsed.value);
  }
  return props;
};

export const setPropertyInText = (text: string, key: string, value: string): { text: string; replaced: boolean } => {
  let replaced = false;
  const lines = text.split("\n").map((line) => {
    const parsed = splitProperty(line);
    if (parsed?.key !== key) return line;
    replaced = true;
    return `${key}=${value}${line.endsWith("\r") ? "\r" : ""}`;
  });

  if (replaced) {
    return { text: lines.join("\n"), replaced };
  }

  const separator = text.length === 0 || text.endsWith("\n") ? "" : "\n";
  return { text: `${text}${separator}${key}=${value}\n`, replaced };
};

export const setProperty = async (
  filePath: string,
  key: string,
  value: string
): Promise<{ created: boolean; replaced: boolean }> => {
  if (key.trim().length === 0 || /[=:\s]/.test(key)) {
    throw new Error(`Invalid property name: ${JSON.stringify(key)}`);
  }

  let current: string | undefined;
  try {
    current = await readFile(filePath, "utf8");
  } catch (error) {
    if (!(error instanceof Error && "code" in error && error.code === "ENOENT")) {
      throw error;
    }
  }

  const next = setPropertyInText(current ?? "", key, value);
  await writeFileAtomic(filePath, next.text);
  return { created: current === undefined, replaced: next.replaced };
};
