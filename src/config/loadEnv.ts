import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";

export const parseEnvLine = (line: string): { key: string; value: string } | null => {
  const trimmed = line.trim();
  if (trimmed.length === 0 || trimmed.startsWith("#")) return null;

  const withoutExport = trimmed.startsWith("export ") ? trimmed.slice(7).trim() : trimmed;
  const idx = withoutExport.indexOf("=");
  if (idx <= 0) return null;

  const key = withoutExport.slice(0, idx).trim();
  let value = withoutExport.slice(idx + 1).trim();

  if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
    value = value.slice(1, -1);
  }

  return { key, value };
};

/**
 * Copies `.env` entries into `env` without overriding variables that are
 * already set. Returns the keys that were filled in.
 */
export const loadEnvFile = (filePath = ".env", env: NodeJS.ProcessEnv = process.env): string[] => {
  const absolute = resolve(process.cwd(), filePath);
  if (!existsSync(absolute)) return [];

  const loaded: string[] = [];
  readFileSync(absolute, "utf8")
    .split(/\r?\n/)
    .forEach((line) => {
      const parsed = parseEnvLine(line);
      if (!parsed) return;
      if (env[parsed.key] === undefined) {
        env[parsed.key] = parsed.value;
        loaded.push(parsed.key);
      }
    });
  return loaded;
};
