import { access } from "node:fs/promises";
import { join, resolve } from "node:path";
import type { ConfigFileId } from "../oracle/types.js";
import { assertPathInside } from "../runtime/policy.js";

export const PROPERTIES_FILE = "gradle.properties";
export const BUILD_SCRIPT_FILES = ["build.gradle", "build.gradle.kts"] as const;

const exists = async (path: string): Promise<boolean> => {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
};

export const resolveBuildScriptName = async (projectRoot: string): Promise<string> => {
  for (const name of BUILD_SCRIPT_FILES) {
    if (await exists(join(projectRoot, name))) return name;
  }
  return BUILD_SCRIPT_FILES[0];
};

export const resolveTargetPath = async (projectRoot: string, target: ConfigFileId): Promise<string> => {
  const name = target === "properties" ? PROPERTIES_FILE : await resolveBuildScriptName(projectRoot);
  const absolute = resolve(projectRoot, name);
  assertPathInside(projectRoot, absolute);
  return absolute;
};

export const commentPrefixFor = (target: ConfigFileId): string => (target === "properties" ? "#" : "//");
