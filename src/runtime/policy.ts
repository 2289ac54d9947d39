import { basename, relative, resolve, sep } from "node:path";

const allowed = new Set(["gradle", "gradle.bat", "gradlew", "gradlew.bat", "sh", "git"]);

export const assertCommandAllowed = (cmd: string): void => {
  if (!allowed.has(basename(cmd))) {
    throw new Error(`Command not allowed by policy: ${cmd}`);
  }
};

export const assertPathInside = (root: string, target: string): void => {
  const rel = relative(resolve(root), resolve(target));
  if (rel === ".." || rel.startsWith(`..${sep}`) || rel.split(sep).includes("..")) {
    throw new Error(`Path escapes project root: ${target}`);
  }
};

export const assertCwdInside = (projectRoot: string, cwd: string): void => {
  assertPathInside(projectRoot, cwd);
};
