import { readdir } from "node:fs/promises";

export const nextJsonCounter = async (dir: string): Promise<number> => {
  let files: string[];
  try {
    files = await readdir(dir);
  } catch {
    return 1;
  }

  const numbers = files
    .map((name) => name.match(/^(\d+)\.json$/))
    .filter((match): match is RegExpMatchArray => match !== null)
    .map((match) => Number(match[1]));

  return numbers.length === 0 ? 1 : Math.max(...numbers) + 1;
};
