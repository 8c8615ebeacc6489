import { readFile, writeFile } from "node:fs/promises";

export const splitLines = (content: string): string[] => {
  if (content.length === 0) return [];
  const lines = content.split(/\r?\n/);
  if (lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
};

export const joinLines = (lines: readonly string[]): string => lines.map((line) => `${line}\n`).join("");

export const readLines = async (path: string): Promise<string[]> => splitLines(await readFile(path, "utf8"));

export const writeLines = async (path: string, lines: readonly string[]): Promise<void> => {
  await writeFile(path, joinLines(lines), "utf8");
};
