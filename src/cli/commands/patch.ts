import { readFile } from "node:fs/promises";
import { PatchParseError, UsageError } from "../../core/errors.js";
import { readLines, writeLines } from "../../core/io/lineFile.js";
import { applyPatch, countOperations } from "../../core/patch/patchApplier.js";
import { decodePatch } from "../../core/patch/patchCodec.js";

export interface RunPatchOptions {
  file?: string;
  patchFile?: string;
  output?: string;
  verify?: boolean;
}

export interface RunPatchResult {
  path: string;
  added: number;
  removed: number;
  lineCount: number;
}

export const runPatch = async (options: RunPatchOptions): Promise<RunPatchResult> => {
  const { file, patchFile } = options;
  if (file === undefined || patchFile === undefined) {
    throw new UsageError("patch", "not enough arguments were provided to patch");
  }

  const [lines, patchText] = await Promise.all([readLines(file), readFile(patchFile, "utf8")]);
  const decoded = decodePatch(patchText);
  if (!decoded.ok) {
    throw new PatchParseError(decoded.errors, patchFile);
  }

  const patched = applyPatch(lines, decoded.script, { verifyRemovals: Boolean(options.verify) });
  const path = options.output ?? file;
  await writeLines(path, patched);
  return { path, ...countOperations(decoded.script), lineCount: patched.length };
};
