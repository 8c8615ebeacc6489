import { writeFile } from "node:fs/promises";
import { computeEditScript } from "../../core/diff/editDistance.js";
import { UsageError } from "../../core/errors.js";
import { readLines } from "../../core/io/lineFile.js";
import { encodePatch } from "../../core/patch/patchCodec.js";
import type { EditScript } from "../../core/patch/schema.js";

export interface RunDiffOptions {
  oldFile?: string;
  newFile?: string;
  output?: string;
}

export interface RunDiffResult {
  script: EditScript;
  patch: string;
}

export const runDiff = async (options: RunDiffOptions): Promise<RunDiffResult> => {
  const { oldFile, newFile } = options;
  if (oldFile === undefined || newFile === undefined) {
    throw new UsageError("diff", "not enough arguments were provided to diff");
  }

  const [oldLines, newLines] = await Promise.all([readLines(oldFile), readLines(newFile)]);
  const script = computeEditScript(oldLines, newLines);
  const patch = encodePatch(script);
  if (options.output !== undefined) {
    await writeFile(options.output, patch, "utf8");
  }
  return { script, patch };
};
