import { ApplyIndexError, RemovedLineMismatchError } from "../errors.js";
import type { EditScript } from "./schema.js";

export interface ApplyOptions {
  /** Reject a removal when the line in place differs from the one recorded in the patch. */
  verifyRemovals?: boolean;
}

/**
 * Replays an edit script and returns the patched lines; `lines` is left as is.
 *
 * Removals carry source positions and are applied last-to-first, so each one
 * leaves the lower positions where the script expects them. Additions carry
 * target positions and are applied first-to-last on the remaining lines.
 */
export const applyPatch = <T>(lines: readonly T[], script: EditScript<T>, options: ApplyOptions = {}): T[] => {
  const result = [...lines];

  for (let idx = script.length - 1; idx >= 0; idx--) {
    const operation = script[idx];
    if (operation.type !== "remove") continue;
    if (operation.index < 0 || operation.index >= result.length) {
      throw new ApplyIndexError(operation, result.length);
    }
    const current = result[operation.index];
    if (options.verifyRemovals && current !== operation.value) {
      throw new RemovedLineMismatchError(operation.index, String(operation.value), String(current));
    }
    result.splice(operation.index, 1);
  }

  for (const operation of script) {
    if (operation.type !== "add") continue;
    if (operation.index < 0 || operation.index > result.length) {
      throw new ApplyIndexError(operation, result.length);
    }
    result.splice(operation.index, 0, operation.value);
  }

  return result;
};

export const countOperations = <T>(script: EditScript<T>): { added: number; removed: number } => ({
  added: script.filter((operation) => operation.type === "add").length,
  removed: script.filter((operation) => operation.type === "remove").length,
});
