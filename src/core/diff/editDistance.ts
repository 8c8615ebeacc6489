import type { EditOperation, EditScript } from "../patch/schema.js";

export type Equality<T> = (left: T, right: T) => boolean;

const KEEP = 0;
const ADD = 1;
const REMOVE = 2;

const strictEquals = <T>(left: T, right: T): boolean => left === right;

/**
 * Insert/delete-only edit script turning `source` into `target`.
 *
 * Costs and actions live in flat typed arrays indexed by `i * (n + 1) + j`.
 * When removing and adding cost the same, the cell records a removal, so the
 * script is deterministic for a given pair of inputs.
 */
export const computeEditScript = <T>(
  source: readonly T[],
  target: readonly T[],
  equals: Equality<T> = strictEquals,
): EditScript<T> => {
  const m = source.length;
  const n = target.length;
  const width = n + 1;
  const costs = new Uint32Array((m + 1) * width);
  const actions = new Uint8Array((m + 1) * width);

  for (let j = 1; j <= n; j++) {
    costs[j] = j;
    actions[j] = ADD;
  }
  for (let i = 1; i <= m; i++) {
    costs[i * width] = i;
    actions[i * width] = REMOVE;
  }

  for (let i = 1; i <= m; i++) {
    const row = i * width;
    const previousRow = row - width;
    for (let j = 1; j <= n; j++) {
      if (equals(source[i - 1], target[j - 1])) {
        costs[row + j] = costs[previousRow + j - 1];
        actions[row + j] = KEEP;
        continue;
      }

      const removeCost = costs[previousRow + j] + 1;
      const addCost = costs[row + j - 1] + 1;
      if (addCost < removeCost) {
        costs[row + j] = addCost;
        actions[row + j] = ADD;
      } else {
        costs[row + j] = removeCost;
        actions[row + j] = REMOVE;
      }
    }
  }

  const script: EditOperation<T>[] = [];
  let i = m;
  let j = n;
  while (i > 0 || j > 0) {
    const action = actions[i * width + j];
    if (action === ADD) {
      j -= 1;
      script.push({ type: "add", index: j, value: target[j] });
    } else if (action === REMOVE) {
      i -= 1;
      script.push({ type: "remove", index: i, value: source[i] });
    } else {
      i -= 1;
      j -= 1;
    }
  }
  return script.reverse();
};

export const editDistance = <T>(source: readonly T[], target: readonly T[], equals?: Equality<T>): number =>
  computeEditScript(source, target, equals).length;
