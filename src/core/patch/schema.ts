export type EditOperation<T = string> =
  | { type: "add"; index: number; value: T }
  | { type: "remove"; index: number; value: T };

/**
 * Operations in ascending position order. Add indices point into the target
 * sequence, Remove indices into the source sequence.
 */
export type EditScript<T = string> = EditOperation<T>[];

export type PatchTag = "A" | "R";

export interface ParseError {
  lineNumber: number;
  rawLine: string;
}

export type DecodeResult =
  | { ok: true; script: EditScript }
  | { ok: false; errors: ParseError[] };
