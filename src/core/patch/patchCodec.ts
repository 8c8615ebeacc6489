import type { DecodeResult, EditOperation, EditScript, ParseError, PatchTag } from "./schema.js";

// `s`: line content may hold \r, \u2028 and \u2029.
const PATCH_LINE_PATTERN = /^([AR]) (\d+) (.*)$/s;

const tagFor = (operation: EditOperation): PatchTag => (operation.type === "add" ? "A" : "R");

export const encodePatchLine = (operation: EditOperation): string =>
  `${tagFor(operation)} ${operation.index} ${operation.value}`;

export const encodePatch = (script: EditScript): string =>
  script.map((operation) => `${encodePatchLine(operation)}\n`).join("");

export const decodePatchLine = (line: string): EditOperation | null => {
  const match = PATCH_LINE_PATTERN.exec(line);
  if (!match) return null;
  const [, tag, digits, value] = match;
  const index = Number.parseInt(digits, 10);
  if (!Number.isSafeInteger(index)) return null;
  return tag === "A" ? { type: "add", index, value } : { type: "remove", index, value };
};

/**
 * Parses patch text. Every malformed line is reported, and no script is
 * returned unless all lines parsed.
 *
 * Only `\n` ends a patch line; a `\r` before it belongs to the line content,
 * as `encodePatch` wrote it.
 */
export const decodePatch = (text: string): DecodeResult => {
  const script: EditScript = [];
  const errors: ParseError[] = [];

  text.split("\n").forEach((line, idx) => {
    if (line.length === 0) return;
    const operation = decodePatchLine(line);
    if (operation === null) {
      errors.push({ lineNumber: idx + 1, rawLine: line });
      return;
    }
    script.push(operation);
  });

  if (errors.length > 0) {
    return { ok: false, errors };
  }
  return { ok: true, script };
};
