import type { EditOperation, ParseError } from "./patch/schema.js";

export class UsageError extends Error {
  code = "USAGE";

  constructor(
    public readonly subcommand: string,
    message: string,
  ) {
    super(message);
    this.name = "UsageError";
  }
}

export class PatchParseError extends Error {
  code = "PATCH_PARSE";

  constructor(
    public readonly errors: ParseError[],
    public readonly source = "<patch>",
  ) {
    super(`${errors.length} invalid patch line(s) in ${source}`);
    this.name = "PatchParseError";
  }
}

export class ApplyIndexError extends Error {
  code = "APPLY_INDEX";

  constructor(
    public readonly operation: EditOperation<unknown>,
    public readonly length: number,
  ) {
    const tag = operation.type === "add" ? "A" : "R";
    super(`Patch action ${tag} ${operation.index} is out of range for ${length} line(s)`);
    this.name = "ApplyIndexError";
  }
}

export class RemovedLineMismatchError extends Error {
  code = "REMOVED_LINE_MISMATCH";

  constructor(
    public readonly index: number,
    public readonly expected: string,
    public readonly actual: string,
  ) {
    super(`Line ${index} does not match the patch: expected ${JSON.stringify(expected)}, found ${JSON.stringify(actual)}`);
    this.name = "RemovedLineMismatchError";
  }
}
