import { PatchParseError, UsageError } from "../core/errors.js";
import { findSubcommand, subcommandUsage } from "./subcommands.js";

export const formatParseErrors = (error: PatchParseError): string[] =>
  error.errors.map(({ lineNumber, rawLine }) => `${error.source}:${lineNumber}: Invalid patch action: ${rawLine}`);

export const formatError = (error: unknown): string[] => {
  if (error instanceof UsageError) {
    const subcommand = findSubcommand(error.subcommand);
    const usage = subcommand ? [subcommandUsage(subcommand)] : [];
    return [...usage, `ERROR: ${error.message}`];
  }
  if (error instanceof PatchParseError) {
    return formatParseErrors(error);
  }
  if (error instanceof Error) {
    return [error.message];
  }
  return [String(error)];
};
