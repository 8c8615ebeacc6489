import { findSubcommand, formatUsage, subcommandUsage, unknownSubcommandReport } from "../subcommands.js";

export interface HelpResult {
  lines: string[];
  exitCode: number;
}

export const runHelp = (name?: string): HelpResult => {
  if (name === undefined) {
    return { lines: formatUsage(), exitCode: 0 };
  }

  const subcommand = findSubcommand(name);
  if (subcommand) {
    return { lines: [subcommandUsage(subcommand), `    ${subcommand.description}`], exitCode: 0 };
  }
  return { lines: unknownSubcommandReport(name), exitCode: 1 };
};
