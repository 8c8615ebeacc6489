import { editDistance } from "../core/diff/editDistance.js";

export const PROGRAM_NAME = "linediff";
const SUGGESTION_DISTANCE = 3;

export type SubcommandKind = "diff" | "patch" | "help";

export interface Subcommand {
  kind: SubcommandKind;
  signature: string;
  description: string;
}

export const SUBCOMMANDS: readonly Subcommand[] = [
  { kind: "diff", signature: "<file1> <file2>", description: "print the difference between the files to stdout" },
  { kind: "patch", signature: "<file> <file.patch>", description: "patch the file with the given patch" },
  { kind: "help", signature: "[subcommand]", description: "print this help message" },
];

export const findSubcommand = (name: string): Subcommand | undefined =>
  SUBCOMMANDS.find((subcommand) => subcommand.kind === name);

export const subcommandUsage = (subcommand: Subcommand): string =>
  `Usage: ${PROGRAM_NAME} ${subcommand.kind} ${subcommand.signature}`;

export const formatUsage = (): string[] => {
  const commands = SUBCOMMANDS.map((subcommand) => `${subcommand.kind} ${subcommand.signature}`);
  const width = Math.max(...commands.map((command) => command.length));
  return [
    `Usage: ${PROGRAM_NAME} <SUBCOMMAND> [OPTIONS]`,
    "Subcommands:",
    ...SUBCOMMANDS.map((subcommand, idx) => `    ${commands[idx].padEnd(width)}    ${subcommand.description}`),
  ];
};

/** Subcommand names within a small character-level edit distance of `name`. */
export const suggestSubcommands = (name: string): SubcommandKind[] =>
  SUBCOMMANDS.filter((subcommand) => editDistance([...name], [...subcommand.kind]) < SUGGESTION_DISTANCE).map(
    (subcommand) => subcommand.kind,
  );

export const unknownSubcommandReport = (name: string): string[] => {
  const lines = [...formatUsage(), `ERROR: unknown subcommand ${name}`];
  const candidates = suggestSubcommands(name);
  if (candidates.length > 0) {
    lines.push("Maybe you meant:", ...candidates.map((candidate) => `    ${candidate}`));
  }
  return lines;
};
