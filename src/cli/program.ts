import { Command } from "commander";
import { runDiff } from "./commands/diff.js";
import { runHelp } from "./commands/help.js";
import { runPatch } from "./commands/patch.js";
import { PROGRAM_NAME, SUBCOMMANDS, formatUsage, type Subcommand } from "./subcommands.js";

export type ExitCodeSink = (code: number) => void;

const setProcessExitCode: ExitCodeSink = (code) => {
  process.exitCode = code;
};

export const printHelp = (lines: string[], exitCode: number, setExitCode: ExitCodeSink = setProcessExitCode): void => {
  const print = exitCode === 0 ? console.log : console.error;
  lines.forEach((line) => print(line));
  setExitCode(exitCode);
};

export const createProgram = (version: string, setExitCode: ExitCodeSink = setProcessExitCode): Command => {
  const program = new Command();
  program.name(PROGRAM_NAME).description("Line-level diff and patch").version(version).helpCommand(false);

  const registerSubcommand = (subcommand: Subcommand): void => {
    switch (subcommand.kind) {
      case "diff":
        program
          .command("diff")
          .description(subcommand.description)
          .argument("[file1]", "Original file")
          .argument("[file2]", "Changed file")
          .option("-o, --output <file>", "Write the patch to a file instead of stdout")
          .action(async (file1: string | undefined, file2: string | undefined, options: { output?: string }) => {
            const result = await runDiff({ oldFile: file1, newFile: file2, output: options.output });
            if (options.output === undefined) {
              process.stdout.write(result.patch);
              return;
            }
            console.log(`Wrote ${result.script.length} patch actions to ${options.output}`);
          });
        return;
      case "patch":
        program
          .command("patch")
          .description(subcommand.description)
          .argument("[file]", "File to patch in place")
          .argument("[patchFile]", "Patch produced by `diff`")
          .option("-o, --output <file>", "Write the patched lines to a file instead of overwriting <file>")
          .option("--verify", "Fail when a removed line differs from the one recorded in the patch", false)
          .action(
            async (
              file: string | undefined,
              patchFile: string | undefined,
              options: { output?: string; verify: boolean },
            ) => {
              const result = await runPatch({ file, patchFile, output: options.output, verify: options.verify });
              console.log(`Patched ${result.path}: ${result.removed} removed, ${result.added} added`);
            },
          );
        return;
      case "help":
        program
          .command("help")
          .description(subcommand.description)
          .argument("[subcommand]", "Subcommand to describe")
          .action((name: string | undefined) => {
            const result = runHelp(name);
            printHelp(result.lines, result.exitCode, setExitCode);
          });
        return;
      default: {
        const unreachable: never = subcommand.kind;
        throw new Error(`Unhandled subcommand ${String(unreachable)}`);
      }
    }
  };

  SUBCOMMANDS.forEach(registerSubcommand);

  program
    .argument("[subcommand]")
    .argument("[args...]")
    .action((name: string | undefined) => {
      if (name === undefined) {
        printHelp([...formatUsage(), "ERROR: no subcommand is provided"], 1, setExitCode);
        return;
      }
      printHelp(runHelp(name).lines, 1, setExitCode);
    });

  return program;
};
