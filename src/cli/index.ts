#!/usr/bin/env node
import { existsSync, readFileSync } from "fs";
import { dirname, join } from "path";
import { fileURLToPath } from "url";
import { createProgram } from "./program.js";
import { formatError } from "./report.js";

const __dirname = dirname(fileURLToPath(import.meta.url));
const pkgPath = [join(__dirname, "../../../package.json"), join(__dirname, "../../package.json")].find(
  (p) => existsSync(p),
);
if (pkgPath === undefined) {
  throw new Error("Unable to locate package.json");
}
const pkg = JSON.parse(readFileSync(pkgPath, "utf-8")) as { name: string; version: string };

const runCli = async (): Promise<void> => {
  await createProgram(pkg.version).parseAsync(process.argv);
};

runCli().catch((error: unknown) => {
  formatError(error).forEach((line) => console.error(line));
  process.exitCode = 1;
});
