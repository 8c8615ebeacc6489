import { describe, expect, it } from "vitest";
import { findSubcommand, suggestSubcommands } from "../src/cli/subcommands.js";

describe("subcommand registry", () => {
  it("finds subcommands by name", () => {
    expect(findSubcommand("diff")?.signature).toBe("<file1> <file2>");
    expect(findSubcommand("merge")).toBeUndefined();
  });

  it("suggests names within two edits", () => {
    expect(suggestSubcommands("dif")).toEqual(["diff"]);
    expect(suggestSubcommands("halp")).toEqual(["help"]);
    expect(suggestSubcommands("pach")).toEqual(["patch"]);
    expect(suggestSubcommands("xyz")).toEqual([]);
  });
});
