import { describe, expect, it } from "vitest";
import { entriesOfType, parseBrewfile } from "../src/parser/brewfileParser.js";

describe("parseBrewfile", () => {
  it("parses brew/cask/tap/mas/vscode lines", () => {
    const brewfile = [
      "tap \"homebrew/cask-fonts\"",
      "brew \"wget\"",
      "cask \"visual-studio-code\"",
      "mas \"Xcode\", id: 497799835",
      "vscode \"dbaeumer.vscode-eslint\""
    ].join("\n");

    const result = parseBrewfile(brewfile);

    expect(result.warnings).toHaveLength(0);
    expect(result.entries.map((entry) => [entry.type, entry.name])).toEqual([
      ["tap", "homebrew/cask-fonts"],
      ["brew", "wget"],
      ["cask", "visual-studio-code"],
      ["mas", "Xcode"],
      ["vscode", "dbaeumer.vscode-eslint"]
    ]);
    expect(result.entries[3]).toMatchObject({ options: { id: 497799835 }, lineNumber: 4 });
  });

  it("attaches a comment to the entry directly below it", () => {
    const brewfile = [
      "# Internet file retriever",
      "brew \"wget\"",
      "# Stranded comment",
      "",
      "brew \"jq\""
    ].join("\n");

    const { entries } = parseBrewfile(brewfile);

    expect(entries[0].description).toBe("Internet file retriever");
    expect(entries[1].description).toBeUndefined();
  });

  it("parses trailing options into typed values", () => {
    const { entries } = parseBrewfile("brew \"postgresql@16\", restart_service: :changed, link: false, priority: 3");

    expect(entries[0].options).toEqual({ restart_service: "changed", link: false, priority: 3 });
  });

  it("reports malformed lines as warnings without stopping", () => {
    const brewfile = ["brew invalid", "brew \"wget\"", "something random"].join("\n");
    const result = parseBrewfile(brewfile);

    expect(result.entries).toHaveLength(1);
    expect(result.warnings).toEqual([
      "Line 1: Unsupported or malformed line",
      "Line 3: Unsupported or malformed line"
    ]);
  });

  it("filters entries by type", () => {
    const parsed = parseBrewfile(["brew \"wget\"", "cask \"firefox\"", "brew \"jq\""].join("\n"));

    expect(entriesOfType(parsed, "brew").map((entry) => entry.name)).toEqual(["wget", "jq"]);
  });
});
