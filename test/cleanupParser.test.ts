import { describe, expect, it } from "vitest";
import { isEmptyCleanup, parseByteSize, parseCleanupOutput } from "../src/parser/cleanupParser.js";

describe("parseByteSize", () => {
  it("uses 1024-based units", () => {
    expect(parseByteSize("512B")).toBe(512);
    expect(parseByteSize("2.5KB")).toBe(2560);
    expect(parseByteSize("3MB")).toBe(3145728);
    expect(parseByteSize("1GB")).toBe(1073741824);
  });

  it("accepts lower case units and a space", () => {
    expect(parseByteSize("freed 4 kb")).toBe(4096);
  });

  it("returns undefined without a size", () => {
    expect(parseByteSize("nothing here")).toBeUndefined();
  });
});

describe("parseCleanupOutput", () => {
  it("sorts removed packages into formulae and casks", () => {
    const output = [
      "Removing: /opt/homebrew/Cellar/node/21.1.0... (2,100 files, 60MB)",
      "Removing: /opt/homebrew/Caskroom/firefox/119.0... (1 file, 120MB)",
      "Removing: /Users/tester/Library/Caches/Homebrew/wget--1.21.4.rb... (4KB)",
      "Removing old downloads",
      "==> This operation has freed approximately 180.5MB of disk space."
    ].join("\n");

    expect(parseCleanupOutput(output)).toEqual({
      bytesFreed: 189267968,
      formulaeRemoved: ["node", "wget--1.21.4"],
      casksRemoved: ["firefox"],
      downloadsCleaned: 1
    });
  });

  it("reads the freed size from a summary line", () => {
    expect(parseCleanupOutput("Freed 512B").bytesFreed).toBe(512);
    expect(parseCleanupOutput("Freed 2.5KB").bytesFreed).toBe(2560);
    expect(parseCleanupOutput("Freed 3MB").bytesFreed).toBe(3145728);
    expect(parseCleanupOutput("Freed 1GB").bytesFreed).toBe(1073741824);
  });

  it("reads what a dry run would remove and free", () => {
    const output = [
      "Would remove: /opt/homebrew/Cellar/wget/1.21.4 (90 files, 4.3MB)",
      "Would remove: /opt/homebrew/Caskroom/firefox/118.0 (1 file, 120MB)",
      "==> This operation would free approximately 52.3MB of disk space."
    ].join("\n");

    expect(parseCleanupOutput(output)).toEqual({
      bytesFreed: 54840524,
      formulaeRemoved: ["wget"],
      casksRemoved: ["firefox"],
      downloadsCleaned: 0
    });
  });

  it("recognises an empty cleanup", () => {
    expect(isEmptyCleanup(parseCleanupOutput(""))).toBe(true);
  });
});
