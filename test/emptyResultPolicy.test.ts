import { describe, expect, it } from "vitest";
import { NonZeroExitError } from "../src/errors.js";
import { isEmptyResult } from "../src/parser/emptyResultPolicy.js";
import { parseLines, parseNameList } from "../src/parser/listParser.js";
import { failed, ok } from "./fakeRunner.js";

describe("isEmptyResult", () => {
  it("matches the phrase on either stream for a failed run", () => {
    expect(isEmptyResult("pinned", failed("", "No pinned formulae"))).toBe(true);
    expect(isEmptyResult("dependents", failed("No formulae found", "x"))).toBe(true);
  });

  it("ignores phrases on success unless the rule says otherwise", () => {
    expect(isEmptyResult("search", ok("No formulae or casks found"))).toBe(false);
    expect(isEmptyResult("installedCasks", ok("No casks to list"))).toBe(true);
    expect(isEmptyResult("installedCasks", ok(""))).toBe(true);
  });

  it("does not treat an unrelated failure as empty", () => {
    expect(isEmptyResult("search", failed("Error: network unreachable"))).toBe(false);
    expect(isEmptyResult("masSearch", failed("", ""))).toBe(false);
  });

  it("treats any failure of brew leaves as empty", () => {
    expect(isEmptyResult("leaves", failed("Error: boom", "partial"))).toBe(true);
  });
});

describe("parseNameList", () => {
  it("returns trimmed non-empty lines", () => {
    expect(parseLines("  node \n\npython@3.12\n")).toEqual(["node", "python@3.12"]);
    expect(parseNameList("dependents", ok("curl\nwget\n"))).toEqual(["curl", "wget"]);
  });

  it("throws for failures outside the empty rule", () => {
    expect(() => parseNameList("dependents", failed("Error: No available formula", "partial"))).toThrow(
      NonZeroExitError
    );
  });
});
