import { describe, expect, it } from "vitest";
import { decodeQuarantineDate, parseCaskAppArtifact } from "../src/parser/quarantineParser.js";

describe("decodeQuarantineDate", () => {
  it("decodes hex seconds counted from 2001-01-01", () => {
    expect(decodeQuarantineDate("0081;5b000000;Safari;00000000-0000-0000-0000-000000000000")).toEqual(
      new Date(2505033856000)
    );
  });

  it("returns undefined for a malformed attribute", () => {
    expect(decodeQuarantineDate("0081")).toBeUndefined();
    expect(decodeQuarantineDate("0081;not-hex;Safari")).toBeUndefined();
    expect(decodeQuarantineDate("")).toBeUndefined();
  });
});

describe("parseCaskAppArtifact", () => {
  it("returns the app bundle listed under Artifacts", () => {
    const info = ["==> firefox: 119.0", "https://www.mozilla.org/firefox/", "==> Artifacts", "Firefox.app (App)"].join("\n");

    expect(parseCaskAppArtifact(info)).toBe("Firefox.app");
  });

  it("returns undefined when the cask has no app", () => {
    expect(parseCaskAppArtifact("==> Artifacts\nfont.ttf (Font)")).toBeUndefined();
  });
});
