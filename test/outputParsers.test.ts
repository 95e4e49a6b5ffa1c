import { describe, expect, it } from "vitest";
import { parseAnalyticsState, parseBrewVersion, parseDuBytes } from "../src/parser/diskUsageParser.js";
import { classifyDoctorLine, parseDoctorOutput } from "../src/parser/doctorParser.js";
import { parseMasApps, parseOutdatedMasApps, sortByName } from "../src/parser/masParser.js";
import { parseScutilProxy } from "../src/parser/proxyParser.js";
import { parseSearchResults } from "../src/parser/searchParser.js";

describe("parseSearchResults", () => {
  it("splits names by section heading", () => {
    const output = ["==> Formulae", "wget", "wget2", "", "==> Casks", "wgetcloud"].join("\n");

    expect(parseSearchResults(output)).toEqual({ formulae: ["wget", "wget2"], casks: ["wgetcloud"] });
  });

  it("puts names before any heading in formulae and drops duplicates", () => {
    expect(parseSearchResults("jq jq\ngojq")).toEqual({ formulae: ["jq", "gojq"], casks: [] });
  });
});

describe("parseDoctorOutput", () => {
  it("groups detail lines under the preceding warning", () => {
    const output = [
      "Please note that these warnings are just used to help the Homebrew maintainers",
      "",
      "Warning: Unbrewed dylibs were found in /usr/local/lib.",
      "  /usr/local/lib/libfoo.dylib",
      "  /usr/local/lib/libbar.dylib",
      "",
      "Error: Your Command Line Tools are too outdated."
    ].join("\n");

    expect(parseDoctorOutput(output)).toEqual([
      { category: "Unbrewed dylibs were found in /usr/local/lib.", message: "/usr/local/lib/libfoo.dylib", severity: "warning" },
      { category: "Unbrewed dylibs were found in /usr/local/lib.", message: "/usr/local/lib/libbar.dylib", severity: "warning" },
      { category: "Error", message: "Your Command Line Tools are too outdated.", severity: "error" }
    ]);
  });

  it("closes the warning category at an error line", () => {
    const output = [
      "Warning: Unbrewed dylibs were found.",
      "  /usr/local/lib/a.dylib",
      "Error: broken thing",
      "  trailing detail"
    ].join("\n");

    expect(parseDoctorOutput(output)).toEqual([
      { category: "Unbrewed dylibs were found.", message: "/usr/local/lib/a.dylib", severity: "warning" },
      { category: "Error", message: "broken thing", severity: "error" }
    ]);
  });

  it("returns nothing for a healthy system", () => {
    expect(parseDoctorOutput("Your system is ready to brew.\n")).toEqual([]);
  });

  it("classifies each kind of line", () => {
    expect(classifyDoctorLine("   ")).toEqual({ kind: "blank" });
    expect(classifyDoctorLine("Please update")).toEqual({ kind: "footer" });
    expect(classifyDoctorLine("Warning: x")).toEqual({ kind: "warning", category: "x" });
  });
});

describe("mas output", () => {
  it("parses installed apps and skips other lines", () => {
    const output = ["497799835  Xcode (15.4)", "==> Listing apps", "409183694  Keynote   (14.0)"].join("\n");

    expect(parseMasApps(output)).toEqual([
      { id: 497799835, name: "Xcode", version: "15.4" },
      { id: 409183694, name: "Keynote", version: "14.0" }
    ]);
  });

  it("parses outdated apps", () => {
    expect(parseOutdatedMasApps("497799835 Xcode (15.3 -> 15.4)")).toEqual([
      { id: 497799835, name: "Xcode", installedVersion: "15.3", availableVersion: "15.4" }
    ]);
  });

  it("sorts by name ignoring case", () => {
    const sorted = sortByName([
      { id: 1, name: "pages", version: "1" },
      { id: 2, name: "Keynote", version: "1" }
    ]);

    expect(sorted.map((app) => app.name)).toEqual(["Keynote", "pages"]);
  });
});

describe("parseScutilProxy", () => {
  it("maps enabled proxies and exceptions to environment variables", () => {
    const output = [
      "<dictionary> {",
      "  ExceptionsList : <array> {",
      "    0 : *.local",
      "    1 : 169.254/16",
      "  }",
      "  HTTPEnable : 1",
      "  HTTPPort : 8080",
      "  HTTPProxy : proxy.example.test",
      "  HTTPSEnable : 0",
      "  HTTPSPort : 8443",
      "  HTTPSProxy : proxy.example.test",
      "}"
    ].join("\n");

    expect(parseScutilProxy(output)).toEqual({
      HTTP_PROXY: "http://proxy.example.test:8080",
      http_proxy: "http://proxy.example.test:8080",
      NO_PROXY: "*.local,169.254/16",
      no_proxy: "*.local,169.254/16"
    });
  });

  it("returns nothing without proxies", () => {
    expect(parseScutilProxy("<dictionary> {\n}")).toEqual({});
  });
});

describe("diagnostics output", () => {
  it("converts du kilobytes to bytes", () => {
    expect(parseDuBytes("2048\t/opt/homebrew/Cellar\n")).toBe(2097152);
    expect(parseDuBytes("du: cannot access")).toBe(0);
  });

  it("reads the brew version", () => {
    expect(parseBrewVersion("Homebrew 4.3.5\nHomebrew/homebrew-core (git revision 1)")).toBe("4.3.5");
    expect(parseBrewVersion("")).toBeUndefined();
  });

  it("reads the analytics state", () => {
    expect(parseAnalyticsState("InfluxDB analytics are enabled.")).toBe(true);
    expect(parseAnalyticsState("InfluxDB analytics are disabled.")).toBe(false);
  });
});
