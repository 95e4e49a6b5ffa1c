import { describe, expect, it } from "vitest";
import { flattenTree, indentLevel, parseDependencyTree } from "../src/parser/dependencyTreeParser.js";

describe("parseDependencyTree", () => {
  it("rebuilds three levels from brew deps --tree", () => {
    const output = [
      "ffmpeg",
      "├── aom",
      "│   ├── jpeg-xl",
      "│   │   └── brotli",
      "│   └── libvmaf",
      "└── dav1d",
      ""
    ].join("\n");

    expect(parseDependencyTree(output, "ffmpeg")).toEqual({
      packageName: "ffmpeg",
      dependencies: [
        {
          name: "aom",
          children: [
            { name: "jpeg-xl", children: [{ name: "brotli", children: [] }] },
            { name: "libvmaf", children: [] }
          ]
        },
        { name: "dav1d", children: [] }
      ]
    });
  });

  it("reads space-indented continuation under a last child", () => {
    const output = ["wget", "└── openssl@3", "    └── ca-certificates"].join("\n");

    expect(parseDependencyTree(output, "wget").dependencies).toEqual([
      { name: "openssl@3", children: [{ name: "ca-certificates", children: [] }] }
    ]);
  });

  it("returns no dependencies for a leaf formula", () => {
    expect(parseDependencyTree("jq\n", "jq")).toEqual({ packageName: "jq", dependencies: [] });
    expect(parseDependencyTree("", "jq")).toEqual({ packageName: "jq", dependencies: [] });
  });

  it("measures indentation in four-character units", () => {
    expect(indentLevel("wget")).toBe(0);
    expect(indentLevel("├── aom")).toBe(1);
    expect(indentLevel("│   └── brotli")).toBe(2);
  });

  it("flattens a tree into unique names", () => {
    const tree = parseDependencyTree(["a", "├── b", "│   └── c", "└── c"].join("\n"), "a");

    expect(flattenTree(tree.dependencies)).toEqual(["b", "c"]);
  });
});
