import { describe, expect, it } from "vitest";
import { BrewNotInstalledError, LaunchFailureError } from "../src/errors.js";
import { BrewPathResolver } from "../src/services/pathResolver.js";
import { FakeRunner, failed, ok } from "./fakeRunner.js";

describe("BrewPathResolver", () => {
  it("prefers the first executable known path", async () => {
    const runner = new FakeRunner(() => ok());
    const resolver = new BrewPathResolver(runner, {
      knownPaths: ["/a/bin/brew", "/b/bin/brew"],
      isExecutable: async (path) => path === "/b/bin/brew"
    });

    expect(await resolver.resolve()).toBe("/b/bin/brew");
    expect(runner.calls).toHaveLength(0);
  });

  it("falls back to which and caches the answer until invalidated", async () => {
    const runner = new FakeRunner(() => ok("/home/tester/.linuxbrew/bin/brew\n"));
    const resolver = new BrewPathResolver(runner, { knownPaths: [], isExecutable: async () => false });

    expect(await resolver.resolve()).toBe("/home/tester/.linuxbrew/bin/brew");
    expect(await resolver.resolve()).toBe("/home/tester/.linuxbrew/bin/brew");
    expect(runner.calls).toEqual([{ executable: "which", args: ["brew"] }]);

    resolver.invalidate();
    await resolver.resolve();
    expect(runner.calls).toHaveLength(2);
  });

  it("reports brew as missing when which cannot run", async () => {
    const runner = new FakeRunner(() => {
      throw new LaunchFailureError("which", new Error("spawn which ENOENT"));
    });
    const resolver = new BrewPathResolver(runner, { knownPaths: [], isExecutable: async () => false });

    expect(await resolver.isInstalled()).toBe(false);
    await expect(resolver.require()).rejects.toBeInstanceOf(BrewNotInstalledError);
  });

  it("uses an override without looking anywhere", async () => {
    const runner = new FakeRunner(() => ok());
    const resolver = new BrewPathResolver(runner, {
      override: "/custom/bin/brew",
      isExecutable: async () => {
        throw new Error("should not be called");
      }
    });

    expect(await resolver.require()).toBe("/custom/bin/brew");
    expect(runner.calls).toHaveLength(0);
  });

  it("derives the prefix from the path when brew --prefix fails", async () => {
    const runner = new FakeRunner(() => failed("boom"));
    const resolver = new BrewPathResolver(runner, { override: "/opt/homebrew/bin/brew" });

    expect(await resolver.prefix()).toBe("/opt/homebrew");
    expect(runner.calls).toEqual([{ executable: "/opt/homebrew/bin/brew", args: ["--prefix"] }]);
  });

  it("reads the version", async () => {
    const runner = new FakeRunner(() => ok("Homebrew 4.3.5\n"));
    const resolver = new BrewPathResolver(runner, { override: "/usr/local/bin/brew" });

    expect(await resolver.version()).toBe("4.3.5");
  });
});
