import { constants } from "node:fs";
import { access } from "node:fs/promises";
import { BrewNotInstalledError } from "../errors.js";
import { componentLogger } from "../logger.js";
import { parseBrewVersion } from "../parser/diskUsageParser.js";
import { CommandExecutor } from "../types.js";
import { buildCommand } from "./commandBuilder.js";

export const KNOWN_BREW_PATHS = ["/opt/homebrew/bin/brew", "/usr/local/bin/brew"];

const log = componentLogger("resolver");

export type ExecutableCheck = (path: string) => Promise<boolean>;

export interface PathResolverOptions {
  knownPaths?: readonly string[];
  isExecutable?: ExecutableCheck;
  /** Skips discovery entirely. */
  override?: string;
}

/**
 * Locates the brew executable: known install prefixes first, then `which`.
 * The first answer, found or not, is cached until `invalidate()`.
 */
export class BrewPathResolver {
  private cached?: Promise<string | undefined>;
  private readonly knownPaths: readonly string[];
  private readonly isExecutable: ExecutableCheck;

  constructor(
    private readonly runner: CommandExecutor,
    private readonly options: PathResolverOptions = {}
  ) {
    this.knownPaths = options.knownPaths ?? KNOWN_BREW_PATHS;
    this.isExecutable = options.isExecutable ?? isExecutableFile;
  }

  resolve(): Promise<string | undefined> {
    if (!this.cached) {
      this.cached = this.discover();
    }
    return this.cached;
  }

  async require(): Promise<string> {
    const path = await this.resolve();
    if (!path) {
      throw new BrewNotInstalledError();
    }
    return path;
  }

  invalidate(): void {
    this.cached = undefined;
  }

  async isInstalled(): Promise<boolean> {
    return (await this.resolve()) !== undefined;
  }

  async prefix(): Promise<string | undefined> {
    const brewPath = await this.resolve();
    if (!brewPath) {
      return undefined;
    }

    const result = await this.runner.run(buildCommand(brewPath, ["--prefix"]));
    const prefix = result.stdout.trim();
    if (result.code === 0 && prefix) {
      return prefix;
    }

    if (brewPath.startsWith("/opt/homebrew")) {
      return "/opt/homebrew";
    }
    if (brewPath.startsWith("/usr/local")) {
      return "/usr/local";
    }
    return undefined;
  }

  async version(): Promise<string | undefined> {
    const brewPath = await this.resolve();
    if (!brewPath) {
      return undefined;
    }

    const result = await this.runner.run(buildCommand(brewPath, ["--version"]));
    return result.code === 0 ? parseBrewVersion(result.stdout) : undefined;
  }

  private async discover(): Promise<string | undefined> {
    if (this.options.override) {
      return this.options.override;
    }

    for (const candidate of this.knownPaths) {
      if (await this.isExecutable(candidate)) {
        log.debug({ path: candidate }, "brew found at known path");
        return candidate;
      }
    }

    try {
      const result = await this.runner.run(buildCommand("which", ["brew"]));
      const found = result.stdout.trim();
      if (result.code === 0 && found) {
        log.debug({ path: found }, "brew found on PATH");
        return found;
      }
    } catch (error) {
      log.debug({ err: error }, "which brew failed");
    }

    return undefined;
  }
}

async function isExecutableFile(path: string): Promise<boolean> {
  try {
    await access(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}
