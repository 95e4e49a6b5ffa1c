import { NonZeroExitError } from "../errors.js";
import { parseAnalyticsState, parseDuBytes } from "../parser/diskUsageParser.js";
import { CommandExecutor, CommandResult, DiskUsageInfo } from "../types.js";
import { buildCommand } from "./commandBuilder.js";
import { BrewPathResolver } from "./pathResolver.js";

export class DiagnosticsService {
  constructor(
    private readonly runner: CommandExecutor,
    private readonly resolver: BrewPathResolver
  ) {}

  async getDiskUsage(): Promise<DiskUsageInfo> {
    const cache = await this.brew(["--cache"]);
    if (cache.code !== 0) {
      throw new NonZeroExitError("brew --cache", cache);
    }

    const [cacheSize, cellarSize, caskroomSize] = await Promise.all([
      this.sizeOf(cache.stdout.trim()),
      this.sizeOfBrewDirectory("--cellar"),
      this.sizeOfBrewDirectory("--caskroom")
    ]);

    return {
      cacheSize,
      cellarSize,
      caskroomSize,
      totalSize: cacheSize + cellarSize + caskroomSize
    };
  }

  async getAnalyticsStatus(): Promise<boolean> {
    const result = await this.brew(["analytics", "state"]);
    if (result.code !== 0) {
      throw new NonZeroExitError("brew analytics state", result);
    }
    return parseAnalyticsState(result.stdout);
  }

  async setAnalytics(enabled: boolean): Promise<void> {
    const result = await this.brew(["analytics", enabled ? "on" : "off"]);
    if (result.code !== 0) {
      throw new NonZeroExitError("brew analytics", result);
    }
  }

  private async sizeOfBrewDirectory(flag: "--cellar" | "--caskroom"): Promise<number> {
    const result = await this.brew([flag]);
    const path = result.stdout.trim();
    return result.code === 0 && path ? this.sizeOf(path) : 0;
  }

  private async sizeOf(path: string): Promise<number> {
    const result = await this.runner.run(buildCommand("du", ["-sk", path]));
    return result.code === 0 ? parseDuBytes(result.stdout) : 0;
  }

  private async brew(args: string[]): Promise<CommandResult> {
    const brewPath = await this.resolver.require();
    return this.runner.run(buildCommand(brewPath, args));
  }
}
