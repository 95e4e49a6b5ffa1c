import { LaunchFailureError, NonZeroExitError } from "../errors.js";
import { isEmptyResult } from "../parser/emptyResultPolicy.js";
import { parseMasApps, parseOutdatedMasApps, sortByName } from "../parser/masParser.js";
import { CommandExecutor, CommandResult, MasApp, OutdatedMasApp } from "../types.js";
import { buildCommand } from "./commandBuilder.js";

/**
 * Mac App Store operations through the `mas` CLI. Every query returns an
 * empty list when mas is not installed.
 */
export class MasService {
  constructor(
    private readonly runner: CommandExecutor,
    private readonly masPath = "mas"
  ) {}

  async isInstalled(): Promise<boolean> {
    try {
      const result = await this.runner.run(buildCommand("which", [this.masPath]));
      return result.code === 0 && result.stdout.trim().length > 0;
    } catch (error) {
      if (error instanceof LaunchFailureError) {
        return false;
      }
      throw error;
    }
  }

  async getInstalledApps(): Promise<MasApp[]> {
    if (!(await this.isInstalled())) {
      return [];
    }

    const result = await this.mas(["list"]);
    if (result.code !== 0) {
      throw new NonZeroExitError("mas list", result);
    }
    return sortByName(parseMasApps(result.stdout));
  }

  async getOutdatedApps(): Promise<OutdatedMasApp[]> {
    if (!(await this.isInstalled())) {
      return [];
    }

    const result = await this.mas(["outdated"]);
    if (isEmptyResult("masOutdated", result)) {
      return [];
    }
    if (result.code !== 0) {
      throw new NonZeroExitError("mas outdated", result);
    }
    return sortByName(parseOutdatedMasApps(result.stdout));
  }

  async search(query: string): Promise<MasApp[]> {
    if (!query.trim() || !(await this.isInstalled())) {
      return [];
    }

    const result = await this.mas(["search", query]);
    if (isEmptyResult("masSearch", result)) {
      return [];
    }
    if (result.code !== 0) {
      throw new NonZeroExitError("mas search", result);
    }
    return parseMasApps(result.stdout);
  }

  async *install(id: number): AsyncGenerator<string> {
    yield `==> Installing app ${id} from the Mac App Store...\n`;
    yield* this.runner.stream(buildCommand(this.masPath, ["install", String(id)]));
  }

  async *upgradeAll(): AsyncGenerator<string> {
    yield "==> Upgrading Mac App Store apps...\n";
    yield* this.runner.stream(buildCommand(this.masPath, ["upgrade"]));
  }

  private mas(args: string[]): Promise<CommandResult> {
    return this.runner.run(buildCommand(this.masPath, args));
  }
}
