import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { BrewError, BrewErrorCode, NonZeroExitError, PackageNotFoundError, messageOf } from "../errors.js";
import { componentLogger } from "../logger.js";
import { parseBrewfile } from "../parser/brewfileParser.js";
import { parseCleanupOutput } from "../parser/cleanupParser.js";
import { parseDependencyTree } from "../parser/dependencyTreeParser.js";
import { parseDoctorOutput } from "../parser/doctorParser.js";
import { isEmptyResult } from "../parser/emptyResultPolicy.js";
import {
  parseInfoResponse,
  parseOutdatedResponse,
  parseServicesResponse,
  parseTapsResponse
} from "../parser/infoParser.js";
import { parseNameList } from "../parser/listParser.js";
import { parseSearchResults } from "../parser/searchParser.js";
import {
  Cask,
  CleanupResult,
  CommandExecutor,
  CommandResult,
  DependencyTree,
  DiagnosticIssue,
  Formula,
  InstallSnapshot,
  OutdatedPackage,
  PackageKind,
  ParsedBrewfile,
  SearchResults,
  ServiceAction,
  ServiceInfo,
  TapInfo
} from "../types.js";
import {
  INSTALL_VERBS,
  UNINSTALL_VERBS,
  UPGRADE_VERBS,
  sequenceStreams,
  sequenceTasks
} from "./bulkSequencer.js";
import { buildCommand } from "./commandBuilder.js";
import { BrewPathResolver } from "./pathResolver.js";

const log = componentLogger("brew");

export class BrewService {
  constructor(
    private readonly runner: CommandExecutor,
    private readonly resolver: BrewPathResolver = new BrewPathResolver(runner)
  ) {}

  async getInstalledFormulae(): Promise<Formula[]> {
    const result = await this.brewOrThrow("brew info --installed", ["info", "--installed", "--json=v2"]);
    return parseInfoResponse(result.stdout).formulae;
  }

  async getInstalledCasks(): Promise<Cask[]> {
    const result = await this.brew(["info", "--installed", "--cask", "--json=v2"]);
    if (isEmptyResult("installedCasks", result)) {
      return [];
    }
    if (result.code !== 0) {
      throw new NonZeroExitError("brew info --installed --cask", result);
    }
    return parseInfoResponse(result.stdout).casks;
  }

  async search(query: string): Promise<SearchResults> {
    if (!query.trim()) {
      return { formulae: [], casks: [] };
    }

    const result = await this.brew(["search", "--formulae", "--casks", query]);
    if (isEmptyResult("search", result)) {
      return { formulae: [], casks: [] };
    }
    if (result.code !== 0) {
      throw new NonZeroExitError("brew search", result);
    }
    return parseSearchResults(result.stdout);
  }

  async getFormulaInfo(name: string): Promise<Formula> {
    const result = await this.brew(["info", "--json=v2", name]);
    if (result.code !== 0) {
      throw new PackageNotFoundError(name);
    }

    const formula = parseInfoResponse(result.stdout).formulae[0];
    if (!formula) {
      throw new PackageNotFoundError(name);
    }
    return formula;
  }

  async getCaskInfo(name: string): Promise<Cask> {
    const result = await this.brew(["info", "--cask", "--json=v2", name]);
    if (result.code !== 0) {
      throw new PackageNotFoundError(name);
    }

    const cask = parseInfoResponse(result.stdout).casks[0];
    if (!cask) {
      throw new PackageNotFoundError(name);
    }
    return cask;
  }

  /** Plain-text `brew info --cask`, or undefined when brew reports a failure. */
  async getCaskInfoText(name: string): Promise<string | undefined> {
    const result = await this.brew(["info", "--cask", name]);
    return result.code === 0 ? result.stdout : undefined;
  }

  /** Empty string when the package is unknown or its description is missing. */
  async getPackageDescription(name: string, kind: PackageKind): Promise<string> {
    try {
      const info = kind === "cask" ? await this.getCaskInfo(name) : await this.getFormulaInfo(name);
      return info.description ?? "";
    } catch (error) {
      if (error instanceof BrewError && error.code !== BrewErrorCode.BREW_NOT_INSTALLED) {
        log.debug({ name, err: error }, "description lookup failed");
        return "";
      }
      throw error;
    }
  }

  install(name: string, kind: PackageKind): AsyncIterable<string> {
    return this.brewStream(["install", ...caskFlag(kind), name]);
  }

  async uninstall(name: string, kind: PackageKind): Promise<void> {
    await this.brewOrThrow(`brew uninstall ${name}`, ["uninstall", ...caskFlag(kind), name]);
  }

  reinstall(name: string, kind: PackageKind): AsyncIterable<string> {
    return this.brewStream(["reinstall", ...caskFlag(kind), name]);
  }

  /** Upgrades one package, or everything when no name is given. */
  upgrade(name?: string): AsyncIterable<string> {
    return this.brewStream(name ? ["upgrade", name] : ["upgrade"]);
  }

  async getOutdated(): Promise<OutdatedPackage[]> {
    const result = await this.brewOrThrow("brew outdated", ["outdated", "--json=v2"]);
    return parseOutdatedResponse(result.stdout);
  }

  installMultiple(names: readonly string[], kind: PackageKind): AsyncIterable<string> {
    return sequenceStreams(names, INSTALL_VERBS, (name) => this.install(name, kind));
  }

  uninstallMultiple(names: readonly string[], kind: PackageKind): AsyncIterable<string> {
    return sequenceTasks(names, UNINSTALL_VERBS, (name) => this.uninstall(name, kind));
  }

  upgradeMultiple(names: readonly string[]): AsyncIterable<string> {
    return sequenceStreams(names, UPGRADE_VERBS, (name) => this.upgrade(name));
  }

  async cleanup(dryRun = false): Promise<CleanupResult> {
    const args = dryRun ? ["cleanup", "--dry-run"] : ["cleanup"];
    const result = await this.brewOrThrow("brew cleanup", args);
    return parseCleanupOutput(result.stdout);
  }

  /** Removes every cached download, including the latest versions. */
  clearCache(): AsyncIterable<string> {
    return this.brewStream(["cleanup", "--prune=all", "-s"]);
  }

  /**
   * `brew doctor` exits non-zero whenever it has something to say, so the
   * exit code is ignored and both streams are parsed.
   */
  async doctor(): Promise<DiagnosticIssue[]> {
    const result = await this.brew(["doctor"]);
    return parseDoctorOutput(`${result.stdout}\n${result.stderr}`);
  }

  runDoctor(): AsyncIterable<string> {
    return this.brewStream(["doctor"]);
  }

  async getServices(): Promise<ServiceInfo[]> {
    const result = await this.brewOrThrow("brew services list", ["services", "list", "--json"]);
    return parseServicesResponse(result.stdout);
  }

  async controlService(name: string, action: ServiceAction): Promise<void> {
    await this.brewOrThrow(`brew services ${action}`, ["services", action, name]);
  }

  async updateBrewData(): Promise<void> {
    await this.brewOrThrow("brew update", ["update"]);
  }

  async getDependencyTree(name: string): Promise<DependencyTree> {
    const result = await this.brewOrThrow("brew deps --tree", ["deps", "--tree", name]);
    return parseDependencyTree(result.stdout, name);
  }

  async getDependents(name: string): Promise<string[]> {
    return parseNameList("dependents", await this.brew(["uses", "--installed", name]));
  }

  /** Installed formulae that nothing else depends on. */
  async getLeafPackages(): Promise<Set<string>> {
    return new Set(parseNameList("leaves", await this.brew(["leaves"])));
  }

  async exportBrewfile(): Promise<string> {
    const result = await this.brewOrThrow("brew bundle dump", ["bundle", "dump", "--describe", "--file=-"]);
    return result.stdout;
  }

  async parseExportedBrewfile(): Promise<ParsedBrewfile> {
    return parseBrewfile(await this.exportBrewfile());
  }

  async readBrewfile(path: string): Promise<ParsedBrewfile> {
    let content: string;
    try {
      content = await readFile(path, "utf8");
    } catch (error) {
      throw new Error(`Brewfile not found at ${path}: ${messageOf(error)}`, { cause: error });
    }
    return parseBrewfile(content);
  }

  /** Writes the content to a temporary Brewfile, installs from it, then removes it. */
  async *importBrewfile(content: string): AsyncGenerator<string> {
    let dir: string;
    try {
      dir = await mkdtemp(join(tmpdir(), "taproom-"));
    } catch (error) {
      yield `Error: ${messageOf(error)}\n`;
      return;
    }

    try {
      const brewfilePath = join(dir, "Brewfile");
      await writeFile(brewfilePath, content, "utf8");
      yield* this.importBrewfileFromPath(brewfilePath);
    } catch (error) {
      yield `Error: ${messageOf(error)}\n`;
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  }

  importBrewfileFromPath(path: string): AsyncIterable<string> {
    return this.brewStream(["bundle", "install", `--file=${path}`]);
  }

  async getPinnedPackages(): Promise<string[]> {
    return parseNameList("pinned", await this.brew(["list", "--pinned"]));
  }

  async pinPackage(name: string): Promise<void> {
    await this.brewOrThrow("brew pin", ["pin", name]);
  }

  async unpinPackage(name: string): Promise<void> {
    await this.brewOrThrow("brew unpin", ["unpin", name]);
  }

  async getTaps(): Promise<TapInfo[]> {
    const result = await this.brewOrThrow("brew tap-info", ["tap-info", "--json", "--installed"]);
    return parseTapsResponse(result.stdout);
  }

  async getTapInfo(name: string): Promise<TapInfo> {
    const result = await this.brewOrThrow("brew tap-info", ["tap-info", "--json", name]);
    const tap = parseTapsResponse(result.stdout)[0];
    if (!tap) {
      throw new PackageNotFoundError(name);
    }
    return tap;
  }

  async addTap(name: string): Promise<void> {
    await this.brewOrThrow("brew tap", ["tap", name]);
  }

  async removeTap(name: string): Promise<void> {
    await this.brewOrThrow("brew untap", ["untap", name]);
  }

  /** The read-only queries are independent, so they run concurrently. */
  async snapshot(): Promise<InstallSnapshot> {
    const [formulae, casks, outdated, pinned] = await Promise.all([
      this.getInstalledFormulae(),
      this.getInstalledCasks(),
      this.getOutdated(),
      this.getPinnedPackages()
    ]);
    return { formulae, casks, outdated, pinned };
  }

  private async brew(args: string[]): Promise<CommandResult> {
    const brewPath = await this.resolver.require();
    return this.runner.run(buildCommand(brewPath, args));
  }

  private async brewOrThrow(operation: string, args: string[]): Promise<CommandResult> {
    const result = await this.brew(args);
    if (result.code !== 0) {
      throw new NonZeroExitError(operation, result);
    }
    return result;
  }

  private brewStream(args: string[]): AsyncIterable<string> {
    const { runner, resolver } = this;
    return (async function* () {
      const brewPath = await resolver.require();
      yield* runner.stream(buildCommand(brewPath, args));
    })();
  }
}

function caskFlag(kind: PackageKind): string[] {
  return kind === "cask" ? ["--cask"] : [];
}
