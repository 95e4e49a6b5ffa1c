import { access, readdir } from "node:fs/promises";
import { homedir } from "node:os";
import { basename, join } from "node:path";
import { NonZeroExitError } from "../errors.js";
import { componentLogger } from "../logger.js";
import { caskDisplayName } from "../parser/infoParser.js";
import { decodeQuarantineDate, parseCaskAppArtifact } from "../parser/quarantineParser.js";
import { CommandExecutor, QuarantinedApp } from "../types.js";
import { BrewService } from "./brewService.js";
import { buildCommand } from "./commandBuilder.js";

const QUARANTINE_ATTRIBUTE = "com.apple.quarantine";
const log = componentLogger("quarantine");

export interface QuarantineServiceOptions {
  appDirectories?: readonly string[];
  listDirectory?: (path: string) => Promise<string[]>;
  exists?: (path: string) => Promise<boolean>;
}

export class QuarantineService {
  private readonly appDirectories: readonly string[];
  private readonly listDirectory: (path: string) => Promise<string[]>;
  private readonly exists: (path: string) => Promise<boolean>;

  constructor(
    private readonly runner: CommandExecutor,
    private readonly brew: BrewService,
    options: QuarantineServiceOptions = {}
  ) {
    this.appDirectories = options.appDirectories ?? ["/Applications", join(homedir(), "Applications")];
    this.listDirectory = options.listDirectory ?? ((path) => readdir(path));
    this.exists = options.exists ?? pathExists;
  }

  /** Scans the application folders for bundles carrying the quarantine attribute. */
  async getQuarantinedApps(): Promise<QuarantinedApp[]> {
    const casks = await this.brew.getInstalledCasks();
    const caskByName = new Map(casks.map((cask) => [caskDisplayName(cask).toLowerCase(), cask.token]));
    const apps: QuarantinedApp[] = [];

    for (const directory of this.appDirectories) {
      let entries: string[];
      try {
        entries = await this.listDirectory(directory);
      } catch (error) {
        log.debug({ directory, err: error }, "skipping unreadable directory");
        continue;
      }

      for (const entry of entries) {
        if (!entry.endsWith(".app")) {
          continue;
        }

        const appPath = join(directory, entry);
        const result = await this.runner.run(buildCommand("xattr", ["-p", QUARANTINE_ATTRIBUTE, appPath]));
        const attribute = result.stdout.trim();
        if (result.code !== 0 || !attribute) {
          continue;
        }

        const name = basename(entry, ".app");
        apps.push({
          name,
          path: appPath,
          caskName: caskByName.get(name.toLowerCase()),
          quarantineDate: decodeQuarantineDate(attribute)
        });
      }
    }

    return apps;
  }

  async removeQuarantine(appPath: string): Promise<void> {
    const result = await this.runner.run(buildCommand("xattr", ["-dr", QUARANTINE_ATTRIBUTE, appPath]));
    if (result.code !== 0) {
      throw new NonZeroExitError("xattr -dr", result);
    }
  }

  /** Where the cask's app bundle lives, if it is in one of the scanned folders. */
  async getCaskInstallPath(caskName: string): Promise<string | undefined> {
    const info = await this.brew.getCaskInfoText(caskName);
    const appName = info ? parseCaskAppArtifact(info) : undefined;
    if (!appName) {
      return undefined;
    }

    for (const directory of this.appDirectories) {
      const candidate = join(directory, appName);
      if (await this.exists(candidate)) {
        return candidate;
      }
    }
    return undefined;
  }
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}
