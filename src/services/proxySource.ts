import { componentLogger } from "../logger.js";
import { parseScutilProxy } from "../parser/proxyParser.js";
import { CommandExecutor, ProxySource } from "../types.js";
import { buildCommand } from "./commandBuilder.js";

const SCUTIL = "/usr/sbin/scutil";
const log = componentLogger("proxy");

/**
 * Reads the macOS system proxy configuration once and caches it.
 * The executor given here must not itself consult a proxy source.
 */
export class ScutilProxySource implements ProxySource {
  private cached?: Promise<Record<string, string>>;

  constructor(
    private readonly runner: CommandExecutor,
    private readonly platform: NodeJS.Platform = process.platform
  ) {}

  environment(): Promise<Record<string, string>> {
    if (!this.cached) {
      this.cached = this.load();
    }
    return this.cached;
  }

  private async load(): Promise<Record<string, string>> {
    if (this.platform !== "darwin") {
      return {};
    }

    try {
      const result = await this.runner.run(buildCommand(SCUTIL, ["--proxy"]));
      if (result.code !== 0) {
        log.debug({ code: result.code }, "scutil --proxy failed; continuing without proxy");
        return {};
      }
      return parseScutilProxy(result.stdout);
    } catch (error) {
      log.debug({ err: error }, "scutil unavailable; continuing without proxy");
      return {};
    }
  }
}

export class StaticProxySource implements ProxySource {
  constructor(private readonly env: Record<string, string> = {}) {}

  async environment(): Promise<Record<string, string>> {
    return { ...this.env };
  }
}
