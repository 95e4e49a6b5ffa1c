import { spawn } from "node:child_process";
import { LaunchFailureError } from "../errors.js";
import { componentLogger } from "../logger.js";
import { AbandonPolicy, CommandExecutor, CommandResult, CommandSpec, ProxySource, StreamOptions } from "../types.js";
import { buildEnvironment, describeCommand } from "./commandBuilder.js";
import { OutputChannel } from "./outputChannel.js";

const log = componentLogger("runner");

export interface ProcessRunnerOptions {
  proxy?: ProxySource;
  pathPrefixes?: readonly string[];
  baseEnv?: NodeJS.ProcessEnv;
}

/**
 * Runs commands as argument vectors, never through a shell.
 */
export class ProcessRunner implements CommandExecutor {
  private readonly proxy?: ProxySource;
  private readonly pathPrefixes?: readonly string[];
  private readonly baseEnv: NodeJS.ProcessEnv;

  constructor(options: ProcessRunnerOptions = {}) {
    this.proxy = options.proxy;
    this.pathPrefixes = options.pathPrefixes;
    this.baseEnv = options.baseEnv ?? process.env;
  }

  async run(spec: CommandSpec): Promise<CommandResult> {
    const env = await this.environment(spec);
    const startedAt = Date.now();

    return new Promise((resolve, reject) => {
      const child = spawn(spec.executable, [...spec.args], { env, stdio: ["ignore", "pipe", "pipe"] });
      let stdout = "";
      let stderr = "";
      let spawned = false;

      child.stdout.setEncoding("utf8");
      child.stderr.setEncoding("utf8");

      // Both pipes drain concurrently so neither can fill and stall the child.
      child.stdout.on("data", (chunk: string) => {
        stdout += chunk;
      });

      child.stderr.on("data", (chunk: string) => {
        stderr += chunk;
      });

      child.on("spawn", () => {
        spawned = true;
      });

      child.on("error", (error) => {
        if (!spawned) {
          log.debug({ command: describeCommand(spec), err: error }, "launch failed");
          reject(new LaunchFailureError(spec.executable, error));
          return;
        }
        log.warn({ command: describeCommand(spec), err: error }, "child process error");
      });

      child.on("close", (code) => {
        const result = { code: code ?? 1, stdout, stderr };
        log.debug(
          { command: describeCommand(spec), code: result.code, durationMs: Date.now() - startedAt },
          "command finished"
        );
        resolve(result);
      });
    });
  }

  stream(spec: CommandSpec, options: StreamOptions = {}): AsyncIterable<string> {
    const policy = options.onAbandon ?? "detach";
    return {
      [Symbol.asyncIterator]: () => this.open(spec, policy)
    };
  }

  private open(spec: CommandSpec, policy: AbandonPolicy): AsyncIterableIterator<string> {
    let abandoned = false;
    let detach: (() => void) | undefined;

    const channel = new OutputChannel<string>(() => {
      abandoned = true;
      detach?.();
    });

    const start = async (): Promise<void> => {
      const env = await this.environment(spec);
      if (abandoned) {
        return;
      }

      const child = spawn(spec.executable, [...spec.args], { env, stdio: ["ignore", "pipe", "pipe"] });
      let spawned = false;
      const forward = (chunk: string): void => channel.push(chunk);

      child.stdout.setEncoding("utf8");
      child.stderr.setEncoding("utf8");
      child.stdout.on("data", forward);
      child.stderr.on("data", forward);

      detach = () => {
        child.stdout.off("data", forward);
        child.stderr.off("data", forward);
        // Keep the pipes flowing so a detached child never blocks on a full buffer.
        child.stdout.resume();
        child.stderr.resume();
        if (policy === "terminate" && child.exitCode === null) {
          child.kill("SIGTERM");
        }
        log.debug({ command: describeCommand(spec), policy }, "stream abandoned");
      };

      child.on("spawn", () => {
        spawned = true;
        log.debug({ command: describeCommand(spec), pid: child.pid }, "stream started");
      });

      child.on("error", (error) => {
        if (!spawned) {
          channel.fail(new LaunchFailureError(spec.executable, error));
          return;
        }
        log.warn({ command: describeCommand(spec), err: error }, "child process error");
      });

      child.on("close", (code) => {
        log.debug({ command: describeCommand(spec), code }, "stream finished");
        channel.close();
      });
    };

    start().catch((error: unknown) => channel.fail(error));
    return channel;
  }

  private async environment(spec: CommandSpec): Promise<Record<string, string>> {
    const proxyEnv = this.proxy ? await this.proxy.environment() : {};
    return buildEnvironment(this.baseEnv, proxyEnv, spec.env, this.pathPrefixes);
  }
}
