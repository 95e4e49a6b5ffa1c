import { DEFAULT_PATH_PREFIXES } from "../config.js";
import { CommandSpec } from "../types.js";

export function buildCommand(
  executable: string,
  args: readonly string[],
  extraEnv: Record<string, string> = {}
): CommandSpec {
  return Object.freeze({
    executable,
    args: Object.freeze([...args]),
    env: Object.freeze({ ...extraEnv })
  });
}

/**
 * Merges the child environment: base, then proxy settings, then caller
 * overrides. PATH always gains the package-manager prefixes in front.
 */
export function buildEnvironment(
  base: NodeJS.ProcessEnv,
  proxyEnv: Record<string, string>,
  overrides: Readonly<Record<string, string>>,
  pathPrefixes: readonly string[] = DEFAULT_PATH_PREFIXES
): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(base)) {
    if (value !== undefined) {
      env[key] = value;
    }
  }

  Object.assign(env, proxyEnv, overrides);

  const prefix = pathPrefixes.join(":");
  if (prefix) {
    env.PATH = env.PATH ? `${prefix}:${env.PATH}` : prefix;
  }

  return env;
}

export function describeCommand(spec: CommandSpec): string {
  return [spec.executable, ...spec.args].join(" ");
}
