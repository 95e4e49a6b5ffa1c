import { z } from "zod";
import { BrewError } from "./errors.js";

export const DEFAULT_PATH_PREFIXES = ["/opt/homebrew/bin", "/usr/local/bin"];

const flag = z
  .string()
  .optional()
  .transform((value) => value === "1" || value?.toLowerCase() === "true");

const EnvSchema = z.object({
  TAPROOM_LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("silent"),
  TAPROOM_BREW_PATH: z.string().min(1).optional(),
  TAPROOM_MAS_PATH: z.string().min(1).default("mas"),
  TAPROOM_PATH_PREFIXES: z
    .string()
    .optional()
    .transform((value) =>
      value ? value.split(":").map((entry) => entry.trim()).filter(Boolean) : DEFAULT_PATH_PREFIXES
    ),
  TAPROOM_DISABLE_PROXY: flag
});

export type LogLevel = z.infer<typeof EnvSchema>["TAPROOM_LOG_LEVEL"];

export interface TaproomConfig {
  logLevel: LogLevel;
  brewPath?: string;
  masPath: string;
  pathPrefixes: string[];
  proxyEnabled: boolean;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): TaproomConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw BrewError.invalidConfig(detail);
  }

  const values = parsed.data;
  return {
    logLevel: values.TAPROOM_LOG_LEVEL,
    brewPath: values.TAPROOM_BREW_PATH,
    masPath: values.TAPROOM_MAS_PATH,
    pathPrefixes: values.TAPROOM_PATH_PREFIXES,
    proxyEnabled: !values.TAPROOM_DISABLE_PROXY
  };
}
