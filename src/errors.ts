import type { CommandResult } from "./types.js";

export enum BrewErrorCode {
  LAUNCH_FAILURE = "launch_failure",
  NON_ZERO_EXIT = "non_zero_exit",
  MALFORMED_OUTPUT = "malformed_output",
  BREW_NOT_INSTALLED = "brew_not_installed",
  PACKAGE_NOT_FOUND = "package_not_found",
  INVALID_CONFIG = "invalid_config"
}

export class BrewError extends Error {
  public readonly code: BrewErrorCode;

  constructor(message: string, code: BrewErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "BrewError";
    this.code = code;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code
    };
  }

  static invalidConfig(detail: string): BrewError {
    return new BrewError(`Invalid configuration: ${detail}`, BrewErrorCode.INVALID_CONFIG);
  }
}

/**
 * The executable could not be started at all (missing, not executable).
 * Never produced for a process that ran and then exited non-zero.
 */
export class LaunchFailureError extends BrewError {
  public readonly executable: string;
  public readonly systemCode?: string;

  constructor(executable: string, cause: unknown) {
    const systemCode = systemErrorCode(cause);
    super(
      `Failed to launch ${executable}${systemCode ? ` (${systemCode})` : ""}`,
      BrewErrorCode.LAUNCH_FAILURE,
      { cause }
    );
    this.name = "LaunchFailureError";
    this.executable = executable;
    this.systemCode = systemCode;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), executable: this.executable, systemCode: this.systemCode };
  }
}

export class NonZeroExitError extends BrewError {
  public readonly exitCode: number;
  public readonly stderr: string;

  constructor(operation: string, result: CommandResult) {
    const detail = result.stderr.trim() || result.stdout.trim() || `${operation} failed`;
    super(detail, BrewErrorCode.NON_ZERO_EXIT);
    this.name = "NonZeroExitError";
    this.exitCode = result.code;
    this.stderr = result.stderr;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), exitCode: this.exitCode, stderr: this.stderr };
  }
}

export class MalformedOutputError extends BrewError {
  public readonly operation: string;

  constructor(operation: string, detail: string, cause?: unknown) {
    super(`Unexpected output from ${operation}: ${detail}`, BrewErrorCode.MALFORMED_OUTPUT, { cause });
    this.name = "MalformedOutputError";
    this.operation = operation;
  }
}

export class BrewNotInstalledError extends BrewError {
  constructor() {
    super("Homebrew is not installed. Visit https://brew.sh to install it.", BrewErrorCode.BREW_NOT_INSTALLED);
    this.name = "BrewNotInstalledError";
  }
}

export class PackageNotFoundError extends BrewError {
  public readonly packageName: string;

  constructor(packageName: string) {
    super(`Package '${packageName}' not found`, BrewErrorCode.PACKAGE_NOT_FOUND);
    this.name = "PackageNotFoundError";
    this.packageName = packageName;
  }
}

export function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function systemErrorCode(error: unknown): string | undefined {
  if (error && typeof error === "object" && "code" in error) {
    const { code } = error;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}
