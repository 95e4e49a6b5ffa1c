export type PackageKind = "formula" | "cask";

export interface CommandSpec {
  readonly executable: string;
  readonly args: readonly string[];
  readonly env: Readonly<Record<string, string>>;
}

export interface CommandResult {
  code: number;
  stdout: string;
  stderr: string;
}

export type AbandonPolicy = "detach" | "terminate";

export interface StreamOptions {
  /**
   * What happens to the child when the consumer stops iterating early.
   * `detach` only drops the read listeners and lets the process finish on its own.
   */
  onAbandon?: AbandonPolicy;
}

export interface CommandExecutor {
  run(spec: CommandSpec): Promise<CommandResult>;
  stream(spec: CommandSpec, options?: StreamOptions): AsyncIterable<string>;
}

export interface ProxySource {
  environment(): Promise<Record<string, string>>;
}

export interface Formula {
  name: string;
  fullName: string;
  version: string;
  description?: string;
  homepage?: string;
  installedAsDependency: boolean;
  installedOnRequest: boolean;
  dependencies: string[];
  installedOn?: Date;
  pinned: boolean;
}

export interface Cask {
  token: string;
  fullToken: string;
  names: string[];
  version: string;
  description?: string;
  homepage?: string;
  installed: boolean;
}

export interface OutdatedPackage {
  name: string;
  installedVersion: string;
  currentVersion: string;
  kind: PackageKind;
  pinned: boolean;
}

export interface SearchResults {
  formulae: string[];
  casks: string[];
}

export type DiagnosticSeverity = "warning" | "error";

export interface DiagnosticIssue {
  category: string;
  message: string;
  severity: DiagnosticSeverity;
}

export interface CleanupResult {
  bytesFreed: number;
  formulaeRemoved: string[];
  casksRemoved: string[];
  downloadsCleaned: number;
}

export interface DependencyNode {
  name: string;
  children: DependencyNode[];
}

export interface DependencyTree {
  packageName: string;
  dependencies: DependencyNode[];
}

export type ServiceStatus = "started" | "stopped" | "error" | "unknown" | "scheduled" | "none";

export type ServiceAction = "start" | "stop" | "restart";

export interface ServiceInfo {
  name: string;
  status: ServiceStatus;
  user?: string;
  file?: string;
  exitCode?: number;
}

export interface TapInfo {
  name: string;
  user: string;
  repo: string;
  path: string;
  remote?: string;
  official: boolean;
  formulaCount: number;
  caskCount: number;
  commandCount: number;
}

export interface MasApp {
  id: number;
  name: string;
  version: string;
}

export interface OutdatedMasApp {
  id: number;
  name: string;
  installedVersion: string;
  availableVersion: string;
}

export interface QuarantinedApp {
  name: string;
  path: string;
  caskName?: string;
  quarantineDate?: Date;
}

export interface DiskUsageInfo {
  cacheSize: number;
  cellarSize: number;
  caskroomSize: number;
  totalSize: number;
}

export type BrewfileEntryType = "tap" | "brew" | "cask" | "mas" | "vscode";

export interface BrewfileEntry {
  type: BrewfileEntryType;
  name: string;
  description?: string;
  options: Record<string, string | number | boolean>;
  lineNumber: number;
}

export interface ParsedBrewfile {
  entries: BrewfileEntry[];
  warnings: string[];
}

export interface InstallSnapshot {
  formulae: Formula[];
  casks: Cask[];
  outdated: OutdatedPackage[];
  pinned: string[];
}
