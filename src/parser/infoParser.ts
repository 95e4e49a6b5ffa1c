import { z } from "zod";
import { MalformedOutputError } from "../errors.js";
import { Cask, Formula, OutdatedPackage, ServiceInfo, ServiceStatus, TapInfo } from "../types.js";

const optionalText = z.string().nullable().optional();

const InstalledSchema = z.object({
  version: z.string(),
  installed_as_dependency: z.boolean().default(false),
  installed_on_request: z.boolean().default(false),
  time: z.number().nullable().optional()
});

const FormulaSchema = z.object({
  name: z.string(),
  full_name: z.string(),
  desc: optionalText,
  homepage: optionalText,
  versions: z.object({ stable: optionalText, head: optionalText }).default({}),
  dependencies: z.array(z.string()).default([]),
  installed: z.array(InstalledSchema).default([]),
  pinned: z.boolean().default(false)
});

// `name` is a list in current brew releases but a bare string in some taps.
const CaskNamesSchema = z
  .union([z.string(), z.array(z.string())])
  .optional()
  .transform((value) => (value === undefined ? [] : typeof value === "string" ? [value] : value));

const CaskSchema = z.object({
  token: z.string(),
  full_token: z.string().optional(),
  name: CaskNamesSchema,
  version: z.string(),
  desc: optionalText,
  homepage: optionalText,
  installed: optionalText
});

const InfoEnvelopeSchema = z.object({
  formulae: z.array(FormulaSchema).default([]),
  casks: z.array(CaskSchema).default([])
});

const OutdatedEntrySchema = z.object({
  name: z.string(),
  installed_versions: z.array(z.string()).default([]),
  current_version: z.string(),
  pinned: z.boolean().default(false)
});

const OutdatedEnvelopeSchema = z.object({
  formulae: z.array(OutdatedEntrySchema).default([]),
  casks: z.array(OutdatedEntrySchema).default([])
});

const ServiceSchema = z.object({
  name: z.string(),
  status: optionalText,
  user: optionalText,
  file: optionalText,
  exit_code: z.number().nullable().optional()
});

const TapSchema = z.object({
  name: z.string(),
  user: z.string(),
  repo: z.string(),
  path: z.string(),
  remote: optionalText,
  official: z.boolean().default(false),
  formula_names: z.array(z.string()).default([]),
  cask_tokens: z.array(z.string()).default([]),
  command_files: z.array(z.string()).default([])
});

const SERVICE_STATUSES: readonly ServiceStatus[] = ["started", "stopped", "error", "unknown", "scheduled", "none"];

export interface InfoResponse {
  formulae: Formula[];
  casks: Cask[];
}

/**
 * Parses JSON text and validates it against a schema. Both a syntax error
 * and a schema mismatch raise MalformedOutputError.
 */
export function decodeJson<S extends z.ZodTypeAny>(operation: string, output: string, schema: S): z.output<S> {
  let raw: unknown;
  try {
    raw = JSON.parse(output);
  } catch (error) {
    throw new MalformedOutputError(operation, "invalid JSON", error);
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .slice(0, 3)
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new MalformedOutputError(operation, detail, parsed.error);
  }

  return parsed.data;
}

/** `brew info --json=v2` (with or without `--installed` / `--cask`). */
export function parseInfoResponse(output: string): InfoResponse {
  const envelope = decodeJson("brew info", output, InfoEnvelopeSchema);
  return {
    formulae: envelope.formulae.map(toFormula),
    casks: envelope.casks.map(toCask)
  };
}

/** `brew outdated --json=v2`, formulae first. */
export function parseOutdatedResponse(output: string): OutdatedPackage[] {
  const envelope = decodeJson("brew outdated", output, OutdatedEnvelopeSchema);
  return [
    ...envelope.formulae.map((entry) => toOutdated(entry, "formula")),
    ...envelope.casks.map((entry) => toOutdated(entry, "cask"))
  ];
}

/** `brew services list --json`. */
export function parseServicesResponse(output: string): ServiceInfo[] {
  return decodeJson("brew services list", output, z.array(ServiceSchema)).map((service) => ({
    name: service.name,
    status: toServiceStatus(service.status),
    user: service.user ?? undefined,
    file: service.file ?? undefined,
    exitCode: service.exit_code ?? undefined
  }));
}

/** `brew tap-info --json [--installed | <name>]`. */
export function parseTapsResponse(output: string): TapInfo[] {
  return decodeJson("brew tap-info", output, z.array(TapSchema)).map((tap) => ({
    name: tap.name,
    user: tap.user,
    repo: tap.repo,
    path: tap.path,
    remote: tap.remote ?? undefined,
    official: tap.official,
    formulaCount: tap.formula_names.length,
    caskCount: tap.cask_tokens.length,
    commandCount: tap.command_files.length
  }));
}

export function toServiceStatus(value: string | null | undefined): ServiceStatus {
  const normalized = value?.toLowerCase();
  return SERVICE_STATUSES.find((status) => status === normalized) ?? "unknown";
}

function toFormula(formula: z.output<typeof FormulaSchema>): Formula {
  const installed: z.output<typeof InstalledSchema> | undefined = formula.installed[0];
  const time = installed?.time;
  return {
    name: formula.name,
    fullName: formula.full_name,
    version: installed?.version ?? formula.versions.stable ?? "unknown",
    description: formula.desc ?? undefined,
    homepage: formula.homepage ?? undefined,
    installedAsDependency: installed?.installed_as_dependency ?? false,
    installedOnRequest: installed?.installed_on_request ?? false,
    dependencies: formula.dependencies,
    installedOn: time != null ? new Date(time * 1000) : undefined,
    pinned: formula.pinned
  };
}

function toCask(cask: z.output<typeof CaskSchema>): Cask {
  return {
    token: cask.token,
    fullToken: cask.full_token ?? cask.token,
    names: cask.name,
    version: cask.installed ?? cask.version,
    description: cask.desc ?? undefined,
    homepage: cask.homepage ?? undefined,
    installed: cask.installed != null
  };
}

function toOutdated(entry: z.output<typeof OutdatedEntrySchema>, kind: OutdatedPackage["kind"]): OutdatedPackage {
  return {
    name: entry.name,
    installedVersion: entry.installed_versions[0] ?? "unknown",
    currentVersion: entry.current_version,
    kind,
    pinned: kind === "formula" ? entry.pinned : false
  };
}

export function caskDisplayName(cask: Cask): string {
  return cask.names[0] ?? cask.token;
}
