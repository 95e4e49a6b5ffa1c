#!/usr/bin/env node
import { loadConfig } from "./config.js";
import { messageOf } from "./errors.js";
import { createTaproom, Taproom } from "./index.js";
import { entriesOfType } from "./parser/brewfileParser.js";
import { isEmptyCleanup } from "./parser/cleanupParser.js";
import { flattenTree } from "./parser/dependencyTreeParser.js";
import { BrewfileEntryType, DependencyNode, PackageKind } from "./types.js";

interface CliArgs {
  command: string;
  operands: string[];
  kind: PackageKind;
  dryRun: boolean;
  flat: boolean;
  debug: boolean;
}

const BREWFILE_TYPES: readonly BrewfileEntryType[] = ["tap", "brew", "cask", "mas", "vscode"];

const USAGE = `usage: taproom <command> [args]

  list                       installed formulae and casks
  outdated                   packages with newer versions
  search <query>             search formulae and casks
  info <name> [--cask]       package details
  deps <name> [--flat]       dependency tree, or every dependency once
  uses <name>                installed dependents
  pinned                     pinned formulae
  doctor                     brew doctor findings
  cleanup [--dry-run]        remove old versions
  services                   brew services
  taps                       installed taps
  install <names...> [--cask]
  uninstall <names...> [--cask]
  upgrade [names...]
  brewfile [type]            Brewfile entries for this machine
  mas list|outdated          Mac App Store apps
  quarantine                 apps carrying the quarantine attribute

  --debug                    log engine activity to stderr`;

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  const config = loadConfig();
  const taproom = createTaproom(args.debug ? { ...config, logLevel: "debug" } : config);
  await runCommand(taproom, args);
}

function parseArgs(argv: string[]): CliArgs {
  const operands: string[] = [];
  let kind: PackageKind = "formula";
  let dryRun = false;
  let flat = false;
  let debug = false;

  for (const arg of argv) {
    if (arg === "--cask") {
      kind = "cask";
      continue;
    }
    if (arg === "--dry-run") {
      dryRun = true;
      continue;
    }
    if (arg === "--flat") {
      flat = true;
      continue;
    }
    if (arg === "--debug") {
      debug = true;
      continue;
    }
    operands.push(arg);
  }

  const [command = "help", ...rest] = operands;
  return { command, operands: rest, kind, dryRun, flat, debug };
}

async function runCommand(taproom: Taproom, args: CliArgs): Promise<void> {
  const { brew } = taproom;
  const name = args.operands[0];

  switch (args.command) {
    case "list": {
      const [formulae, casks] = await Promise.all([brew.getInstalledFormulae(), brew.getInstalledCasks()]);
      print(formulae.map((formula) => `${formula.name} ${formula.version}${formula.pinned ? " (pinned)" : ""}`));
      print(casks.map((cask) => `${cask.token} ${cask.version} (cask)`));
      return;
    }
    case "outdated": {
      const outdated = await brew.getOutdated();
      print(outdated.map((pkg) => `${pkg.name} ${pkg.installedVersion} -> ${pkg.currentVersion}`));
      return;
    }
    case "search": {
      const results = await brew.search(args.operands.join(" "));
      print(["==> Formulae", ...results.formulae, "", "==> Casks", ...results.casks]);
      return;
    }
    case "info": {
      const info =
        args.kind === "cask" ? await brew.getCaskInfo(required(name)) : await brew.getFormulaInfo(required(name));
      print([JSON.stringify(info, null, 2)]);
      return;
    }
    case "deps": {
      const tree = await brew.getDependencyTree(required(name));
      print(args.flat ? flattenTree(tree.dependencies) : [tree.packageName, ...renderTree(tree.dependencies, "")]);
      return;
    }
    case "uses":
      print(await brew.getDependents(required(name)));
      return;
    case "pinned":
      print(await brew.getPinnedPackages());
      return;
    case "doctor": {
      const issues = await brew.doctor();
      print(issues.length === 0 ? ["Your system is ready to brew."] : issues.map((i) => `[${i.severity}] ${i.category}: ${i.message}`));
      return;
    }
    case "cleanup": {
      const result = await brew.cleanup(args.dryRun);
      if (isEmptyCleanup(result)) {
        print(["Nothing to clean up."]);
        return;
      }
      print([
        `formulae removed: ${result.formulaeRemoved.length}`,
        `casks removed: ${result.casksRemoved.length}`,
        `bytes freed: ${result.bytesFreed}`
      ]);
      return;
    }
    case "services": {
      const services = await brew.getServices();
      print(services.map((service) => `${service.name} ${service.status}`));
      return;
    }
    case "taps": {
      const taps = await brew.getTaps();
      print(taps.map((tap) => `${tap.name} (${tap.formulaCount} formulae, ${tap.caskCount} casks)`));
      return;
    }
    case "install":
      await pipe(brew.installMultiple(requiredList(args.operands), args.kind));
      return;
    case "uninstall":
      await pipe(brew.uninstallMultiple(requiredList(args.operands), args.kind));
      return;
    case "upgrade":
      await pipe(args.operands.length > 0 ? brew.upgradeMultiple(args.operands) : brew.upgrade());
      return;
    case "brewfile": {
      const parsed = await brew.parseExportedBrewfile();
      const type = BREWFILE_TYPES.find((candidate) => candidate === name);
      const entries = type ? entriesOfType(parsed, type) : parsed.entries;
      print(entries.map((entry) => `${entry.type} ${entry.name}${entry.description ? ` - ${entry.description}` : ""}`));
      return;
    }
    case "mas": {
      if (name === "outdated") {
        const apps = await taproom.mas.getOutdatedApps();
        print(apps.map((app) => `${app.id} ${app.name} ${app.installedVersion} -> ${app.availableVersion}`));
        return;
      }
      const apps = await taproom.mas.getInstalledApps();
      print(apps.map((app) => `${app.id} ${app.name} ${app.version}`));
      return;
    }
    case "quarantine": {
      const apps = await taproom.quarantine.getQuarantinedApps();
      print(apps.map((app) => `${app.path}${app.quarantineDate ? ` ${app.quarantineDate.toISOString()}` : ""}`));
      return;
    }
    default:
      print([USAGE]);
  }
}

function renderTree(nodes: DependencyNode[], indent: string): string[] {
  return nodes.flatMap((node, index) => {
    const last = index === nodes.length - 1;
    return [
      `${indent}${last ? "└── " : "├── "}${node.name}`,
      ...renderTree(node.children, `${indent}${last ? "    " : "│   "}`)
    ];
  });
}

async function pipe(stream: AsyncIterable<string>): Promise<void> {
  for await (const chunk of stream) {
    process.stdout.write(chunk);
  }
}

function print(lines: string[]): void {
  if (lines.length > 0) {
    process.stdout.write(`${lines.join("\n")}\n`);
  }
}

function required(value: string | undefined): string {
  if (!value) {
    throw new Error("missing package name");
  }
  return value;
}

function requiredList(values: string[]): string[] {
  if (values.length === 0) {
    throw new Error("missing package names");
  }
  return values;
}

main().catch((error) => {
  // eslint-disable-next-line no-console
  console.error(`taproom failed: ${messageOf(error)}`);
  process.exit(1);
});
