import { MasApp, OutdatedMasApp } from "../types.js";

const APP_RE = /^(\d+)\s+(.+?)\s+\((.+?)\)$/;
const OUTDATED_RE = /^(\d+)\s+(.+?)\s+\((.+?)\s+->\s+(.+?)\)$/;

/**
 * `mas list` / `mas search` rows: `497799835  Xcode (15.4)`.
 * Banner and summary lines share the stream and are skipped.
 */
export function parseMasApps(output: string): MasApp[] {
  const apps: MasApp[] = [];

  for (const line of output.split(/\r?\n/)) {
    const match = line.trim().match(APP_RE);
    if (!match) {
      continue;
    }
    apps.push({ id: Number(match[1]), name: match[2], version: match[3] });
  }

  return apps;
}

/** `mas outdated` rows: `497799835  Xcode (15.3 -> 15.4)`. */
export function parseOutdatedMasApps(output: string): OutdatedMasApp[] {
  const apps: OutdatedMasApp[] = [];

  for (const line of output.split(/\r?\n/)) {
    const match = line.trim().match(OUTDATED_RE);
    if (!match) {
      continue;
    }
    apps.push({
      id: Number(match[1]),
      name: match[2],
      installedVersion: match[3],
      availableVersion: match[4]
    });
  }

  return apps;
}

export function sortByName<T extends { name: string }>(apps: T[]): T[] {
  return [...apps].sort((a, b) => a.name.localeCompare(b.name, undefined, { sensitivity: "base" }));
}
