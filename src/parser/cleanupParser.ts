import { CleanupResult } from "../types.js";

const REMOVAL_MARKERS = ["Removing:", "Would remove:"];

const SIZE_RE = /(\d+(?:\.\d+)?)\s*(KB|MB|GB|B)/i;

const MULTIPLIERS: Record<string, number> = {
  B: 1,
  KB: 1024,
  MB: 1024 * 1024,
  GB: 1024 * 1024 * 1024
};

/** Finds the first `<number><unit>` in the text and returns whole bytes. */
export function parseByteSize(text: string): number | undefined {
  const match = text.match(SIZE_RE);
  if (!match) {
    return undefined;
  }

  const amount = Number(match[1]);
  const multiplier = MULTIPLIERS[match[2].toUpperCase()];
  if (!Number.isFinite(amount) || multiplier === undefined) {
    return undefined;
  }

  return Math.floor(amount * multiplier);
}

export function parseCleanupOutput(output: string): CleanupResult {
  const result: CleanupResult = {
    bytesFreed: 0,
    formulaeRemoved: [],
    casksRemoved: [],
    downloadsCleaned: 0
  };

  for (const line of output.split(/\r?\n/)) {
    if (REMOVAL_MARKERS.some((marker) => line.includes(marker))) {
      const name = removedPackageName(line);
      if (!name) {
        continue;
      }
      if (line.includes(".rb") || line.includes("Cellar")) {
        result.formulaeRemoved.push(name);
      } else if (line.includes("Caskroom")) {
        result.casksRemoved.push(name);
      }
      continue;
    }

    if (line.includes("downloads")) {
      result.downloadsCleaned += 1;
      continue;
    }

    // "has freed approximately" after a cleanup, "would free approximately" for a dry run.
    if (line.toLowerCase().includes("free")) {
      result.bytesFreed = parseByteSize(line) ?? result.bytesFreed;
    }
  }

  return result;
}

export function isEmptyCleanup(result: CleanupResult): boolean {
  return (
    result.bytesFreed === 0 &&
    result.formulaeRemoved.length === 0 &&
    result.casksRemoved.length === 0 &&
    result.downloadsCleaned === 0
  );
}

const PACKAGE_DIR_RE = /\/(?:Cellar|Caskroom)\/([^/\s]+)/;

function removedPackageName(line: string): string | undefined {
  const dir = line.match(PACKAGE_DIR_RE);
  if (dir) {
    return dir[1];
  }

  const lastSegment = line.split("/").pop() ?? "";
  const name = (lastSegment.split(" ")[0] ?? "").replace(/\.{3}$/, "").replace(/\.rb$/, "");
  return name ? name : undefined;
}
