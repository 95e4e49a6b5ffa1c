import { SearchResults } from "../types.js";

const FORMULAE_HEADING = "==> Formulae";
const CASKS_HEADING = "==> Casks";
const HEADING_MARKER = "==>";

/**
 * Parses `brew search --formulae --casks <query>`. Names before any
 * heading belong to the formula section.
 */
export function parseSearchResults(output: string): SearchResults {
  const formulae = new Set<string>();
  const casks = new Set<string>();
  let section = formulae;

  for (const line of output.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed) {
      continue;
    }

    if (trimmed.startsWith(FORMULAE_HEADING)) {
      section = formulae;
      continue;
    }
    if (trimmed.startsWith(CASKS_HEADING)) {
      section = casks;
      continue;
    }
    if (trimmed.startsWith(HEADING_MARKER)) {
      continue;
    }

    for (const name of trimmed.split(/\s+/)) {
      section.add(name);
    }
  }

  return { formulae: [...formulae], casks: [...casks] };
}
