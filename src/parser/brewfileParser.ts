import { BrewfileEntry, BrewfileEntryType, ParsedBrewfile } from "../types.js";

const ENTRY_RE = /^(tap|brew|cask|vscode)\s+"([^"]+)"(?:\s*,\s*(.+))?$/;
const MAS_RE = /^mas\s+"([^"]+)"\s*,\s*id:\s*(\d+)(?:\s*,\s*(.+))?$/;

type OptionValue = BrewfileEntry["options"][string];

/**
 * Parses a Brewfile as written by `brew bundle dump --describe`: a `# ...`
 * comment directly above an entry is that entry's description.
 */
export function parseBrewfile(content: string): ParsedBrewfile {
  const lines = content.split(/\r?\n/);
  const entries: BrewfileEntry[] = [];
  const warnings: string[] = [];
  let pendingDescription: string | undefined;

  for (let i = 0; i < lines.length; i += 1) {
    const line = (lines[i] ?? "").trim();
    const lineNumber = i + 1;

    if (!line) {
      pendingDescription = undefined;
      continue;
    }

    if (line.startsWith("#")) {
      pendingDescription = line.slice(1).trim() || undefined;
      continue;
    }

    const description = pendingDescription;
    pendingDescription = undefined;

    const entry = line.match(ENTRY_RE);
    if (entry) {
      entries.push({
        type: toEntryType(entry[1]),
        name: entry[2],
        description,
        options: parseOptions(entry[3]),
        lineNumber
      });
      continue;
    }

    const mas = line.match(MAS_RE);
    if (mas) {
      entries.push({
        type: "mas",
        name: mas[1],
        description,
        options: { ...parseOptions(mas[3]), id: Number(mas[2]) },
        lineNumber
      });
      continue;
    }

    warnings.push(`Line ${lineNumber}: Unsupported or malformed line`);
  }

  return { entries, warnings };
}

export function entriesOfType(parsed: ParsedBrewfile, type: BrewfileEntryType): BrewfileEntry[] {
  return parsed.entries.filter((entry) => entry.type === type);
}

function toEntryType(keyword: string): BrewfileEntryType {
  switch (keyword) {
    case "tap":
      return "tap";
    case "cask":
      return "cask";
    case "vscode":
      return "vscode";
    default:
      return "brew";
  }
}

// `restart_service: :changed, link: false` -> { restart_service: "changed", link: false }
function parseOptions(options?: string): Record<string, OptionValue> {
  if (!options) {
    return {};
  }

  const out: Record<string, OptionValue> = {};
  const segments = options.split(",").map((s) => s.trim()).filter(Boolean);

  for (const segment of segments) {
    const [keyPart, ...valueParts] = segment.split(":");
    const key = keyPart?.trim();
    if (!key) {
      continue;
    }
    const value = valueParts.join(":").trim();
    out[key] = value ? toOptionValue(value) : true;
  }

  return out;
}

function toOptionValue(input: string): OptionValue {
  if (input === "true" || input === "false") {
    return input === "true";
  }
  if (/^\d+$/.test(input)) {
    return Number(input);
  }
  if (input.startsWith(":")) {
    return input.slice(1);
  }
  if ((input.startsWith("\"") && input.endsWith("\"")) || (input.startsWith("'") && input.endsWith("'"))) {
    return input.slice(1, -1);
  }
  return input;
}
