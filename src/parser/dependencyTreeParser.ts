import { DependencyNode, DependencyTree } from "../types.js";

/** Width of one nesting level: `├── `, `└── `, `│   ` and four spaces. */
export const INDENT_UNIT = 4;

const PREFIX_RE = /^[\s│├└─┬┌|`+-]*/;
const BOX_GLYPHS_RE = /[│├└─┬┌]/g;

interface Line {
  level: number;
  name: string;
}

interface Cursor {
  index: number;
}

/**
 * Rebuilds the hierarchy printed by `brew deps --tree <name>`:
 *
 * ```
 * wget
 * ├── libidn2
 * │   └── libunistring
 * └── openssl@3
 *     └── ca-certificates
 * ```
 *
 * The first line is the root itself. Empty or single-line output yields a
 * tree with no dependencies.
 */
export function parseDependencyTree(output: string, packageName: string): DependencyTree {
  const lines = output
    .split(/\r?\n/)
    .filter((line) => line.trim().length > 0)
    .map(toLine);

  if (lines.length <= 1) {
    return { packageName, dependencies: [] };
  }

  const rootLevel = lines[0].level;
  const cursor: Cursor = { index: 1 };
  return { packageName, dependencies: parseChildren(lines, cursor, rootLevel) };
}

export function indentLevel(line: string): number {
  return Math.floor(prefixOf(line).length / INDENT_UNIT);
}

export function flattenTree(nodes: DependencyNode[]): string[] {
  const seen = new Set<string>();
  const walk = (list: DependencyNode[]): void => {
    for (const node of list) {
      seen.add(node.name);
      walk(node.children);
    }
  };
  walk(nodes);
  return [...seen];
}

function parseChildren(lines: Line[], cursor: Cursor, level: number): DependencyNode[] {
  const nodes: DependencyNode[] = [];

  while (cursor.index < lines.length) {
    const line = lines[cursor.index];
    if (line.level <= level) {
      break;
    }

    cursor.index += 1;
    if (line.level !== level + 1) {
      // Deeper than a direct child with no parent in this frame.
      continue;
    }

    const next = lines[cursor.index];
    const children = next !== undefined && next.level > line.level ? parseChildren(lines, cursor, line.level) : [];
    nodes.push({ name: line.name, children });
  }

  return nodes;
}

function toLine(raw: string): Line {
  const prefix = prefixOf(raw);
  return {
    level: Math.floor(prefix.length / INDENT_UNIT),
    name: raw.slice(prefix.length).replace(BOX_GLYPHS_RE, "").trim()
  };
}

function prefixOf(line: string): string {
  return line.match(PREFIX_RE)?.[0] ?? "";
}
