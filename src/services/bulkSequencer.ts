import { messageOf } from "../errors.js";

export interface BulkVerbs {
  /** Banner verb: "Installing". */
  progressive: string;
  /** Success line verb: "installed". */
  past: string;
  /** Error line verb: "uninstalling". */
  gerund: string;
}

export function bannerLine(verbs: BulkVerbs, item: string): string {
  return `==> ${verbs.progressive} ${item}...`;
}

/**
 * Runs one streaming operation per item, strictly one after another, and
 * yields a banner before each item's output. Generated lines end in "\n" and
 * always start on a fresh line, even when an item's output stopped mid-line.
 * An item whose stream fails becomes an error line; exit status of a started
 * stream is not inspected.
 */
export async function* sequenceStreams(
  items: readonly string[],
  verbs: BulkVerbs,
  operation: (item: string) => AsyncIterable<string>
): AsyncGenerator<string> {
  let atLineStart = true;
  const line = (text: string): string => {
    const out = atLineStart ? `${text}\n` : `\n${text}\n`;
    atLineStart = true;
    return out;
  };

  for (const item of items) {
    yield line(bannerLine(verbs, item));
    try {
      for await (const chunk of operation(item)) {
        if (chunk) {
          atLineStart = chunk.endsWith("\n");
        }
        yield chunk;
      }
    } catch (error) {
      yield line(`Error ${verbs.gerund} ${item}: ${messageOf(error)}`);
    }
  }
}

/**
 * Runs one awaited operation per item. A failing item becomes an error line
 * and the remaining items still run.
 */
export async function* sequenceTasks(
  items: readonly string[],
  verbs: BulkVerbs,
  operation: (item: string) => Promise<unknown>
): AsyncGenerator<string> {
  for (const item of items) {
    yield `${bannerLine(verbs, item)}\n`;
    try {
      await operation(item);
      yield `Successfully ${verbs.past} ${item}\n`;
    } catch (error) {
      yield `Error ${verbs.gerund} ${item}: ${messageOf(error)}\n`;
    }
  }
}

export const INSTALL_VERBS: BulkVerbs = { progressive: "Installing", past: "installed", gerund: "installing" };
export const UNINSTALL_VERBS: BulkVerbs = { progressive: "Uninstalling", past: "uninstalled", gerund: "uninstalling" };
export const UPGRADE_VERBS: BulkVerbs = { progressive: "Upgrading", past: "upgraded", gerund: "upgrading" };
