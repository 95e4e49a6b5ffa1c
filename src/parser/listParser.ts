import { NonZeroExitError } from "../errors.js";
import { CommandResult } from "../types.js";
import { EmptyResultOperation, isEmptyResult } from "./emptyResultPolicy.js";

export function parseLines(output: string): string[] {
  return output
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter(Boolean);
}

/**
 * One name per line (`brew list --pinned`, `brew uses`, `brew leaves`),
 * with the operation's empty-result rule applied before the exit code.
 */
export function parseNameList(operation: EmptyResultOperation, result: CommandResult): string[] {
  if (isEmptyResult(operation, result)) {
    return [];
  }

  if (result.code !== 0) {
    throw new NonZeroExitError(operation, result);
  }

  return parseLines(result.stdout);
}
