import { CommandResult } from "../types.js";

export type EmptyResultOperation =
  | "pinned"
  | "dependents"
  | "installedCasks"
  | "search"
  | "masOutdated"
  | "masSearch"
  | "leaves";

interface EmptyResultRule {
  /** Output phrases that mean "nothing to report". */
  phrases: readonly string[];
  /** A non-zero exit with empty stdout counts as empty. */
  emptyStdoutOnFailure: boolean;
  /** Any non-zero exit counts as empty. */
  anyFailure: boolean;
  /** The phrases also apply to successful runs. */
  appliesOnSuccess: boolean;
}

/**
 * Call sites where the external tool reports "no results" the same way it
 * reports some failures. Everything outside this table treats a non-zero
 * exit as an error.
 */
export const EMPTY_RESULT_POLICY: Readonly<Record<EmptyResultOperation, EmptyResultRule>> = {
  pinned: { phrases: ["No pinned"], emptyStdoutOnFailure: true, anyFailure: false, appliesOnSuccess: false },
  dependents: { phrases: ["No formulae"], emptyStdoutOnFailure: true, anyFailure: false, appliesOnSuccess: false },
  installedCasks: {
    phrases: ["No casks to list"],
    emptyStdoutOnFailure: true,
    anyFailure: false,
    appliesOnSuccess: true
  },
  search: {
    phrases: ["No formulae or casks found"],
    emptyStdoutOnFailure: false,
    anyFailure: false,
    appliesOnSuccess: false
  },
  masOutdated: { phrases: [], emptyStdoutOnFailure: true, anyFailure: false, appliesOnSuccess: false },
  masSearch: { phrases: ["No results found"], emptyStdoutOnFailure: false, anyFailure: false, appliesOnSuccess: false },
  leaves: { phrases: [], emptyStdoutOnFailure: true, anyFailure: true, appliesOnSuccess: false }
};

export function isEmptyResult(operation: EmptyResultOperation, result: CommandResult): boolean {
  const rule = EMPTY_RESULT_POLICY[operation];
  const mentionsEmpty = rule.phrases.some(
    (phrase) => result.stdout.includes(phrase) || result.stderr.includes(phrase)
  );
  const stdoutEmpty = result.stdout.trim().length === 0;

  if (result.code === 0) {
    return rule.appliesOnSuccess && (stdoutEmpty || mentionsEmpty);
  }

  return rule.anyFailure || mentionsEmpty || (rule.emptyStdoutOnFailure && stdoutEmpty);
}
