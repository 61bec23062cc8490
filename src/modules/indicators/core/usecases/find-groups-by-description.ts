/**
 * Select indicator groups by a pattern over their display name.
 */

import { err, ok, type Result } from 'neverthrow';

import { createInvalidGroupPatternError, type GroupSelectionError } from '../errors.js';

import type { RegistryClient } from '../ports.js';

export interface FindGroupsByDescriptionDeps {
  registry: RegistryClient;
}

const compilePattern = (description: string): Result<RegExp, GroupSelectionError> => {
  try {
    return ok(new RegExp(description, 'i'));
  } catch (error) {
    return err(createInvalidGroupPatternError(description, error));
  }
};

/**
 * Ids of the indicator groups whose display name matches `description`, a
 * case-insensitive regular expression searched anywhere in the name, in
 * registry order. A blank description matches nothing.
 */
export const findGroupsByDescription = async (
  deps: FindGroupsByDescriptionDeps,
  description: string
): Promise<Result<string[], GroupSelectionError>> => {
  const source = description.trim();
  if (source === '') {
    return ok([]);
  }

  const patternResult = compilePattern(source);
  if (patternResult.isErr()) {
    return err(patternResult.error);
  }
  const pattern = patternResult.value;

  const groupsResult = await deps.registry.listIndicatorGroups();
  return groupsResult.map((groups) =>
    groups.filter((group) => pattern.test(group.displayName)).map((group) => group.id)
  );
};
