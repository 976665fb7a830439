import { getLogger } from '@invariant-objects/logger';
import { err, ok, type Result } from 'neverthrow';

import { RequirementError } from './requirement-error.js';
import type { Violation } from './types.js';

const logger = getLogger('requirements');

/**
 * Merge the results of any number of rule calls into one validation pass.
 * Returns the aggregated error instead of throwing it.
 */
export function check(...groups: readonly (readonly Violation[])[]): Result<void, RequirementError> {
  const error = RequirementError.collect(groups.flat());
  if (!error) {
    return ok(undefined);
  }

  logger.debug({ errors: error.toRecord() }, 'Object requirements not met');
  return err(error);
}

/**
 * Throw the aggregated error if any rule call reported a violation. Call it
 * in a constructor before the first field is assigned.
 *
 * @throws RequirementError
 */
export function commit(...groups: readonly (readonly Violation[])[]): void {
  const result = check(...groups);
  if (result.isErr()) {
    throw result.error;
  }
}

/**
 * Run a validating constructor and return its requirement failure as a
 * Result. Any other error propagates.
 */
export function attempt<T>(construct: () => T): Result<T, RequirementError> {
  try {
    return ok(construct());
  } catch (error) {
    if (error instanceof RequirementError) {
      return err(error);
    }
    throw error;
  }
}
