import { AttributionError, InvalidRequirementTypeError } from '../errors/index.js';

import { RequirementType, type NamedValues, type Predicate, type Rule, type Violation } from './types.js';

/** Strings, arrays and anything else that reports a length. */
export interface Lengthy {
  readonly length: number;
}

const IDENTIFIER = /^[\p{ID_Start}$_][\p{ID_Continue}$\u200C\u200D]*$/u;

// Rendered errors separate tags with ", " and attributes with line breaks
const TAG_SEPARATORS = /[,\r\n]/;

function assertRenderable(requirement: RequirementType): void {
  if (requirement.trim().length === 0 || TAG_SEPARATORS.test(requirement)) {
    throw new InvalidRequirementTypeError(
      `Requirement tag ${JSON.stringify(requirement)} must be non-blank and contain no commas or line breaks`,
      { additionalContext: { requirement } }
    );
  }
}

function assertAttributed(values: NamedValues<unknown>, requirement: RequirementType): void {
  const attributes = Object.keys(values);

  if (attributes.length === 0) {
    throw new AttributionError(`Rule "${requirement}" was called without any named value`, {
      additionalContext: { requirement },
    });
  }

  const unnamed = attributes.filter((attribute) => !IDENTIFIER.test(attribute));
  if (unnamed.length > 0) {
    throw new AttributionError(
      `Rule "${requirement}" cannot attribute values to ${unnamed.map((key) => JSON.stringify(key)).join(', ')}`,
      { additionalContext: { attributes: unnamed, requirement } }
    );
  }
}

/**
 * Evaluate `predicate` against every named value and return one violation per
 * failing value. All values are checked; nothing short-circuits.
 *
 * @throws AttributionError when a value has no usable attribute name
 * @throws InvalidRequirementTypeError when the tag could not be rendered back
 */
export function checkRule<T>(requirement: RequirementType, predicate: Predicate<T>, values: NamedValues<T>): Violation[] {
  assertRenderable(requirement);
  assertAttributed(values, requirement);

  const violations: Violation[] = [];
  for (const [attribute, value] of Object.entries(values)) {
    if (!predicate(value)) {
      violations.push({ attribute, requirement });
    }
  }
  return violations;
}

export function defineRule<T>(requirement: RequirementType, predicate: Predicate<T>): Rule<T> {
  assertRenderable(requirement);
  return (values) => checkRule(requirement, predicate, values);
}

export const notNull: Rule<unknown> = defineRule<unknown>(RequirementType.MustNotBeNull, (value) => value != null);

export const positive: Rule<number> = defineRule<number>(RequirementType.MustBePositive, (value) => value > 0);

export const notEmpty: Rule<Lengthy | null | undefined> = defineRule<Lengthy | null | undefined>(
  RequirementType.MustNotBeEmpty,
  (value) => value != null && value.length > 0
);
