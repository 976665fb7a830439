export { RequirementType, type BuiltInRequirementType, type NamedValues, type Predicate, type Rule, type Violation } from './types.js';
export { checkRule, defineRule, notEmpty, notNull, positive, type Lengthy } from './rules.js';
export { RequirementError, parseRenderedRequirements, type RequirementLine, type RequirementMap } from './requirement-error.js';
export { attempt, check, commit } from './commit.js';
