/**
 * Built-in requirement tags. Tags name a rule; they carry no message text.
 */
export const RequirementType = {
  MustBePositive: 'must-be-positive',
  MustNotBeEmpty: 'must-not-be-empty',
  MustNotBeNull: 'must-not-be-null',
} as const;

export type BuiltInRequirementType = (typeof RequirementType)[keyof typeof RequirementType];

/**
 * Any requirement tag. Custom rules may introduce their own tags; intersecting
 * `string` keeps editor completion for the built-in ones.
 */
export type RequirementType = BuiltInRequirementType | (string & Record<never, never>);

/** One failed requirement for one attribute. */
export interface Violation {
  readonly attribute: string;
  readonly requirement: RequirementType;
}

/**
 * Values to check, keyed by the attribute they belong to. Build it with
 * object shorthand (`{ name, purchases }`) so each key is the variable's own
 * name.
 */
export type NamedValues<T> = Readonly<Record<string, T>>;

export type Predicate<T> = (value: T) => boolean;

/** A reusable rule: checks every named value and reports the failing ones. */
export type Rule<T> = (values: NamedValues<T>) => Violation[];
