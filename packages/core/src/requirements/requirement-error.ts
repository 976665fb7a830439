import { DomainError } from '../errors/index.js';

import type { RequirementType, Violation } from './types.js';

export type RequirementMap = ReadonlyMap<string, ReadonlySet<RequirementType>>;

/** One rendered line: an attribute and the requirements it failed. */
export interface RequirementLine {
  readonly attribute: string;
  readonly requirements: RequirementType[];
}

function groupViolations(violations: Iterable<Violation>): Map<string, Set<RequirementType>> {
  const grouped = new Map<string, Set<RequirementType>>();

  for (const { attribute, requirement } of violations) {
    const requirements = grouped.get(attribute);
    if (requirements) {
      requirements.add(requirement);
    } else {
      grouped.set(attribute, new Set([requirement]));
    }
  }

  return grouped;
}

/**
 * Every requirement that failed during one validation pass, grouped by
 * attribute. There is no empty instance: `collect` returns `undefined` when
 * nothing failed.
 */
export class RequirementError extends DomainError {
  readonly code = 'REQUIREMENT_VIOLATED';
  readonly errors: RequirementMap;

  private constructor(errors: Map<string, Set<RequirementType>>) {
    super(`Object requirements not met: ${[...errors.keys()].join(', ')}`);
    this.errors = errors;
  }

  static collect(violations: Iterable<Violation>): RequirementError | undefined {
    const grouped = groupViolations(violations);
    return grouped.size > 0 ? new RequirementError(grouped) : undefined;
  }

  get attributes(): string[] {
    return [...this.errors.keys()];
  }

  has(attribute: string, requirement?: RequirementType): boolean {
    const requirements = this.errors.get(attribute);
    if (!requirements) return false;
    return requirement === undefined || requirements.has(requirement);
  }

  /** Flatten back into individual violations, in grouping order. */
  violations(): Violation[] {
    return [...this.errors].flatMap(([attribute, requirements]) =>
      [...requirements].map((requirement) => ({ attribute, requirement }))
    );
  }

  /** Union of both errors. Duplicated (attribute, requirement) pairs appear once. */
  merge(other: RequirementError): RequirementError {
    return new RequirementError(groupViolations([...this.violations(), ...other.violations()]));
  }

  toRecord(): Record<string, RequirementType[]> {
    return Object.fromEntries([...this.errors].map(([attribute, requirements]) => [attribute, [...requirements]]));
  }

  /** One `attribute: requirement, requirement` line per attribute. */
  render(): string {
    return [...this.errors].map(([attribute, requirements]) => `${attribute}: ${[...requirements].join(', ')}`).join('\n');
  }

  override toString(): string {
    return this.render();
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), errors: this.toRecord() };
  }
}

/** Re-group text produced by `RequirementError.render`. */
export function parseRenderedRequirements(text: string): RequirementLine[] {
  return text
    .split('\n')
    .filter((line) => line.trim().length > 0)
    .map((line) => {
      const separator = line.indexOf(': ');
      if (separator < 0) {
        return { attribute: line.trim(), requirements: [] };
      }
      return {
        attribute: line.slice(0, separator),
        requirements: line
          .slice(separator + 2)
          .split(', ')
          .filter((requirement) => requirement.length > 0),
      };
    });
}
