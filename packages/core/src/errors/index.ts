/**
 * Error hierarchy shared by the requirement engine and immutable values.
 *
 * Every error carries a stable `code` so outer layers can branch on it
 * without `instanceof` checks across package boundaries.
 */

export interface ErrorContext {
  additionalContext?: Record<string, unknown> | undefined;
}

export abstract class DomainError extends Error {
  abstract readonly code: string;

  readonly context?: Record<string, unknown> | undefined;

  constructor(message: string, context?: ErrorContext) {
    super(message);
    this.name = this.constructor.name;
    this.context = context?.additionalContext;
  }

  toJSON(): Record<string, unknown> {
    return {
      code: this.code,
      context: this.context,
      message: this.message,
      name: this.name,
    };
  }
}

/**
 * Raised when a rule is called with values whose attribute names cannot be
 * reported, e.g. an empty object or the index keys of an array.
 */
export class AttributionError extends DomainError {
  readonly code = 'ATTRIBUTION_FAILED';
}

export class ItemNotFoundError extends DomainError {
  readonly code = 'ITEM_NOT_FOUND';
}

export class InvalidRequirementTypeError extends DomainError {
  readonly code = 'INVALID_REQUIREMENT_TYPE';
}
