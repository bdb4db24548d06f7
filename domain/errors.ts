/**
 * Domain error model — base and concrete error types.
 * Framework-independent. No business logic.
 */

/** Optional metadata attached to domain errors. */
export type ErrorMetadata = Record<string, unknown>;

/** Base for all domain errors. Preserves prototype chain for instanceof. */
export class DomainError extends Error {
  readonly metadata: ErrorMetadata | undefined;

  constructor(message: string, metadata?: ErrorMetadata) {
    super(message);
    this.name = this.constructor.name;
    this.metadata = metadata;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Thrown when a required field is absent at construction. */
export class MissingFieldError extends DomainError {
  readonly field: string;

  constructor(field: string, metadata?: ErrorMetadata) {
    super(`Missing required field: ${field}`, { field, ...metadata });
    this.field = field;
  }
}

/** Thrown when a configuration row has fewer than two entries. */
export class MalformedRowError extends DomainError {
  readonly rowIndex: number;

  constructor(rowIndex: number, message = `Malformed configuration row at index ${rowIndex}`) {
    super(message, { rowIndex });
    this.rowIndex = rowIndex;
  }
}

/** Thrown when an argument cannot play the role it is passed for. */
export class InvalidArgumentError extends DomainError {
  constructor(message: string, metadata?: ErrorMetadata) {
    super(message, metadata);
  }
}

/** Thrown when a value or input fails validation. */
export class ValidationError extends DomainError {
  constructor(message: string, metadata?: ErrorMetadata) {
    super(message, metadata);
  }
}

/** Thrown when an entity or resource is not found. */
export class NotFoundError extends DomainError {
  constructor(message: string, metadata?: ErrorMetadata) {
    super(message, metadata);
  }
}
