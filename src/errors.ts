/**
 * Error types raised by slotted-fields.
 *
 * Every error is a programmer error: it is thrown synchronously at
 * declaration time or at the offending assignment, and never retried.
 */

/**
 * Base class for all slotted-fields errors.
 */
export class SlottedFieldsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SlottedFieldsError';
  }
}

/**
 * Thrown when a class or field declaration is inconsistent.
 *
 * Examples: a read-only field with a listener, a duplicate storage slot,
 * a listener name that does not resolve to a method.
 */
export class ConfigurationError extends SlottedFieldsError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Thrown when an instance is asked to hold an attribute outside its
 * storage layout.
 */
export class FieldInjectionError extends ConfigurationError {
  constructor(
    message: string,
    readonly className: string,
    readonly attribute: string
  ) {
    super(message);
    this.name = 'FieldInjectionError';
  }
}

/**
 * Thrown when a builder is used outside its open scope.
 */
export class UsageError extends SlottedFieldsError {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/**
 * Thrown on assignment to a field declared with `readOnly: true`.
 */
export class ReadOnlyFieldError extends UsageError {
  constructor(
    message: string,
    readonly className: string,
    readonly field: string
  ) {
    super(message);
    this.name = 'ReadOnlyFieldError';
  }
}
