import {
  ConfigurationError,
  FieldInjectionError,
  ReadOnlyFieldError,
  UsageError
} from './errors';

/**
 * Diagnostics policy
 * ------------------
 * slotted-fields never logs. Every misuse is reported by throwing one of the
 * typed errors from `./errors`, with a message assembled here so that all
 * diagnostics share the same prefix and wording.
 *
 * Timing
 * ------
 * - Declaration problems (read-only + listener, duplicate slots, member
 *   collisions, unresolved listeners) throw while the class is being defined,
 *   before any instance exists.
 * - Injection and read-only assignments throw at the offending assignment.
 */

const PREFIX = '[slotted-fields]';

/**
 * Lifecycle states of a property builder, as used in diagnostics.
 */
export type BuilderStateForReport = 'pending' | 'open' | 'closed';

/**
 * Formats a property key for display.
 *
 * Symbols are rendered through `String()` (e.g. `Symbol(tag)`); strings are
 * returned unchanged.
 *
 * @param key - The property key being reported.
 * @returns A printable representation of `key`.
 */
export function formatAttribute(key: string | symbol): string {
  return typeof key === 'symbol' ? String(key) : key;
}

/**
 * Describes a builder state as a sentence fragment.
 */
function describeBuilderState(state: BuilderStateForReport): string {
  switch (state) {
    case 'pending':
      return 'has not been entered';
    case 'open':
      return 'is already open';
    case 'closed':
      return 'has been released';
  }
}

/**
 * Report (and throw) a field declared both read-only and observable.
 *
 * @param field - Public name of the offending field.
 * @throws {ConfigurationError} Always.
 */
export function reportReadOnlyListener(field: string): never {
  throw new ConfigurationError(
    `${PREFIX} Field "${field}" is read-only and cannot declare a listener.`
  );
}

/**
 * Report (and throw) a storage slot declared twice for the same class.
 *
 * @param slot - The duplicated slot identifier.
 * @throws {ConfigurationError} Always.
 */
export function reportDuplicateSlot(slot: string): never {
  throw new ConfigurationError(
    `${PREFIX} Storage slot "${slot}" is declared more than once.`
  );
}

/**
 * Report (and throw) a field whose slot is one of the reserved slots.
 *
 * @param field - Public name of the offending field.
 * @param slot - The reserved slot the name maps to.
 * @throws {ConfigurationError} Always.
 */
export function reportReservedSlot(field: string, slot: string): never {
  throw new ConfigurationError(
    `${PREFIX} Field "${field}" would be stored in the reserved slot "${slot}". Choose another name.`
  );
}

/**
 * Report (and throw) a field whose public name cannot be determined.
 *
 * @throws {ConfigurationError} Always.
 */
export function reportMissingFieldName(): never {
  throw new ConfigurationError(
    `${PREFIX} Cannot derive a field name from an anonymous default provider. ` +
      `Pass a named function or the "name" option.`
  );
}

/**
 * Report (and throw) a namespace name that is already taken.
 *
 * @param name - The member name that was about to be overwritten.
 * @throws {ConfigurationError} Always.
 */
export function reportMemberCollision(name: string): never {
  throw new ConfigurationError(
    `${PREFIX} Namespace member "${name}" is already defined.`
  );
}

/**
 * Report (and throw) an option value outside its accepted domain.
 *
 * @param option - The option key (e.g. `"listener"`).
 * @param expected - Human-readable description of the accepted values.
 * @param received - The rejected value.
 * @throws {ConfigurationError} Always.
 */
export function reportInvalidOption(
  option: string,
  expected: string,
  received: unknown
): never {
  throw new ConfigurationError(
    `${PREFIX} Invalid "${option}" option: expected ${expected}, got ${typeof received}.`
  );
}

/**
 * Report (and throw) a builder used outside of its open scope.
 *
 * @param alias - The name the builder binds in the namespace.
 * @param state - The builder state at the time of the call.
 * @param action - What the caller attempted (e.g. `"declare a field"`).
 * @throws {UsageError} Always.
 */
export function reportBuilderState(
  alias: string,
  state: BuilderStateForReport,
  action: string
): never {
  throw new UsageError(
    `${PREFIX} Property builder "${alias}" ${describeBuilderState(state)}: cannot ${action}.`
  );
}

/**
 * Report (and throw) a declaration block failure whose builder could not be
 * released either.
 *
 * @param alias - The name the builder binds in the namespace.
 * @param failure - The error thrown by the declaration block.
 * @param releaseError - The error thrown while releasing the builder.
 * @throws {AggregateError} Always, with `[failure, releaseError]`.
 */
export function reportReleaseFailure(
  alias: string,
  failure: unknown,
  releaseError: unknown
): never {
  throw new AggregateError(
    [failure, releaseError],
    `${PREFIX} Declarations of property builder "${alias}" failed and the builder could not be released.`
  );
}

/**
 * Report (and throw) a builder that was never released before class
 * definition finished.
 *
 * @param className - The class being defined.
 * @param alias - The namespace name still bound to the builder.
 * @throws {UsageError} Always.
 */
export function reportLeakedBuilder(className: string, alias: string): never {
  throw new UsageError(
    `${PREFIX} Property builder "${alias}" is still bound in the namespace of ${className}. ` +
      `Exit it before the class is defined.`
  );
}

/**
 * Report (and throw) a listener name that does not resolve to a method.
 *
 * @param className - The class being defined.
 * @param field - The observed field.
 * @param listener - The unresolved listener name.
 * @throws {ConfigurationError} Always.
 */
export function reportMissingListener(
  className: string,
  field: string,
  listener: string
): never {
  throw new ConfigurationError(
    `${PREFIX} Listener "${listener}" of field "${field}" on ${className} is not a method.`
  );
}

/**
 * Report (and throw) a malformed storage layout declaration.
 *
 * @param detail - What is wrong with the declaration.
 * @throws {ConfigurationError} Always.
 */
export function reportInvalidLayout(detail: string): never {
  throw new ConfigurationError(
    `${PREFIX} Invalid storage layout declaration: ${detail}.`
  );
}

/**
 * Report (and throw) a non-function initializer.
 *
 * @param className - The class being defined.
 * @throws {ConfigurationError} Always.
 */
export function reportInvalidInitializer(className: string): never {
  throw new ConfigurationError(
    `${PREFIX} The initializer of ${className} must be a function.`
  );
}

/**
 * Report (and throw) an attempt to store an attribute outside the layout.
 *
 * @param className - The class of the guarded instance.
 * @param attribute - The rejected property key.
 * @throws {FieldInjectionError} Always.
 */
export function reportFieldInjection(
  className: string,
  attribute: string | symbol
): never {
  const display = formatAttribute(attribute);
  throw new FieldInjectionError(
    `${PREFIX} Cannot assign "${display}" on ${className}: not a declared field or storage slot.`,
    className,
    display
  );
}

/**
 * Report (and throw) an attempt to delete an attribute of a guarded
 * instance.
 *
 * @param className - The class of the guarded instance.
 * @param attribute - The rejected property key.
 * @throws {FieldInjectionError} Always.
 */
export function reportInvalidDelete(
  className: string,
  attribute: string | symbol
): never {
  const display = formatAttribute(attribute);
  throw new FieldInjectionError(
    `${PREFIX} Cannot delete "${display}" on ${className}: instance attributes are fixed. Use resetField to restore a default.`,
    className,
    display
  );
}

/**
 * Report (and throw) an assignment to a read-only field.
 *
 * @param className - The class of the instance.
 * @param field - The read-only field.
 * @throws {ReadOnlyFieldError} Always.
 */
export function reportReadOnlyAssignment(
  className: string,
  field: string | symbol
): never {
  const display = formatAttribute(field);
  throw new ReadOnlyFieldError(
    `${PREFIX} Cannot assign "${display}" on ${className}: the field is read-only.`,
    className,
    display
  );
}
