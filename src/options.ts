import type {
  BuilderOptions,
  FieldOptions,
  ListenerOption,
  ResolvedBuilderOptions
} from './types';
import { GENERIC_LISTENER } from './constants';
import { reportInvalidOption, reportReadOnlyListener } from './report';

/**
 * Validates an optional boolean option.
 *
 * @param option - Option key, for the error message.
 * @param value - The provided value.
 * @param fallback - Value used when `value` is `undefined`.
 * @returns `value`, or `fallback` when it is absent.
 * @throws {ConfigurationError} If `value` is present and not a boolean.
 */
function booleanOption(
  option: string,
  value: unknown,
  fallback: boolean
): boolean {
  if (value === undefined) return fallback;
  if (typeof value !== 'boolean') {
    return reportInvalidOption(option, 'a boolean', value);
  }
  return value;
}

/**
 * Merges the provided builder options with the defaults.
 *
 * Default settings:
 * - `autoDirty`: `false`.
 * - `saveArgs`: `false`.
 * - `equality`: `'strict'`.
 *
 * Explicit `undefined` values fall back to the defaults.
 *
 * @param options - The user-provided options.
 * @returns A complete options object.
 * @throws {ConfigurationError} If a boolean option holds another type.
 */
export function resolveBuilderOptions(
  options: BuilderOptions = {}
): ResolvedBuilderOptions {
  return {
    autoDirty: booleanOption('autoDirty', options.autoDirty, false),
    saveArgs: booleanOption('saveArgs', options.saveArgs, false),
    equality: options.equality ?? 'strict'
  };
}

/**
 * Resolves the listener selector of a field to a method name.
 *
 * @param listener - `undefined`, a method name, or `true`.
 * @returns The method name, or `undefined` for unobserved fields.
 * @throws {ConfigurationError} For an empty name or any other value.
 */
export function resolveListener(
  listener: ListenerOption | undefined
): string | undefined {
  if (listener === undefined) return undefined;
  if (listener === true) return GENERIC_LISTENER;

  if (typeof listener !== 'string' || listener.length === 0) {
    return reportInvalidOption('listener', 'a method name or true', listener);
  }
  return listener;
}

/**
 * Field options after validation, before they are combined with the
 * builder's defaults.
 */
export type ValidatedFieldOptions = {
  readOnly: boolean;
  listener: string | undefined;
  autoDirty: boolean;
};

/**
 * Validates the per-field flags and enforces that a read-only field is not
 * observed.
 *
 * @param field - Public field name, for error messages.
 * @param options - The options passed to `prop`.
 * @returns The validated flags.
 * @throws {ConfigurationError} If `readOnly` and `listener` are both set, or
 *         a flag has the wrong type.
 */
export function validateFieldOptions(
  field: string,
  options: FieldOptions
): ValidatedFieldOptions {
  const readOnly = booleanOption('readOnly', options.readOnly, false);
  const autoDirty = booleanOption('autoDirty', options.autoDirty, false);

  // A read-only field has no setter, so there is no write to observe.
  if (readOnly && options.listener !== undefined) {
    reportReadOnlyListener(field);
  }

  return { readOnly, autoDirty, listener: resolveListener(options.listener) };
}
