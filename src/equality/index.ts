import type { Equality, EqualityFn } from '../types';
import { reportInvalidOption } from '../report';
import { strictEquals, valueEquals } from './strategies';

export {
  areArraysShallowEqual,
  areRichValuesEqual,
  strictEquals,
  valueEquals
} from './strategies';

/**
 * Resolves an {@link Equality} option to the comparison function used by
 * field setters.
 *
 * @param equality - A named strategy or a custom comparison function.
 * @returns The comparison function.
 * @throws {ConfigurationError} For an unknown strategy name.
 */
export function resolveEquality(equality: Equality): EqualityFn {
  if (typeof equality === 'function') return equality;

  switch (equality) {
    case 'strict':
      return strictEquals;
    case 'value':
      return valueEquals;
    default:
      return reportInvalidOption(
        'equality',
        `'strict', 'value' or a function`,
        equality
      );
  }
}
