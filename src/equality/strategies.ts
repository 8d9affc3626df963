/**
 * Defines the internal tag strings for "Rich" built-in types that are compared
 * by content rather than by reference under the `'value'` equality.
 *
 * Uses the exact internal tag strings returned by `Object.prototype.toString`
 * (e.g., "[object Date]") instead of checking `constructor.name`, which build
 * tools may rename and callers may overwrite.
 */
const Tag = {
  String: '[object String]',
  Number: '[object Number]',
  Boolean: '[object Boolean]',
  BigInt: '[object BigInt]',
  Date: '[object Date]',
  RegExp: '[object RegExp]'
} as const;

/**
 * Extracts the underlying primitive value from a wrapper object.
 *
 * Precondition:
 * The input must be a wrapper type (`Number`, `String`, `Boolean`, `BigInt`)
 * or a `Date`, all of which implement `.valueOf()`.
 */
function unbox<T>(wrapper: object): T {
  return (wrapper as { valueOf(): T }).valueOf();
}

/**
 * Compares two objects representing atomic values by their content.
 *
 * Supported types:
 * - Boxed Primitives: `Number`, `String`, `Boolean`, `BigInt`.
 * - `Date` (compared by timestamp).
 * - `RegExp` (compared by source and flags).
 *
 * @param left - The first object to compare.
 * @param right - The second object to compare.
 * @returns `true` if both objects are the same rich type and hold the same
 *          value; `false` for any other pair, including plain objects.
 */
export function areRichValuesEqual(left: object, right: object): boolean {
  const leftTypeTag = Object.prototype.toString.call(left);
  const rightTypeTag = Object.prototype.toString.call(right);

  if (leftTypeTag !== rightTypeTag) return false;

  switch (leftTypeTag) {
    case Tag.Number: {
      const leftValue = unbox<number>(left);
      const rightValue = unbox<number>(right);

      // A value that stays NaN is not a change.
      if (Number.isNaN(leftValue)) {
        return Number.isNaN(rightValue);
      }
      return leftValue === rightValue;
    }

    case Tag.String:
      return unbox<string>(left) === unbox<string>(right);
    case Tag.Boolean:
      return unbox<boolean>(left) === unbox<boolean>(right);
    case Tag.BigInt:
      return unbox<bigint>(left) === unbox<bigint>(right);
    case Tag.Date:
      return unbox<number>(left) === unbox<number>(right);
    case Tag.RegExp:
      return left.toString() === right.toString();

    default:
      return false;
  }
}

/**
 * Determines if two arrays hold the same elements in the same order.
 *
 * Elements are compared with `Object.is`, so `NaN` matches `NaN` and `+0`
 * differs from `-0`.
 *
 * @param left - The first array.
 * @param right - The second array.
 * @returns `true` if the arrays are the same instance or element-wise equal.
 */
export function areArraysShallowEqual(
  left: readonly unknown[],
  right: readonly unknown[]
): boolean {
  if (left === right) return true;
  if (left.length !== right.length) return false;
  return left.every((value, index) => Object.is(value, right[index]));
}

/**
 * `'strict'` equality: JavaScript `===`.
 *
 * `NaN` never equals itself, so re-assigning `NaN` counts as a change.
 */
export function strictEquals(previous: unknown, next: unknown): boolean {
  return previous === next;
}

/**
 * `'value'` equality.
 *
 * Order of checks:
 * 1. `Object.is` (identity, `NaN`, signed zeros).
 * 2. Arrays: shallow element equality.
 * 3. Rich built-ins: content equality via {@link areRichValuesEqual}.
 * 4. Anything else: not equal.
 */
export function valueEquals(previous: unknown, next: unknown): boolean {
  if (Object.is(previous, next)) return true;

  if (Array.isArray(previous) && Array.isArray(next)) {
    return areArraysShallowEqual(previous, next);
  }

  if (
    typeof previous === 'object' &&
    previous !== null &&
    typeof next === 'object' &&
    next !== null
  ) {
    return areRichValuesEqual(previous, next);
  }

  return false;
}
