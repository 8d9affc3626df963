import type { StorageLayoutDeclaration } from './types';

/**
 * Any callable value.
 *
 * Parameters are typed `never` so that every function type is assignable;
 * invoke through `Reflect.apply` with arguments you control.
 */
export type AnyFunction = (...args: never[]) => unknown;

/**
 * Checks whether a value is callable.
 *
 * @param value - Value to test.
 * @returns `true` if `typeof value === 'function'`.
 */
export function isFunction(value: unknown): value is AnyFunction {
  return typeof value === 'function';
}

/**
 * Checks whether a value is a well-formed storage layout declaration:
 * an array whose entries are all strings.
 *
 * @param value - Value found under `kSlots`.
 * @returns `true` if `value` can be used as a layout.
 */
export function isStorageLayoutDeclaration(
  value: unknown
): value is StorageLayoutDeclaration {
  return (
    Array.isArray(value) && value.every(entry => typeof entry === 'string')
  );
}

/**
 * Checks whether a layout declaration may be extended in place.
 *
 * Frozen arrays are treated as the immutable variant; every other array is
 * mutable.
 *
 * @param layout - A validated layout declaration.
 * @returns `true` if `layout` is not frozen.
 */
export function isMutableLayout(
  layout: StorageLayoutDeclaration
): layout is string[] {
  return !Object.isFrozen(layout);
}

/**
 * Checks whether `key` is an own property of `target`.
 *
 * @param target - Object to inspect.
 * @param key - Property key.
 * @returns `true` if the property is defined on `target` itself.
 */
export function hasOwn(target: object, key: PropertyKey): boolean {
  return Object.prototype.hasOwnProperty.call(target, key);
}
