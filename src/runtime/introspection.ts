import type { FieldDescription, ManagedClass } from '../types';
import { DIRTY_SLOT, UNSET, kFields, kLayout, toSlot } from '../constants';
import { readSlot, isSlotAssigned, writeSlot } from '../storage';

/**
 * Returns the finalized storage layout of a class.
 *
 * @param managedClass - A class created by `defineClass`.
 * @returns The frozen list of slots every instance owns.
 */
export function storageLayoutOf<TInstance extends object, TArgs extends unknown[]>(
  managedClass: ManagedClass<TInstance, TArgs>
): readonly string[] {
  return managedClass[kLayout];
}

/**
 * Describes the managed fields of a class in declaration order.
 *
 * @param managedClass - A class created by `defineClass`.
 * @returns One frozen description per field.
 */
export function describeFields<TInstance extends object, TArgs extends unknown[]>(
  managedClass: ManagedClass<TInstance, TArgs>
): readonly FieldDescription[] {
  return Object.freeze(
    managedClass[kFields].map(({ name, slot, readOnly, listener, autoDirty, doc }) =>
      Object.freeze({ name, slot, readOnly, listener, autoDirty, doc })
    )
  );
}

/**
 * Checks whether an auto-dirty field of the instance changed since creation
 * or since the last {@link markClean}.
 *
 * @param instance - Any object; instances without a dirty slot are clean.
 */
export function isDirty(instance: object): boolean {
  return readSlot(instance, DIRTY_SLOT) === true;
}

/**
 * Resets the instance's dirty flag to `false`.
 *
 * @throws {FieldInjectionError} If the class declares no auto-dirty field.
 */
export function markClean(instance: object): void {
  writeSlot(instance, DIRTY_SLOT, false);
}

/**
 * Checks whether a field has been assigned, as opposed to still reporting
 * its default.
 *
 * @param instance - The instance to inspect.
 * @param field - Public field name.
 */
export function isAssigned(instance: object, field: string): boolean {
  return isSlotAssigned(instance, toSlot(field));
}

/**
 * Returns a field to its default by clearing its slot.
 *
 * No listener is called and the dirty flag is left as it is.
 *
 * @throws {FieldInjectionError} If the instance has no slot for `field`.
 */
export function resetField(instance: object, field: string): void {
  writeSlot(instance, toSlot(field), UNSET);
}
