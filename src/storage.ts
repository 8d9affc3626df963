import { UNSET } from './constants';
import { hasOwn, isFunction } from './guards';
import { reportFieldInjection } from './report';

/**
 * Returns the display name of an instance's class.
 *
 * @param instance - Any object.
 * @returns `constructor.name`, or `"object"` when it is unavailable.
 */
export function classNameOf(instance: object): string {
  const ctor: unknown = Reflect.get(instance, 'constructor');
  return isFunction(ctor) && ctor.name ? ctor.name : 'object';
}

/**
 * Reads a storage slot.
 *
 * @param instance - The instance owning the slot.
 * @param slot - Slot identifier.
 * @returns The stored value, or {@link UNSET} if the slot was never assigned
 *          or does not exist.
 */
export function readSlot(instance: object, slot: string): unknown {
  if (!hasOwn(instance, slot)) return UNSET;
  return Reflect.get(instance, slot);
}

/**
 * Writes a storage slot, bypassing accessors, listeners and dirty tracking.
 *
 * @param instance - The instance owning the slot.
 * @param slot - Slot identifier.
 * @param value - The value to store.
 * @throws {FieldInjectionError} If `slot` is not part of the instance's layout.
 */
export function writeSlot(instance: object, slot: string, value: unknown): void {
  if (!hasOwn(instance, slot) || !Reflect.set(instance, slot, value)) {
    reportFieldInjection(classNameOf(instance), slot);
  }
}

/**
 * Checks whether a slot holds an assigned value.
 *
 * @param instance - The instance owning the slot.
 * @param slot - Slot identifier.
 * @returns `true` if the slot exists and is not {@link UNSET}.
 */
export function isSlotAssigned(instance: object, slot: string): boolean {
  return readSlot(instance, slot) !== UNSET;
}
