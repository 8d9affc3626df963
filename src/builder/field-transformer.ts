import type { FieldDefinition } from '../types';
import { DIRTY_SLOT, UNSET } from '../constants';
import { hasOwn, isFunction } from '../guards';
import { reportMissingListener } from '../report';
import { classNameOf, readSlot, writeSlot } from '../storage';
import { ManagedAccessor } from './managed-accessor';

/**
 * Calls a field's listener after its value changed.
 *
 * The listener is looked up on the instance at call time.
 *
 * @throws {ConfigurationError} If the name does not resolve to a method.
 */
function notifyListener(
  instance: object,
  definition: Pick<FieldDefinition, 'name' | 'slot'>,
  listener: string,
  previous: unknown,
  next: unknown
): void {
  const callback: unknown = Reflect.get(instance, listener);
  if (!isFunction(callback)) {
    reportMissingListener(classNameOf(instance), definition.name, listener);
  }
  Reflect.apply(callback, instance, [definition.slot, previous, next]);
}

/**
 * Generates the managed accessor pair for one field definition.
 *
 * Getter:
 * Returns the stored value once the slot has been assigned. Until then the
 * default provider is called on every read and its result is not stored, so
 * a default that depends on other instance state stays live. A receiver
 * without the slot, such as the class prototype, reads `undefined` and the
 * provider is not called.
 *
 * Setter (omitted for read-only fields):
 * 1. Reads the current value (`undefined` while unset).
 * 2. Returns early when `equals(previous, next)`: no write, no dirty mark,
 *    no listener call.
 * 3. Writes the slot.
 * 4. Marks the reserved dirty slot when `autoDirty` is effective.
 * 5. Invokes the listener with `(slot, previous, next)`. The write already
 *    happened, so the listener reads the new value through the field.
 *
 * @template TInstance - The instance type of the declaring class.
 * @param definition - The frozen field definition.
 * @returns The accessor pair to install under `definition.name`.
 */
export function createFieldAccessor<TInstance extends object>(
  definition: FieldDefinition<TInstance>
): ManagedAccessor<TInstance> {
  const { slot, provider, listener, autoDirty, equals } = definition;

  function get(this: TInstance): unknown {
    if (!hasOwn(this, slot)) return undefined;
    const stored = readSlot(this, slot);
    return stored === UNSET ? provider.call(this) : stored;
  }

  if (definition.readOnly) {
    return new ManagedAccessor(definition, get, undefined);
  }

  function set(this: TInstance, value: unknown): void {
    const stored = readSlot(this, slot);
    const previous = stored === UNSET ? undefined : stored;

    if (equals(previous, value)) return;

    writeSlot(this, slot, value);

    if (autoDirty) {
      writeSlot(this, DIRTY_SLOT, true);
    }

    if (listener !== undefined) {
      notifyListener(this, definition, listener, previous, value);
    }
  }

  return new ManagedAccessor(definition, get, set);
}
