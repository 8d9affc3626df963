import type { CopyFieldsOptions } from '../types';
import { ARGS_SLOT, toSlot } from '../constants';
import { hasOwn } from '../guards';
import { reportFieldInjection } from '../report';
import { classNameOf, writeSlot } from '../storage';

/**
 * Copies named values into an instance's storage slots.
 *
 * Meant to be called from an initializer with the constructor's arguments:
 *
 * ```ts
 * namespace[kInit] = function (this: Car, brand: string, speed = 0) {
 *   copyFields(this, { brand, speed });
 * };
 * ```
 *
 * Behavior:
 * - Entries named `selfName` or listed in `exclude` are skipped.
 * - Every other entry `name` is written to the slot `_name` directly: no
 *   setter, listener or dirty mark is involved.
 * - With `saveArgs`, the copied values (in entry order, skipped entries
 *   left out) are stored as a frozen array in the `_args` slot.
 *
 * All target slots are checked before the first write, so a rejected call
 * leaves the instance unchanged.
 *
 * @param instance - An instance created by a `defineClass` class.
 * @param values - Parameter names mapped to their values.
 * @param options - Skipping and argument capture options.
 * @throws {FieldInjectionError} If a target slot is not in the layout.
 */
export function copyFields(
  instance: object,
  values: Readonly<Record<string, unknown>>,
  options: CopyFieldsOptions = {}
): void {
  const selfName = options.selfName ?? 'self';
  const excluded = new Set(options.exclude ?? []);

  const entries = Object.entries(values).filter(
    ([name]) => name !== selfName && !excluded.has(name)
  );

  const targets = entries.map(([name]) => toSlot(name));
  if (options.saveArgs) targets.push(ARGS_SLOT);

  for (const slot of targets) {
    if (!hasOwn(instance, slot)) {
      reportFieldInjection(classNameOf(instance), slot);
    }
  }

  for (const [name, value] of entries) {
    writeSlot(instance, toSlot(name), value);
  }

  if (options.saveArgs) {
    writeSlot(
      instance,
      ARGS_SLOT,
      Object.freeze(entries.map(([, value]) => value))
    );
  }
}
