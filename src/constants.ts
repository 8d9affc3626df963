/**
 * Prefix that turns a public field name into its private storage slot.
 *
 * Example: the field `speed` is stored in the slot `_speed`.
 */
export const SLOT_PREFIX = '_';

/**
 * Reserved slot holding the auto-dirty flag.
 *
 * Appended to a layout at most once, the first time a field with effective
 * `autoDirty` is declared.
 */
export const DIRTY_SLOT = `${SLOT_PREFIX}dirty`;

/**
 * Reserved slot holding the ordered constructor values captured by
 * `copyFields(..., { saveArgs: true })`.
 */
export const ARGS_SLOT = `${SLOT_PREFIX}args`;

/**
 * Callback name used when a field is declared with `listener: true`.
 */
export const GENERIC_LISTENER = 'onChange';

/**
 * Namespace key of the storage layout declaration.
 *
 * The value is either absent, a mutable `string[]`, or a frozen array.
 */
export const kSlots = Symbol('slotted-fields:slots');

/**
 * Namespace key of the instance initializer.
 *
 * `defineClass` calls it with the constructor arguments and the guarded
 * instance as `this`.
 */
export const kInit = Symbol('slotted-fields:init');

/**
 * Static key on a defined class holding its finalized storage layout.
 */
export const kLayout = Symbol('slotted-fields:layout');

/**
 * Static key on a defined class holding its field definitions.
 */
export const kFields = Symbol('slotted-fields:fields');

/**
 * Marker stored in a slot that has never been assigned.
 *
 * Implementation Strategy:
 * Uses `Symbol.for` so the marker written by one copy of the package matches
 * the check performed by another ("Dual Package" hazard).
 *
 * Contract:
 * - Never returned by a field getter (the default provider is consulted).
 * - Reported as `undefined` in the `oldValue` position of listener calls.
 */
export const UNSET = Symbol.for('slotted-fields.unset');

/**
 * Type of the {@link UNSET} sentinel.
 */
export type Unset = typeof UNSET;

/**
 * Builds the storage slot identifier for a public field name.
 *
 * @param name - The public field name (e.g. `"speed"`).
 * @returns The prefixed slot identifier (e.g. `"_speed"`).
 */
export function toSlot(name: string): string {
  return `${SLOT_PREFIX}${name}`;
}
