import type { EqualityFn } from './options';

/**
 * Zero-argument function computing a field's fallback value.
 *
 * Called with the instance as `this` on every read of an unassigned field,
 * so the result may depend on other instance state at read time.
 *
 * @template TInstance - The instance type the provider reads from.
 * @template T - The field's value type.
 */
export type DefaultProvider<TInstance extends object = object, T = unknown> = (
  this: TInstance
) => T;

/**
 * One declared field, fixed at declaration time.
 *
 * @template TInstance - The instance type of the declaring class.
 */
export type FieldDefinition<TInstance extends object = object> = Readonly<{
  /**
   * Public name under which the accessor pair is installed.
   */
  name: string;

  /**
   * Private storage slot (`_<name>`).
   */
  slot: string;

  /**
   * Fallback computation used while the slot is unset.
   */
  provider: DefaultProvider<TInstance>;

  /**
   * Whether the accessor pair omits its setter.
   */
  readOnly: boolean;

  /**
   * Resolved listener method name, if the field is observed.
   */
  listener: string | undefined;

  /**
   * Effective auto-dirty policy (builder default OR field override).
   */
  autoDirty: boolean;

  /**
   * Documentation carried by the accessor pair.
   */
  doc: string | undefined;

  /**
   * Resolved equality used by the setter.
   */
  equals: EqualityFn;
}>;

/**
 * Public view of a {@link FieldDefinition}, as returned by `describeFields`.
 *
 * The provider and equality functions are implementation details and are
 * left out.
 */
export type FieldDescription = Readonly<
  Pick<FieldDefinition, 'name' | 'slot' | 'readOnly' | 'listener' | 'autoDirty' | 'doc'>
>;
