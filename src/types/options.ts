/**
 * Decides whether an assignment leaves the field unchanged.
 *
 * @param previous - The stored value, or `undefined` when the slot is unset.
 * @param next - The value being assigned.
 * @returns `true` when the assignment is a no-op.
 */
export type EqualityFn = (previous: unknown, next: unknown) => boolean;

/**
 * Equality used by setters to detect idempotent writes.
 *
 * - `'strict'`: `===`.
 * - `'value'`: content equality for boxed primitives, `Date`, `RegExp` and
 *   arrays (shallow); `Object.is` for everything else.
 * - A custom {@link EqualityFn}.
 */
export type Equality = 'strict' | 'value' | EqualityFn;

/**
 * Listener selector for a field.
 *
 * - `string`: name of a method on the instance.
 * - `true`: the generic `onChange` method.
 */
export type ListenerOption = string | true;

export type FieldOptions = {
  /**
   * Omits the setter. Assigning to the field throws `ReadOnlyFieldError`.
   *
   * Cannot be combined with `listener`.
   *
   * @default false
   */
  readOnly?: boolean;

  /**
   * Method invoked after the stored value changes, with the instance as
   * `this` and `(slot, oldValue, newValue)` as arguments.
   *
   * @default undefined
   */
  listener?: ListenerOption;

  /**
   * Marks the reserved `_dirty` slot `true` whenever the value changes.
   *
   * OR-ed with the builder's `autoDirty`.
   *
   * @default false
   */
  autoDirty?: boolean;

  /**
   * Public field name. Defaults to the default provider's `name`.
   *
   * Required for arrow functions assigned inline and for code that is
   * minified before it runs.
   */
  name?: string;

  /**
   * Documentation attached to the accessor pair and reported by
   * `describeFields`.
   */
  doc?: string;

  /**
   * Overrides the builder's equality for this field.
   */
  equality?: Equality;
};

export type BuilderOptions = {
  /**
   * Default `autoDirty` policy for every field declared through the builder.
   *
   * A field can opt in on its own; it cannot opt out of a builder-wide `true`.
   *
   * @default false
   */
  autoDirty?: boolean;

  /**
   * Reserves the `_args` slot when the builder is entered, so that
   * `copyFields(..., { saveArgs: true })` has somewhere to write.
   *
   * @default false
   */
  saveArgs?: boolean;

  /**
   * Default equality for every field declared through the builder.
   *
   * @default 'strict'
   */
  equality?: Equality;
};

/**
 * Builder options with every default applied.
 */
export type ResolvedBuilderOptions = Required<BuilderOptions>;

export type CopyFieldsOptions = {
  /**
   * Entry names that are never copied.
   *
   * @default []
   */
  exclude?: Iterable<string>;

  /**
   * Additionally stores the copied values, in order, in the `_args` slot.
   *
   * @default false
   */
  saveArgs?: boolean;

  /**
   * Name of the entry that refers to the instance itself; never copied.
   *
   * @default 'self'
   */
  selfName?: string;
};
