import type { FieldDefinition } from '../types';

/**
 * Getter half of a managed accessor pair.
 */
export type FieldGetter<TInstance extends object> = (this: TInstance) => unknown;

/**
 * Setter half of a managed accessor pair.
 */
export type FieldSetter<TInstance extends object> = (
  this: TInstance,
  value: unknown
) => void;

/**
 * The getter/setter pair generated for one field.
 *
 * Stateless: it only closes over its {@link FieldDefinition}. The pair is
 * stored in the class namespace under the field's public name and becomes a
 * prototype accessor when the class is defined.
 *
 * @template TInstance - The instance type of the declaring class.
 */
export class ManagedAccessor<TInstance extends object = object> {
  constructor(
    readonly definition: FieldDefinition<TInstance>,
    readonly get: FieldGetter<TInstance>,
    readonly set: FieldSetter<TInstance> | undefined
  ) {
    Object.freeze(this);
  }

  /**
   * Documentation given to the field, if any.
   */
  get doc(): string | undefined {
    return this.definition.doc;
  }

  /**
   * Whether the pair omits its setter.
   */
  get readOnly(): boolean {
    return this.set === undefined;
  }

  /**
   * Builds the prototype descriptor for this pair.
   *
   * Accessors are enumerable (they are the class's public fields) and
   * non-configurable (the layout is fixed once the class exists).
   */
  toPropertyDescriptor(): PropertyDescriptor {
    return {
      get: this.get,
      set: this.set,
      enumerable: true,
      configurable: false
    };
  }
}

/**
 * Checks whether a namespace member is a managed accessor pair.
 *
 * @param value - A namespace member.
 * @returns `true` if `value` was produced by `prop`.
 */
export function isManagedAccessor(value: unknown): value is ManagedAccessor {
  return value instanceof ManagedAccessor;
}
