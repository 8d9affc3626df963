import { kFields, kInit, kLayout, kSlots } from '../constants';
import type { FieldDefinition } from './field';

/**
 * Storage layout declaration held by a namespace under `kSlots`.
 *
 * Runtime distinction:
 * - A frozen array is immutable; merging replaces it with a concatenation.
 * - Any other array is mutable; merging extends it in place.
 */
export type StorageLayoutDeclaration = string[] | readonly string[];

/**
 * Instance initializer registered under `kInit`.
 *
 * Any function is accepted; it runs with the guarded instance as `this` and
 * receives the constructor arguments unchanged.
 */
export type Initializer = (this: never, ...args: never[]) => void;

/**
 * The mutable mapping that becomes a class body.
 *
 * String keys are class members (accessor pairs, methods, constants); the
 * two symbol keys carry the storage layout and the initializer.
 */
export interface ClassNamespace {
  [member: string]: unknown;
  [kSlots]?: StorageLayoutDeclaration;
  [kInit]?: Initializer;
}

/**
 * Callback that evaluates a class body against its namespace.
 */
export type ClassBody = (namespace: ClassNamespace) => void;

/**
 * Constructor produced by `defineClass`.
 *
 * @template TInstance - Shape of the instances (fields and methods).
 * @template TArgs - Constructor parameters forwarded to the initializer.
 */
export interface ManagedClass<
  TInstance extends object = object,
  TArgs extends unknown[] = unknown[]
> {
  new (...args: TArgs): TInstance;

  /**
   * The class name given to `defineClass`.
   */
  readonly name: string;

  /**
   * Finalized storage layout; exactly the slots of every instance.
   */
  readonly [kLayout]: readonly string[];

  /**
   * Field definitions in declaration order.
   */
  readonly [kFields]: readonly FieldDefinition[];
}
