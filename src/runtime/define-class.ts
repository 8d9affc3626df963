import type {
  ClassBody,
  ClassNamespace,
  FieldDefinition,
  ManagedClass
} from '../types';
import { UNSET, kFields, kInit, kLayout } from '../constants';
import { PropertyBuilder, isManagedAccessor } from '../builder';
import { isFunction, type AnyFunction } from '../guards';
import { finalizeStorageLayout } from '../manifest';
import {
  reportInvalidInitializer,
  reportInvalidLayout,
  reportInvalidOption,
  reportLeakedBuilder,
  reportMemberCollision,
  reportMissingListener
} from '../report';
import { createInstanceGuard } from './instance-guard';

/**
 * Members of an evaluated namespace, sorted by how they are installed.
 */
type ClassMembers = {
  fields: FieldDefinition[];
  descriptors: Array<[name: string, descriptor: PropertyDescriptor]>;
};

/**
 * Sorts the string-keyed namespace members into field definitions and
 * prototype descriptors.
 *
 * - Accessor pairs: enumerable, non-configurable accessors.
 * - Functions: non-enumerable methods, like class methods.
 * - Anything else: enumerable read-only constants.
 *
 * @throws {UsageError} If a property builder is still bound.
 * @throws {ConfigurationError} If a member shadows a slot or the constructor.
 */
function collectMembers(
  className: string,
  namespace: ClassNamespace,
  slots: ReadonlySet<string>
): ClassMembers {
  const members: ClassMembers = { fields: [], descriptors: [] };

  for (const [name, value] of Object.entries(namespace)) {
    if (value instanceof PropertyBuilder) {
      reportLeakedBuilder(className, name);
    }
    if (name === 'constructor' || slots.has(name)) {
      reportMemberCollision(name);
    }

    if (isManagedAccessor(value)) {
      members.fields.push(value.definition);
      members.descriptors.push([name, value.toPropertyDescriptor()]);
    } else if (isFunction(value)) {
      members.descriptors.push([
        name,
        { value, writable: true, enumerable: false, configurable: true }
      ]);
    } else {
      members.descriptors.push([
        name,
        { value, writable: false, enumerable: true, configurable: false }
      ]);
    }
  }

  return members;
}

/**
 * Checks that every field is backed by a slot and every listener resolves to
 * a method of the class.
 *
 * @throws {ConfigurationError} On the first inconsistent field.
 */
function validateFields(
  className: string,
  namespace: ClassNamespace,
  fields: readonly FieldDefinition[],
  slots: ReadonlySet<string>
): void {
  for (const field of fields) {
    if (!slots.has(field.slot)) {
      reportInvalidLayout(
        `slot "${field.slot}" of field "${field.name}" is missing`
      );
    }
    if (field.listener !== undefined && !isFunction(namespace[field.listener])) {
      reportMissingListener(className, field.name, field.listener);
    }
  }
}

/**
 * Reads the optional initializer.
 *
 * @throws {ConfigurationError} If `kInit` holds something other than a function.
 */
function readInitializer(
  className: string,
  namespace: ClassNamespace
): AnyFunction | undefined {
  const init: unknown = namespace[kInit];
  if (init === undefined) return undefined;
  if (!isFunction(init)) return reportInvalidInitializer(className);
  return init;
}

/**
 * Defines a class from a namespace evaluated by `body`.
 *
 * Steps:
 * 1. Evaluate: `body` receives an empty namespace and fills it, typically
 *    through `withProperties`, methods, and `namespace[kInit]`.
 * 2. Finalize: the storage layout is validated and frozen; members are
 *    checked (no open builder, no member shadowing a slot, every listener
 *    resolvable).
 * 3. Install: accessor pairs, methods and constants go onto the prototype.
 *
 * Every instance then owns exactly the layout's slots, starts with each slot
 * unassigned, is sealed, and is returned behind the injection guard. The
 * initializer runs last, with the guarded instance as `this`.
 *
 * @example
 * ```ts
 * interface Counter { count: number; }
 *
 * const Counter = defineClass<Counter, [number]>('Counter', ns => {
 *   withProperties<Counter>(ns, 'prop', prop => {
 *     prop(function count() { return 0; });
 *   });
 *   ns[kInit] = function (this: Counter, start: number) {
 *     copyFields(this, { count: start });
 *   };
 * });
 * ```
 *
 * @template TInstance - Shape of the instances.
 * @template TArgs - Constructor parameters forwarded to the initializer.
 * @param name - Class name, used for `Class.name` and in diagnostics.
 * @param body - Class body evaluation.
 * @returns The constructed class.
 */
export function defineClass<
  TInstance extends object,
  TArgs extends unknown[] = []
>(name: string, body: ClassBody): ManagedClass<TInstance, TArgs>;

export function defineClass(name: string, body: ClassBody): ManagedClass {
  if (typeof name !== 'string' || name.length === 0) {
    return reportInvalidOption('name', 'a non-empty class name', name);
  }

  const namespace: ClassNamespace = {};
  body(namespace);

  const layout = finalizeStorageLayout(namespace);
  const slots = new Set(layout);
  const { fields, descriptors } = collectMembers(name, namespace, slots);
  validateFields(name, namespace, fields, slots);
  const init = readInitializer(name, namespace);
  const definitions = Object.freeze(fields);

  class Managed {
    static readonly [kLayout]: readonly string[] = layout;
    static readonly [kFields]: readonly FieldDefinition[] = definitions;

    constructor(...args: unknown[]) {
      for (const slot of layout) {
        Object.defineProperty(this, slot, {
          value: UNSET,
          writable: true,
          enumerable: false,
          configurable: false
        });
      }
      Object.seal(this);

      const instance = new Proxy(this, guard);
      if (init) Reflect.apply(init, instance, args);
      return instance;
    }
  }

  for (const [member, descriptor] of descriptors) {
    Object.defineProperty(Managed.prototype, member, descriptor);
  }
  Object.defineProperty(Managed, 'name', { value: name });

  const guard = createInstanceGuard({
    className: name,
    slots,
    prototype: Managed.prototype
  });

  return Managed;
}
