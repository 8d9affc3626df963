import {
  reportFieldInjection,
  reportInvalidDelete,
  reportReadOnlyAssignment
} from '../report';

/**
 * What the guard needs to know about the class it protects.
 */
export type GuardContext = {
  /**
   * Class name used in diagnostics.
   */
  className: string;

  /**
   * The finalized storage layout.
   */
  slots: ReadonlySet<string>;

  /**
   * The class prototype holding accessors, methods and constants.
   */
  prototype: object;
};

function isSlot(context: GuardContext, key: string | symbol): key is string {
  return typeof key === 'string' && context.slots.has(key);
}

/**
 * Creates the proxy handler that keeps an instance within its layout.
 *
 * Assignment rules:
 * 1. A storage slot is written directly.
 * 2. A prototype accessor with a setter runs the setter (with the proxy as
 *    `this`, so listeners observe the guarded instance).
 * 3. A prototype accessor without a setter is a read-only field.
 * 4. Anything else, including methods and constants, is an injection.
 *
 * Every `delete` fails (the sealed target keeps its non-configurable slots),
 * and so does every `Object.defineProperty` outside the layout.
 *
 * The target is also sealed by `defineClass`, so code that reaches it
 * without the proxy still cannot add properties.
 *
 * @param context - The protected class.
 * @returns A handler for `new Proxy(instance, handler)`.
 */
export function createInstanceGuard(context: GuardContext): ProxyHandler<object> {
  return {
    set(target, key, value, receiver) {
      if (isSlot(context, key)) {
        return Reflect.set(target, key, value);
      }

      const descriptor = Object.getOwnPropertyDescriptor(context.prototype, key);
      if (descriptor?.set) {
        return Reflect.set(target, key, value, receiver);
      }
      if (descriptor?.get) {
        return reportReadOnlyAssignment(context.className, key);
      }
      return reportFieldInjection(context.className, key);
    },

    defineProperty(target, key, attributes) {
      if (isSlot(context, key)) {
        return Reflect.defineProperty(target, key, attributes);
      }
      return reportFieldInjection(context.className, key);
    },

    deleteProperty(_target, key) {
      return reportInvalidDelete(context.className, key);
    }
  };
}
