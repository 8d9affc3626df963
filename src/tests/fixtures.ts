import { kInit } from '../constants';
import { withProperties } from '../builder';
import { copyFields, defineClass } from '../runtime';

/**
 * One recorded listener invocation.
 */
export type ListenerCall = {
  listener: string;
  slot: string;
  previous: unknown;
  next: unknown;
  /**
   * The field value read through `this` inside the listener.
   */
  observed: unknown;
};

export interface Car {
  readonly brand: string;
  speed: number;
  on: boolean;
  onSpeed(slot: string, previous: unknown, next: unknown): void;
  onPower(slot: string, previous: unknown, next: unknown): void;
}

/**
 * Defines a `Car` class whose listeners append to `calls`.
 *
 * Fields:
 * - `brand`: read-only, no usable default.
 * - `speed`: default `0`, observed by `onSpeed`.
 * - `on`: default `false`, observed by `onPower`.
 */
export function createCarClass(calls: ListenerCall[]) {
  return defineClass<Car, [brand: string]>('Car', ns => {
    withProperties<Car>(ns, 'prop', prop => {
      prop(
        function brand(): string {
          throw new Error('Car requires a brand');
        },
        { readOnly: true }
      );
      prop(
        function speed() {
          return 0;
        },
        { listener: 'onSpeed', doc: 'Current speed in km/h.' }
      );
      prop(
        function on() {
          return false;
        },
        { listener: 'onPower' }
      );
    });

    ns.onSpeed = function (
      this: Car,
      slot: string,
      previous: unknown,
      next: unknown
    ) {
      calls.push({ listener: 'onSpeed', slot, previous, next, observed: this.speed });
    };

    ns.onPower = function (
      this: Car,
      slot: string,
      previous: unknown,
      next: unknown
    ) {
      calls.push({ listener: 'onPower', slot, previous, next, observed: this.on });
    };

    ns[kInit] = function (this: Car, brand: string) {
      copyFields(this, { brand });
    };
  });
}

export interface Note {
  title: string;
  body: string;
  revision: number;
}

/**
 * Defines a `Note` class with builder-wide auto-dirty tracking.
 */
export function createNoteClass() {
  return defineClass<Note>('Note', ns => {
    withProperties<Note>(
      ns,
      'prop',
      prop => {
        prop(function title() {
          return 'Untitled';
        });
        prop(function body() {
          return '';
        });
        prop(function revision() {
          return 1;
        });
      },
      { autoDirty: true }
    );
  });
}
