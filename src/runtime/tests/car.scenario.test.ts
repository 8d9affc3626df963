import { describe, expect, test } from 'vitest';

import { FieldInjectionError, ReadOnlyFieldError } from '../../errors';
import { type ListenerCall, createCarClass } from '../../tests/fixtures';

/**
 * End-to-end walk through a class with a read-only field and two observed
 * fields: construction, first writes, an idempotent write, and an injection
 * attempt.
 */
describe('Car: read-only brand, observed speed and power', () => {
  test('runs the full write sequence', () => {
    const calls: ListenerCall[] = [];
    const Car = createCarClass(calls);

    const car = new Car('Ford');
    expect(car.brand).toBe('Ford');
    expect(car.speed).toBe(0);
    expect(car.on).toBe(false);

    car.speed = 50;
    car.on = true;
    car.speed = 50;

    expect(calls).toEqual([
      {
        listener: 'onSpeed',
        slot: '_speed',
        previous: undefined,
        next: 50,
        observed: 50
      },
      {
        listener: 'onPower',
        slot: '_on',
        previous: undefined,
        next: true,
        observed: true
      }
    ]);

    expect(() => Object.assign(car, { model: 2020 })).toThrow(
      FieldInjectionError
    );
  });

  test('reports the injected attribute and class by name', () => {
    const Car = createCarClass([]);
    const car = new Car('Ford');

    let caught: unknown;
    try {
      Object.assign(car, { model: 2020 });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(FieldInjectionError);
    expect(caught).toMatchObject({
      name: 'FieldInjectionError',
      className: 'Car',
      attribute: 'model',
      message:
        '[slotted-fields] Cannot assign "model" on Car: not a declared field or storage slot.'
    });
  });

  test('rejects assignment to the read-only brand', () => {
    const Car = createCarClass([]);
    const car = new Car('Ford');

    expect(() => Object.assign(car, { brand: 'Audi' })).toThrow(
      new ReadOnlyFieldError(
        '[slotted-fields] Cannot assign "brand" on Car: the field is read-only.',
        'Car',
        'brand'
      )
    );
    expect(car.brand).toBe('Ford');
  });

  test('passes the previous stored value once the field was assigned', () => {
    const calls: ListenerCall[] = [];
    const Car = createCarClass(calls);
    const car = new Car('Ford');

    car.speed = 30;
    car.speed = 80;

    expect(calls.map(({ previous, next }) => [previous, next])).toEqual([
      [undefined, 30],
      [30, 80]
    ]);
  });

  test('a repeated identical write fires no listener', () => {
    const calls: ListenerCall[] = [];
    const Car = createCarClass(calls);
    const car = new Car('Ford');

    for (let i = 0; i < 5; i++) car.on = true;

    expect(calls).toHaveLength(1);
  });

  test('assigning undefined to an unset field is a no-op', () => {
    const calls: ListenerCall[] = [];
    const Car = createCarClass(calls);
    const car = new Car('Ford');

    Object.assign(car, { speed: undefined });

    expect(calls).toHaveLength(0);
    expect(car.speed).toBe(0);
  });
});
