import { describe, expect, test } from 'vitest';

import { FieldInjectionError } from '../../errors';
import { type ListenerCall, createCarClass, createNoteClass } from '../../tests/fixtures';
import {
  describeFields,
  isAssigned,
  isDirty,
  markClean,
  resetField,
  storageLayoutOf
} from '..';

describe('dirty tracking', () => {
  test('the dirty slot precedes the first auto-dirty field', () => {
    const Note = createNoteClass();

    expect(storageLayoutOf(Note)).toEqual(['_dirty', '_title', '_body', '_revision']);
  });

  test('a new instance is clean', () => {
    const Note = createNoteClass();

    expect(isDirty(new Note())).toBe(false);
  });

  test('a change marks the instance dirty until markClean', () => {
    const Note = createNoteClass();
    const note = new Note();

    note.title = 'Draft';
    expect(isDirty(note)).toBe(true);

    markClean(note);
    expect(isDirty(note)).toBe(false);
  });

  test('an idempotent write leaves a clean instance clean', () => {
    const Note = createNoteClass();
    const note = new Note();
    note.title = 'Draft';
    markClean(note);

    note.title = 'Draft';
    expect(isDirty(note)).toBe(false);

    note.revision = 2;
    expect(isDirty(note)).toBe(true);
  });

  test('objects without a dirty slot are never dirty', () => {
    const Car = createCarClass([]);
    const car = new Car('Ford');
    car.speed = 10;

    expect(isDirty(car)).toBe(false);
    expect(isDirty({})).toBe(false);
  });

  test('markClean requires a dirty slot', () => {
    const Car = createCarClass([]);

    expect(() => markClean(new Car('Ford'))).toThrow(
      new FieldInjectionError(
        '[slotted-fields] Cannot assign "_dirty" on Car: not a declared field or storage slot.',
        'Car',
        '_dirty'
      )
    );
  });
});

describe('describeFields', () => {
  test('lists every field in declaration order', () => {
    const Car = createCarClass([]);

    expect(describeFields(Car)).toEqual([
      {
        name: 'brand',
        slot: '_brand',
        readOnly: true,
        listener: undefined,
        autoDirty: false,
        doc: undefined
      },
      {
        name: 'speed',
        slot: '_speed',
        readOnly: false,
        listener: 'onSpeed',
        autoDirty: false,
        doc: 'Current speed in km/h.'
      },
      {
        name: 'on',
        slot: '_on',
        readOnly: false,
        listener: 'onPower',
        autoDirty: false,
        doc: undefined
      }
    ]);
  });

  test('reports the effective auto-dirty policy', () => {
    const Note = createNoteClass();

    expect(describeFields(Note).map(field => field.autoDirty)).toEqual([
      true,
      true,
      true
    ]);
  });

  test('descriptions are frozen', () => {
    const fields = describeFields(createCarClass([]));

    expect(Object.isFrozen(fields)).toBe(true);
    expect(fields.every(field => Object.isFrozen(field))).toBe(true);
  });
});

describe('isAssigned and resetField', () => {
  test('tracks whether a field still reports its default', () => {
    const Car = createCarClass([]);
    const car = new Car('Ford');

    expect(isAssigned(car, 'brand')).toBe(true);
    expect(isAssigned(car, 'speed')).toBe(false);

    car.speed = 0;

    expect(isAssigned(car, 'speed')).toBe(true);
    expect(isAssigned(car, 'model')).toBe(false);
  });

  test('resetField restores the default without notifying', () => {
    const calls: ListenerCall[] = [];
    const Car = createCarClass(calls);
    const car = new Car('Ford');
    car.speed = 90;

    resetField(car, 'speed');

    expect(car.speed).toBe(0);
    expect(isAssigned(car, 'speed')).toBe(false);
    expect(calls).toHaveLength(1);
  });

  test('resetField keeps the dirty flag', () => {
    const Note = createNoteClass();
    const note = new Note();
    note.body = 'Text';

    resetField(note, 'body');

    expect(note.body).toBe('');
    expect(isDirty(note)).toBe(true);
  });

  test('resetField rejects unknown fields', () => {
    const Car = createCarClass([]);

    expect(() => resetField(new Car('Ford'), 'model')).toThrow(FieldInjectionError);
  });
});
