import { describe, expect, test } from 'vitest';

import type { ClassNamespace } from '../../types';
import { ARGS_SLOT, kSlots } from '../../constants';
import { ConfigurationError, UsageError } from '../../errors';
import { PropertyBuilder, withProperties } from '..';

function zero() {
  return 0;
}

describe('PropertyBuilder lifecycle: pending → open → closed', () => {
  test('enter binds the alias and returns the builder', () => {
    const ns: ClassNamespace = {};
    const builder = new PropertyBuilder(ns, 'prop');

    expect(builder.state).toBe('pending');
    expect(builder.enter()).toBe(builder);
    expect(builder.state).toBe('open');
    expect(ns.prop).toBe(builder);
  });

  test('exit merges the manifest and removes the alias', () => {
    const ns: ClassNamespace = {};
    const builder = new PropertyBuilder(ns, 'prop').enter();

    builder.prop(zero, { name: 'level' });

    expect(builder.exit()).toEqual(['_level']);
    expect(builder.state).toBe('closed');
    expect('prop' in ns).toBe(false);
    expect(ns[kSlots]).toEqual(['_level']);
  });

  test('exit leaves an alias that was rebound by the author', () => {
    const ns: ClassNamespace = {};
    const builder = new PropertyBuilder(ns, 'prop').enter();
    ns.prop = 'kept';

    builder.exit();

    expect(ns.prop).toBe('kept');
  });

  test('the manifest lists slots in declaration order while open', () => {
    const ns: ClassNamespace = {};
    const builder = new PropertyBuilder(ns, 'prop').enter();

    builder.prop(zero, { name: 'a' });
    builder.prop(zero, { name: 'b' });

    expect(builder.manifest).toEqual(['_a', '_b']);
  });

  test('prop is bound and can be destructured', () => {
    const ns: ClassNamespace = {};
    const { prop } = new PropertyBuilder(ns, 'prop').enter();

    prop(zero, { name: 'level' });

    expect(Object.keys(ns)).toEqual(['prop', 'level']);
  });

  test('saveArgs reserves the args slot on entry', () => {
    const ns: ClassNamespace = {};
    const builder = new PropertyBuilder(ns, 'prop', { saveArgs: true }).enter();

    builder.prop(zero, { name: 'x' });

    expect(builder.exit()).toEqual([ARGS_SLOT, '_x']);
  });

  test('an alias that is already a member is rejected', () => {
    const ns: ClassNamespace = { prop: 1 };

    expect(() => new PropertyBuilder(ns, 'prop').enter()).toThrow(
      new ConfigurationError(
        '[slotted-fields] Namespace member "prop" is already defined.'
      )
    );
  });
});

describe('PropertyBuilder lifecycle: use outside the open scope', () => {
  test('declaring before enter is a usage error', () => {
    const builder = new PropertyBuilder({}, 'prop');

    expect(() => builder.prop(zero, { name: 'level' })).toThrow(
      new UsageError(
        '[slotted-fields] Property builder "prop" has not been entered: cannot declare a field.'
      )
    );
  });

  test('declaring after exit is a usage error', () => {
    const builder = new PropertyBuilder({}, 'prop').enter();
    builder.exit();

    expect(() => builder.prop(zero, { name: 'level' })).toThrow(
      new UsageError(
        '[slotted-fields] Property builder "prop" has been released: cannot declare a field.'
      )
    );
  });

  test('entering twice is a usage error', () => {
    const builder = new PropertyBuilder({}, 'prop').enter();

    expect(() => builder.enter()).toThrow(
      new UsageError(
        '[slotted-fields] Property builder "prop" is already open: cannot enter the scope.'
      )
    );
  });

  test('re-entering a released builder is a usage error', () => {
    const builder = new PropertyBuilder({}, 'prop').enter();
    builder.exit();

    expect(() => builder.enter()).toThrow(
      new UsageError(
        '[slotted-fields] Property builder "prop" has been released: cannot enter the scope.'
      )
    );
  });

  test('exiting twice is a usage error', () => {
    const builder = new PropertyBuilder({}, 'prop').enter();
    builder.exit();

    expect(() => builder.exit()).toThrow(UsageError);
  });

  test('the manifest is unreadable after release', () => {
    const builder = new PropertyBuilder({}, 'prop').enter();
    builder.exit();

    expect(() => builder.manifest).toThrow(
      new UsageError(
        '[slotted-fields] Property builder "prop" has been released: cannot read the manifest.'
      )
    );
  });

  test('a prop captured during the scope fails once the scope is gone', () => {
    const ns: ClassNamespace = {};
    const captured: Array<PropertyBuilder['prop']> = [];

    withProperties(ns, 'prop', prop => {
      captured.push(prop);
    });
    const [late] = captured;

    expect(() => late(zero, { name: 'late' })).toThrow(UsageError);
    expect('late' in ns).toBe(false);
  });
});

describe('withProperties: release on every exit path', () => {
  test('returns the merged layout', () => {
    const ns: ClassNamespace = {};

    const layout = withProperties(ns, 'prop', prop => {
      prop(zero, { name: 'a' });
      prop(zero, { name: 'b' });
    });

    expect(layout).toEqual(['_a', '_b']);
    expect('prop' in ns).toBe(false);
  });

  test('a failing declaration still releases the builder', () => {
    const ns: ClassNamespace = {};
    const builders: PropertyBuilder[] = [];
    const failure = new Error('declaration failed');

    expect(() =>
      withProperties(ns, 'prop', (prop, current) => {
        builders.push(current);
        prop(zero, { name: 'a' });
        throw failure;
      })
    ).toThrow(failure);

    expect(builders.map(builder => builder.state)).toEqual(['closed']);
    expect('prop' in ns).toBe(false);
    expect(ns[kSlots]).toEqual(['_a']);
    expect(typeof ns.a).toBe('object');
  });

  test('a block that exits its own builder keeps its error', () => {
    const ns: ClassNamespace = {};
    const failure = new Error('declaration failed');

    expect(() =>
      withProperties(ns, 'prop', (prop, builder) => {
        prop(zero, { name: 'a' });
        builder.exit();
        throw failure;
      })
    ).toThrow(failure);
    expect(ns[kSlots]).toEqual(['_a']);
  });

  test('a failed release becomes the cause of the block error', () => {
    const ns: ClassNamespace = {};
    const failure = new Error('declaration failed');

    expect(() =>
      withProperties(ns, 'prop', () => {
        Reflect.set(ns, kSlots, 'broken');
        throw failure;
      })
    ).toThrow(failure);
    expect(failure.cause).toBeInstanceOf(ConfigurationError);
    expect('prop' in ns).toBe(false);
  });

  test('a block error that cannot carry a cause is reported with the release error', () => {
    const ns: ClassNamespace = {};
    const failure = new Error('declaration failed', { cause: 'earlier' });

    let caught: unknown;
    try {
      withProperties(ns, 'prop', () => {
        Reflect.set(ns, kSlots, 'broken');
        throw failure;
      });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(AggregateError);
    expect(caught).toMatchObject({
      message:
        '[slotted-fields] Declarations of property builder "prop" failed and the builder could not be released.'
    });
    const errors = caught instanceof AggregateError ? caught.errors : [];
    expect(errors[0]).toBe(failure);
    expect(errors[1]).toBeInstanceOf(ConfigurationError);
  });

  test('two sessions on one namespace concatenate their slots', () => {
    const ns: ClassNamespace = {};

    withProperties(ns, 'first', prop => {
      prop(zero, { name: 'a' });
    });
    const layout = withProperties(ns, 'second', prop => {
      prop(zero, { name: 'b' });
    });

    expect(layout).toEqual(['_a', '_b']);
  });
});
