import type {
  BuilderOptions,
  ClassNamespace,
  DefaultProvider,
  EqualityFn,
  FieldDefinition,
  FieldOptions,
  ResolvedBuilderOptions
} from '../types';
import { ARGS_SLOT, DIRTY_SLOT, toSlot } from '../constants';
import { resolveEquality } from '../equality';
import { hasOwn, isFunction } from '../guards';
import {
  StorageLayoutManifest,
  mergeStorageLayout,
  readStorageLayout
} from '../manifest';
import { resolveBuilderOptions, validateFieldOptions } from '../options';
import {
  type BuilderStateForReport,
  reportBuilderState,
  reportDuplicateSlot,
  reportInvalidOption,
  reportMemberCollision,
  reportMissingFieldName,
  reportReleaseFailure,
  reportReservedSlot
} from '../report';
import { createFieldAccessor } from './field-transformer';
import type { ManagedAccessor } from './managed-accessor';

/**
 * Lifecycle of a property builder: `pending → open → closed`, one shot.
 */
export type BuilderState = BuilderStateForReport;

/**
 * Resources a builder holds while it is open.
 */
type OpenSession = {
  namespace: ClassNamespace;
  manifest: StorageLayoutManifest;
};

/**
 * Scoped builder that declares managed fields into a class namespace.
 *
 * Lifecycle:
 * 1. `enter()` binds the builder into the namespace under `alias` and starts
 *    an empty manifest.
 * 2. `prop(...)` declares fields: each call installs an accessor pair into
 *    the namespace and appends its slot(s) to the manifest.
 * 3. `exit()` merges the manifest into the namespace's storage layout,
 *    removes the alias and drops every reference. The builder cannot be used
 *    again.
 *
 * Prefer {@link withProperties}, which guarantees step 3 on every exit path.
 *
 * @template TInstance - The instance type default providers read from.
 */
export class PropertyBuilder<TInstance extends object = object> {
  private currentState: BuilderState = 'pending';
  private session: OpenSession | undefined;
  private target: ClassNamespace | undefined;
  private readonly options: ResolvedBuilderOptions;
  private readonly defaultEquals: EqualityFn;

  /**
   * @param namespace - The class namespace under construction.
   * @param alias - Name the builder is bound under while open.
   * @param options - Defaults for every field declared through this builder.
   */
  constructor(
    namespace: ClassNamespace,
    readonly alias: string,
    options?: BuilderOptions
  ) {
    this.target = namespace;
    this.options = resolveBuilderOptions(options);
    this.defaultEquals = resolveEquality(this.options.equality);
  }

  /**
   * Current lifecycle state.
   */
  get state(): BuilderState {
    return this.currentState;
  }

  /**
   * Slots recorded in this session, in declaration order.
   *
   * @throws {UsageError} Unless the builder is open.
   */
  get manifest(): readonly string[] {
    return this.requireOpen('read the manifest').manifest.toArray();
  }

  /**
   * Opens the scope.
   *
   * @returns The builder itself.
   * @throws {UsageError} If the builder was already entered.
   * @throws {ConfigurationError} If `alias` is already a namespace member.
   */
  enter(): this {
    const namespace = this.target;
    if (this.currentState !== 'pending' || namespace === undefined) {
      return reportBuilderState(this.alias, this.currentState, 'enter the scope');
    }
    if (this.alias.length === 0) {
      reportInvalidOption('alias', 'a non-empty name', this.alias);
    }
    if (hasOwn(namespace, this.alias)) {
      reportMemberCollision(this.alias);
    }

    const session: OpenSession = {
      namespace,
      manifest: new StorageLayoutManifest()
    };
    if (this.options.saveArgs) {
      this.reserve(session, ARGS_SLOT);
    }

    namespace[this.alias] = this;
    this.target = undefined;
    this.session = session;
    this.currentState = 'open';
    return this;
  }

  /**
   * Closes the scope.
   *
   * The builder is marked closed before the merge runs, so a failing merge
   * still leaves it released and the alias removed.
   *
   * @returns The namespace's storage layout after the merge.
   * @throws {UsageError} Unless the builder is open.
   * @throws {ConfigurationError} If a slot is already declared in the namespace.
   */
  exit(): readonly string[] {
    const { namespace, manifest } = this.requireOpen('exit the scope');

    this.session = undefined;
    this.currentState = 'closed';

    try {
      return mergeStorageLayout(namespace, manifest.toArray());
    } finally {
      if (namespace[this.alias] === this) {
        delete namespace[this.alias];
      }
    }
  }

  /**
   * Declares one managed field (bound: safe to destructure).
   *
   * The field's public name is `options.name ?? provider.name`; its slot is
   * that name with the slot prefix. The accessor pair is installed into the
   * namespace under the public name and returned.
   *
   * @param provider - Zero-argument default provider; `this` is the instance.
   * @param options - Per-field options.
   * @returns The installed accessor pair.
   * @throws {UsageError} Unless the builder is open.
   * @throws {ConfigurationError} For a read-only observed field, a missing
   *         name, a name collision or a duplicate slot.
   */
  readonly prop = <T>(
    provider: DefaultProvider<TInstance, T>,
    options: FieldOptions = {}
  ): ManagedAccessor<TInstance> => {
    const session = this.requireOpen('declare a field');
    const { namespace, manifest } = session;

    if (!isFunction(provider)) {
      return reportInvalidOption('provider', 'a function', provider);
    }

    const name = options.name ?? provider.name;
    if (!name) reportMissingFieldName();

    const flags = validateFieldOptions(name, options);
    if (hasOwn(namespace, name)) reportMemberCollision(name);

    const slot = toSlot(name);
    const autoDirty = this.options.autoDirty || flags.autoDirty;
    const equals =
      options.equality === undefined
        ? this.defaultEquals
        : resolveEquality(options.equality);

    // Every rejection happens before the manifest is touched, so a rejected
    // declaration leaves no partial state behind.
    if (slot === DIRTY_SLOT || slot === ARGS_SLOT) {
      reportReservedSlot(name, slot);
    }
    if (this.isDeclared(session, slot)) reportDuplicateSlot(slot);

    if (autoDirty && !this.isDeclared(session, DIRTY_SLOT)) {
      manifest.append(DIRTY_SLOT);
    }
    manifest.append(slot);

    const definition: FieldDefinition<TInstance> = Object.freeze({
      name,
      slot,
      provider,
      readOnly: flags.readOnly,
      listener: flags.listener,
      autoDirty,
      doc: options.doc,
      equals
    });

    const accessor = createFieldAccessor(definition);
    namespace[name] = accessor;
    return accessor;
  };

  /**
   * Returns the open session or throws a usage error naming `action`.
   */
  private requireOpen(action: string): OpenSession {
    if (this.currentState !== 'open' || this.session === undefined) {
      return reportBuilderState(this.alias, this.currentState, action);
    }
    return this.session;
  }

  /**
   * Whether a slot is already taken, by this session or by a layout the
   * namespace declared before the builder was entered.
   */
  private isDeclared(session: OpenSession, slot: string): boolean {
    if (session.manifest.has(slot)) return true;
    return readStorageLayout(session.namespace)?.includes(slot) ?? false;
  }

  private reserve(session: OpenSession, slot: string): void {
    if (!this.isDeclared(session, slot)) session.manifest.append(slot);
  }
}

/**
 * Releases a builder after its declaration block failed, then rethrows the
 * block's error.
 *
 * A builder the block already exited is left alone. When the release itself
 * fails, the release error becomes the `cause` of the original error, or both
 * are reported together when the original is not an `Error` or already has a
 * cause.
 */
function releaseAfterFailure<TInstance extends object>(
  builder: PropertyBuilder<TInstance>,
  failure: unknown
): never {
  if (builder.state === 'open') {
    try {
      builder.exit();
    } catch (releaseError) {
      if (failure instanceof Error && failure.cause === undefined) {
        failure.cause = releaseError;
        throw failure;
      }
      reportReleaseFailure(builder.alias, failure, releaseError);
    }
  }
  throw failure;
}

/**
 * Declares fields inside a builder scope that is always released.
 *
 * Opens a {@link PropertyBuilder}, passes its bound `prop` operation and the
 * builder to `declare`, and closes it afterwards, also when `declare` throws.
 * The error thrown by `declare` is the one that propagates.
 *
 * @example
 * ```ts
 * withProperties<Car>(namespace, 'prop', prop => {
 *   prop(function speed() { return 0; }, { listener: 'onSpeed' });
 * });
 * ```
 *
 * @template TInstance - The instance type default providers read from.
 * @param namespace - The class namespace under construction.
 * @param alias - Name the builder is bound under while open.
 * @param declare - Declaration block.
 * @param options - Builder options.
 * @returns The namespace's storage layout after the merge.
 */
export function withProperties<TInstance extends object = object>(
  namespace: ClassNamespace,
  alias: string,
  declare: (
    prop: PropertyBuilder<TInstance>['prop'],
    builder: PropertyBuilder<TInstance>
  ) => void,
  options?: BuilderOptions
): readonly string[] {
  const builder = new PropertyBuilder<TInstance>(
    namespace,
    alias,
    options
  ).enter();

  try {
    declare(builder.prop, builder);
  } catch (error) {
    releaseAfterFailure(builder, error);
  }

  return builder.exit();
}
