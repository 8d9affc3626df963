export {
  ARGS_SLOT,
  DIRTY_SLOT,
  GENERIC_LISTENER,
  SLOT_PREFIX,
  UNSET,
  type Unset,
  kFields,
  kInit,
  kLayout,
  kSlots,
  toSlot
} from './constants';
export {
  ConfigurationError,
  FieldInjectionError,
  ReadOnlyFieldError,
  SlottedFieldsError,
  UsageError
} from './errors';
export {
  type BuilderState,
  type FieldGetter,
  type FieldSetter,
  ManagedAccessor,
  PropertyBuilder,
  createFieldAccessor,
  isManagedAccessor,
  withProperties
} from './builder';
export { resolveEquality, strictEquals, valueEquals } from './equality';
export {
  StorageLayoutManifest,
  finalizeStorageLayout,
  mergeStorageLayout
} from './manifest';
export {
  copyFields,
  defineClass,
  describeFields,
  isAssigned,
  isDirty,
  markClean,
  resetField,
  storageLayoutOf
} from './runtime';
export type * from './types';
