export { createFieldAccessor } from './field-transformer';
export {
  type FieldGetter,
  type FieldSetter,
  ManagedAccessor,
  isManagedAccessor
} from './managed-accessor';
export {
  type BuilderState,
  PropertyBuilder,
  withProperties
} from './property-builder';
