export { defineClass } from './define-class';
export { copyFields } from './field-copier';
export { createInstanceGuard, type GuardContext } from './instance-guard';
export {
  describeFields,
  isAssigned,
  isDirty,
  markClean,
  resetField,
  storageLayoutOf
} from './introspection';
