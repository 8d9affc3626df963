export type {
  BuilderOptions,
  CopyFieldsOptions,
  Equality,
  EqualityFn,
  FieldOptions,
  ListenerOption,
  ResolvedBuilderOptions
} from './options';
export type {
  DefaultProvider,
  FieldDefinition,
  FieldDescription
} from './field';
export type {
  ClassBody,
  ClassNamespace,
  Initializer,
  ManagedClass,
  StorageLayoutDeclaration
} from './namespace';
