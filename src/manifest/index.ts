export { StorageLayoutManifest } from './manifest';
export {
  finalizeStorageLayout,
  mergeStorageLayout,
  readStorageLayout
} from './merge';
