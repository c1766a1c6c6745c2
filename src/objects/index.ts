export {
  type BucketState,
  createObjectsComponent,
  entryType,
  type IndexEntry,
  METADATA_INDEX_KEY,
  type ObjectsComponent,
  type ObjectsComponentDeps,
  type ObjectsConfig,
  type ObjectsConfigInput,
  ObjectsConfigSchema,
  type ObjectsDiscovery,
  type ObjectsHousekeeping,
  type ObjectsProcessing,
} from "./objects-component.js";
export {
  allowsPublicRead,
  encodeKey,
  isMissing,
  objectStoreError,
  S3ObjectStore,
  type S3ObjectStoreOpts,
} from "./s3-store.js";
export * from "./store.js";
