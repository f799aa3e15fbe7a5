export {
  MemoryKeyValueStore,
  WebStorageKeyValueStore,
  readJson,
  writeJson,
} from './keyValueStore';
export type { KeyValueStore, WebStorageLike } from './keyValueStore';
