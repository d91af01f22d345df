export { InMemoryStorageAdapter } from './in-memory-storage.adapter';
export type { InMemoryStorageOptions } from './in-memory-storage.adapter';
