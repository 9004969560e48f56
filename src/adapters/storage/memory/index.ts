export { MemoryProcessingStore } from './memory-processing-store.adapter';
export type { MemoryStoreOptions } from './memory-processing-store.adapter';
