export * from './objectStore.js'
export * from './in_memory_object_store.js'
