/**
 * In-memory implementations (no filesystem required)
 */

// FileLister
export { MemoryFileLister } from './file_lister/memory';

// FileWatcher
export { MemoryFileWatcher } from './file_watcher/memory';

// ModelStore
export { MemoryModelStore } from './model_store/memory';
