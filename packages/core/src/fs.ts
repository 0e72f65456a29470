/**
 * Filesystem-dependent implementations
 *
 * Everything here touches the real filesystem. Use the memory
 * implementations for tests and in-process embedding.
 */

// FileLister
export { FsFileLister } from './file_lister/fs';

// FileWatcher
export { ChokidarFileWatcher } from './file_watcher/fs';

// Config
export { loadMountConfig, DEFAULT_CONFIG_FILE } from './config';
