export { MemoryFileWatcher } from "./memory_file_watcher";
