export * from "./logger";

// Data model and aggregation
export * from "./change";
export * from "./overlay_fs";
export * from "./tag_resolver";
export * from "./handoff_queue";

// External interfaces
export * from "./file_lister";
export * from "./file_watcher";
export * from "./model_store";

// Mounting
export * from "./watcher_bridge";
export * from "./union_mount";
export * from "./mount_driver";
export { Mutex } from "./utils/mutex";

// Config
export { parseMountConfig, MountConfigError, isMountConfigError } from "./config";
export type { MountConfig, MountConfigFile } from "./config";

// Implementations
export * from "./fs";
export * from "./memory";
