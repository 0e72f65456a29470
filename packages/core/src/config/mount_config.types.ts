import type { ChokidarFileWatcherOptions } from "../file_watcher";
import type { LogLevel } from "../logger";
import type { TagPattern } from "../tag_resolver";
import type { MountSource } from "../watcher_bridge";

/** Configuration file contents as written on disk. */
export interface MountConfigFile {
  sources: Array<{ name: string; root: string }>;
  patterns: Array<{ tag: string; pattern: string }>;
  ignore?: string[];
  logLevel?: LogLevel;
  watch?: ChokidarFileWatcherOptions;
}

/** Validated configuration with roots resolved to absolute paths. */
export interface MountConfig {
  sources: MountSource<string>[];
  patterns: TagPattern<string>[];
  ignore: string[];
  logLevel?: LogLevel;
  watch: ChokidarFileWatcherOptions;
}
