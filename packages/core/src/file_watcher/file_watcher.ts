/**
 * FileWatcher Interface
 *
 * Native filesystem notifications for one directory tree. Events carry
 * absolute paths; translating them into logical paths is up to the caller.
 *
 * Implementations:
 * - ChokidarFileWatcher: chokidar (file_watcher/fs/)
 * - MemoryFileWatcher: events emitted by hand, for tests (file_watcher/memory/)
 *
 * @module file_watcher
 */

export type NativeEventKind = "added" | "modified" | "removed" | "unknown";

export interface NativeFileEvent {
  kind: NativeEventKind;
  /** Absolute path of the affected file */
  path: string;
}

export interface WatchListener {
  onEvent(event: NativeFileEvent): void;
  /** Called when the subscription fails after it was established */
  onError(error: Error): void;
}

export interface WatchSubscription {
  readonly root: string;
  /** Stop delivering events and release native resources */
  stop(): Promise<void>;
}

export interface FileWatcher {
  /**
   * Starts watching `root` recursively. Resolves once the subscription is
   * live; rejects if it cannot be established.
   */
  watch(root: string, listener: WatchListener): Promise<WatchSubscription>;
}

export interface ChokidarFileWatcherOptions {
  /** Poll instead of using native events (network drives, containers). Default: false */
  usePolling?: boolean;
  /** Polling interval in ms when `usePolling` is set. Default: 100 */
  interval?: number;
  /** Hold `added`/`modified` until the file size is stable for this many ms. Default: off */
  stabilityThresholdMs?: number;
}
