/**
 * MemoryFileWatcher - In-memory FileWatcher for testing
 *
 * Subscriptions are plain listener registrations; tests drive them with
 * `emit` and `fail`.
 *
 * @module file_watcher/memory/memory_file_watcher
 */

import type {
  FileWatcher,
  NativeEventKind,
  WatchListener,
  WatchSubscription,
} from "../file_watcher";

export class MemoryFileWatcher implements FileWatcher {
  private readonly listeners = new Map<string, WatchListener>();
  private readonly setupFailures = new Map<string, Error>();
  private stopCount = 0;

  async watch(root: string, listener: WatchListener): Promise<WatchSubscription> {
    const failure = this.setupFailures.get(root);
    if (failure) {
      throw failure;
    }
    this.listeners.set(root, listener);

    return {
      root,
      stop: async () => {
        if (this.listeners.get(root) === listener) {
          this.listeners.delete(root);
        }
        this.stopCount++;
      },
    };
  }

  /** Makes the next `watch(root)` reject with `error`. */
  failOnWatch(root: string, error: Error): void {
    this.setupFailures.set(root, error);
  }

  /** Delivers a native event to the subscription on `root`. */
  emit(root: string, kind: NativeEventKind, path: string): void {
    const listener = this.listeners.get(root);
    if (!listener) {
      throw new Error(`No active subscription on ${root}`);
    }
    listener.onEvent({ kind, path });
  }

  /** Reports a runtime failure on the subscription for `root`. */
  fail(root: string, error: Error): void {
    const listener = this.listeners.get(root);
    if (!listener) {
      throw new Error(`No active subscription on ${root}`);
    }
    listener.onError(error);
  }

  isWatching(root: string): boolean {
    return this.listeners.has(root);
  }

  activeRoots(): string[] {
    return [...this.listeners.keys()];
  }

  /** Number of subscriptions stopped so far. */
  get stopped(): number {
    return this.stopCount;
  }
}
