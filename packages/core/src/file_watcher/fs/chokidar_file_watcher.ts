/**
 * ChokidarFileWatcher - chokidar-backed FileWatcher
 *
 * @module file_watcher/fs/chokidar_file_watcher
 */

import { watch, type FSWatcher, type WatchOptions } from "chokidar";
import type {
  ChokidarFileWatcherOptions,
  FileWatcher,
  NativeEventKind,
  WatchListener,
  WatchSubscription,
} from "../file_watcher";

const EVENT_KIND_MAP = {
  add: "added",
  change: "modified",
  unlink: "removed",
} as const satisfies Record<string, NativeEventKind>;

type ChokidarFileEvent = keyof typeof EVENT_KIND_MAP;

// Directory events are not forwarded: chokidar reports each contained file on its own.
const FILE_EVENTS: readonly ChokidarFileEvent[] = ["add", "change", "unlink"];

export class ChokidarFileWatcher implements FileWatcher {
  private readonly options: ChokidarFileWatcherOptions;

  constructor(options: ChokidarFileWatcherOptions = {}) {
    this.options = options;
  }

  async watch(root: string, listener: WatchListener): Promise<WatchSubscription> {
    const watcher = watch(root, this.buildOptions());

    await new Promise<void>((resolve, reject) => {
      const onSetupError = (error: Error) => {
        watcher.off("ready", onReady);
        void watcher.close().finally(() => reject(error));
      };
      const onReady = () => {
        watcher.off("error", onSetupError);
        resolve();
      };
      watcher.once("ready", onReady);
      watcher.once("error", onSetupError);
    });

    for (const eventName of FILE_EVENTS) {
      watcher.on(eventName, (filePath: string) => {
        listener.onEvent({ kind: EVENT_KIND_MAP[eventName], path: filePath });
      });
    }
    watcher.on("error", (error: Error) => listener.onError(error));

    return new ChokidarSubscription(root, watcher);
  }

  private buildOptions(): WatchOptions {
    const options: WatchOptions = {
      persistent: true,
      ignoreInitial: true,
      followSymlinks: true,
      usePolling: this.options.usePolling ?? false,
      interval: this.options.interval ?? 100,
    };
    if (this.options.stabilityThresholdMs !== undefined) {
      options.awaitWriteFinish = {
        stabilityThreshold: this.options.stabilityThresholdMs,
        pollInterval: Math.min(100, this.options.stabilityThresholdMs),
      };
    }
    return options;
  }
}

class ChokidarSubscription implements WatchSubscription {
  constructor(
    public readonly root: string,
    private readonly watcher: FSWatcher
  ) {}

  async stop(): Promise<void> {
    await this.watcher.close();
  }
}
