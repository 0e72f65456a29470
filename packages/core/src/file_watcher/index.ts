export type {
  ChokidarFileWatcherOptions,
  FileWatcher,
  NativeEventKind,
  NativeFileEvent,
  WatchListener,
  WatchSubscription,
} from "./file_watcher";
