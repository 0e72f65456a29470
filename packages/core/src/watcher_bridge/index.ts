export { watchSources, classifyNativeEvent, toLogicalPath } from "./watcher_bridge";
export type { MountSource, QueuedEvent, WatcherBridgeDependencies } from "./watcher_bridge";
