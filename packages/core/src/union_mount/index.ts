export { UnionMountModule, unionMount } from "./union_mount";
export { runTaskPair } from "./task_pair";
export type { CancellableTask } from "./task_pair";
export type {
  ChangeHandler,
  UnionMountDependencies,
  UnionMountOptions,
  UnionMountPhase,
  UnionMountStatus,
} from "./union_mount.types";
export {
  UnionMountError,
  MountSetupError,
  WatchRuntimeError,
  MountAlreadyRunningError,
  isUnionMountError,
  isMountSetupError,
  isWatchRuntimeError,
  isMountAlreadyRunningError,
} from "./union_mount.errors";
