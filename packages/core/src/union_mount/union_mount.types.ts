import type { Change, MountKey } from "../change/change.types";
import type { FileLister } from "../file_lister";
import type { FileWatcher } from "../file_watcher";
import type { Logger } from "../logger";
import type { TagPattern } from "../tag_resolver";
import type { MountSource } from "../watcher_bridge";

export interface UnionMountOptions<S extends MountKey, T extends MountKey> {
  /** Roots to union, one per source key */
  sources: ReadonlyArray<MountSource<S>>;
  /** Only files selected by one of these are tracked; first match picks the tag */
  patterns: ReadonlyArray<TagPattern<T>>;
  /** Files matching any of these are never tracked */
  ignore?: readonly string[];
}

export interface UnionMountDependencies<S extends MountKey, T extends MountKey> {
  fileLister: FileLister;
  fileWatcher: FileWatcher;
  options: UnionMountOptions<S, T>;
  logger?: Logger;
  /** Resolves symlinks in a root before it is watched. Default: fs.realpath */
  canonicalizePath?: (root: string) => Promise<string>;
}

/** Receives every batch; the next batch is not built until the returned promise settles. */
export type ChangeHandler<S extends MountKey, T extends MountKey> = (change: Change<S, T>) => void | Promise<void>;

export type UnionMountPhase = "idle" | "scanning" | "watching" | "stopped" | "failed";

export interface UnionMountStatus<S extends MountKey> {
  phase: UnionMountPhase;
  sources: S[];
  /** Logical paths currently provided by at least one source */
  trackedPaths: number;
  batchesDelivered: number;
  /** Native events dropped because they were ignored or matched no tag */
  eventsDropped: number;
  lastError: Error | undefined;
}
