/**
 * Keys used for sources and tags. Only equality and ordering are relied upon,
 * so anything usable as a `Map` key by value works.
 */
export type MountKey = string | number;

/** Why a non-delete event is being reported. */
export type RefreshAction =
  /** No recent change; the file was found during the initial scan. */
  | "existing"
  /** A new file was created. */
  | "new"
  /** An existing file was updated. */
  | "update";

export type FileAction<P = undefined> =
  | { type: "refresh"; action: RefreshAction; payload: P }
  | { type: "delete" };

/** One physical provider of a logical path. */
export interface OverlaySource<S extends MountKey> {
  source: S;
  path: string;
}

/** Every source currently providing a logical path, ordered by source. */
export type OverlayFiles<S extends MountKey> = readonly [OverlaySource<S>, ...OverlaySource<S>[]];

/**
 * One batch delivered to a mount handler: tag -> logical path -> action.
 *
 * Refresh entries carry the full current overlay of the path, not a diff.
 * It is up to the consumer to union the overlay files.
 */
export type Change<S extends MountKey, T extends MountKey> = Map<T, Map<string, FileAction<OverlayFiles<S>>>>;

/** JSON-friendly form of a {@link Change}. */
export type SerializedFileAction =
  | { type: "refresh"; action: RefreshAction; files: Array<{ source: MountKey; path: string }> }
  | { type: "delete" };

export type SerializedChange = Record<string, Record<string, SerializedFileAction>>;
