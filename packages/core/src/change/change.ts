import type {
  Change,
  FileAction,
  MountKey,
  OverlayFiles,
  RefreshAction,
  SerializedChange,
  SerializedFileAction,
} from "./change.types";
import { compareKeys } from "../overlay_fs/overlay_fs";

export function refresh(action: RefreshAction): FileAction;
export function refresh<P>(action: RefreshAction, payload: P): FileAction<P>;
export function refresh<P>(action: RefreshAction, payload?: P): FileAction<P | undefined> {
  return { type: "refresh", action, payload };
}

export function deletion<P = undefined>(): FileAction<P> {
  return { type: "delete" };
}

export function refreshActionOf<P>(action: FileAction<P>): RefreshAction | undefined {
  return action.type === "refresh" ? action.action : undefined;
}

export function emptyChange<S extends MountKey, T extends MountKey>(): Change<S, T> {
  return new Map();
}

/**
 * Copy of `change` with tags ordered by {@link compareKeys} and the paths of
 * each tag in ascending order. Batches are delivered in this order.
 */
export function sortChange<S extends MountKey, T extends MountKey>(change: Change<S, T>): Change<S, T> {
  const sorted = emptyChange<S, T>();
  for (const tag of [...change.keys()].sort(compareKeys)) {
    const files = change.get(tag);
    if (!files) continue;
    sorted.set(tag, new Map([...files].sort(([a], [b]) => compareKeys(a, b))));
  }
  return sorted;
}

/** Number of path entries across all tags. */
export function changeSize<S extends MountKey, T extends MountKey>(change: Change<S, T>): number {
  let size = 0;
  for (const files of change.values()) {
    size += files.size;
  }
  return size;
}

function serializeFileAction<S extends MountKey>(action: FileAction<OverlayFiles<S>>): SerializedFileAction {
  if (action.type === "delete") {
    return { type: "delete" };
  }
  return {
    type: "refresh",
    action: action.action,
    files: action.payload.map(({ source, path }) => ({ source, path })),
  };
}

export function serializeChange<S extends MountKey, T extends MountKey>(change: Change<S, T>): SerializedChange {
  const result: SerializedChange = {};
  for (const [tag, files] of change) {
    const entries: Record<string, SerializedFileAction> = {};
    for (const [path, action] of files) {
      entries[path] = serializeFileAction(action);
    }
    result[String(tag)] = entries;
  }
  return result;
}
