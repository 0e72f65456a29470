import type { OverlayFs } from "../overlay_fs";
import { refreshActionOf } from "./change";
import type { Change, FileAction, MountKey, OverlayFiles } from "./change.types";

/**
 * Registers one event from `source` in the overlay, then records the path's
 * resulting state in `change` under `tag`.
 *
 * The recorded refresh carries the whole overlay of the path. Per-source
 * action history is not tracked, so a delete on a path that other sources
 * still provide is reported as `existing`. A later event for the same path in
 * the same batch overwrites the earlier entry.
 */
export function recordChange<S extends MountKey, T extends MountKey>(
  overlay: OverlayFs<S>,
  change: Change<S, T>,
  source: S,
  tag: T,
  path: string,
  action: FileAction
): void {
  if (action.type === "delete") {
    overlay.remove(path, source);
  } else {
    overlay.add(path, source);
  }

  const files = overlay.lookup(path);
  const result: FileAction<OverlayFiles<S>> = files
    ? { type: "refresh", action: refreshActionOf(action) ?? "existing", payload: files }
    : { type: "delete" };

  const byPath = change.get(tag);
  if (byPath) {
    byPath.set(path, result);
  } else {
    change.set(tag, new Map([[path, result]]));
  }
}
