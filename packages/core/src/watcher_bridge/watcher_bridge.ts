/**
 * Watcher bridge: one native subscription per source root, all feeding one
 * hand-off queue.
 *
 * @module watcher_bridge
 */

import * as path from "path";
import { deletion, refresh } from "../change/change";
import type { FileAction, MountKey } from "../change/change.types";
import type { FileWatcher, NativeEventKind, WatchSubscription } from "../file_watcher";
import type { HandoffQueue } from "../handoff_queue";
import type { Logger } from "../logger";
import { MountSetupError, WatchRuntimeError, toError } from "../union_mount/union_mount.errors";

export interface MountSource<S extends MountKey> {
  source: S;
  /** Directory providing files for `source` */
  root: string;
}

/** An event waiting in the hand-off queue. */
export interface QueuedEvent<S extends MountKey> {
  source: S;
  /** Relative to the canonical root, or absolute if the file lies outside it */
  path: string;
  action: FileAction;
}

export interface WatcherBridgeDependencies {
  fileWatcher: FileWatcher;
  logger: Logger;
  canonicalizePath: (root: string) => Promise<string>;
}

export function classifyNativeEvent(kind: NativeEventKind): FileAction {
  switch (kind) {
    case "added":
      return refresh("new");
    case "modified":
      return refresh("update");
    case "removed":
    case "unknown":
      return deletion();
  }
}

/**
 * `absolutePath` relative to `root` with `/` separators. Paths outside
 * `root` (reached through a symlinked ancestor) are returned unchanged.
 */
export function toLogicalPath(root: string, absolutePath: string): string {
  const relative = path.relative(root, absolutePath);
  if (
    relative === "" ||
    relative === ".." ||
    relative.startsWith(`..${path.sep}`) ||
    path.isAbsolute(relative)
  ) {
    return absolutePath;
  }
  return relative.split(path.sep).join("/");
}

/**
 * Subscribes to every source root and pushes their events onto `queue` until
 * `signal` aborts. Rejects with {@link MountSetupError} if a root cannot be
 * subscribed, or {@link WatchRuntimeError} if a subscription fails later.
 * Every established subscription is stopped before this settles.
 */
export async function watchSources<S extends MountKey>(
  sources: ReadonlyArray<MountSource<S>>,
  queue: HandoffQueue<QueuedEvent<S>>,
  deps: WatcherBridgeDependencies,
  signal: AbortSignal
): Promise<void> {
  const { fileWatcher, logger, canonicalizePath } = deps;
  const subscriptions: WatchSubscription[] = [];
  let failure: WatchRuntimeError | undefined;
  let wake: (() => void) | undefined;

  try {
    for (const { source, root } of sources) {
      if (signal.aborted) break;

      let canonicalRoot: string;
      try {
        canonicalRoot = await canonicalizePath(root);
      } catch (error) {
        throw new MountSetupError(root, toError(error));
      }

      logger.info(`Monitoring ${canonicalRoot} for changes`);
      try {
        subscriptions.push(
          await fileWatcher.watch(canonicalRoot, {
            onEvent: (event) => {
              logger.debug(`${event.kind} ${event.path}`);
              const queued: QueuedEvent<S> = {
                source,
                path: toLogicalPath(canonicalRoot, event.path),
                action: classifyNativeEvent(event.kind),
              };
              void queue.put(queued, signal);
            },
            onError: (error) => {
              failure ??= new WatchRuntimeError(canonicalRoot, error);
              wake?.();
            },
          })
        );
      } catch (error) {
        throw new MountSetupError(canonicalRoot, toError(error));
      }
    }

    if (!failure && !signal.aborted) {
      await new Promise<void>((resolve) => {
        wake = resolve;
        signal.addEventListener("abort", () => resolve(), { once: true });
      });
    }

    if (failure) {
      throw failure;
    }
  } finally {
    logger.info("Stopping change monitor");
    await Promise.all(subscriptions.map((subscription) => subscription.stop()));
  }
}
