/**
 * UnionMountModule - overlays several directory trees into one namespace
 *
 * Delivers one batch describing every matching file across all sources,
 * then one batch per accepted filesystem event, in arrival order, until
 * stopped.
 *
 * @module union_mount
 */

import { realpath } from "fs/promises";
import { recordChange } from "../change/change_aggregator";
import { emptyChange, refresh, sortChange } from "../change/change";
import type { Change, MountKey } from "../change/change.types";
import { filesMatchingWithTag } from "../file_lister/files_matching";
import type { FileLister } from "../file_lister";
import type { FileWatcher } from "../file_watcher";
import { HandoffQueue } from "../handoff_queue";
import { logger as defaultLogger } from "../logger";
import type { Logger } from "../logger";
import { OverlayFs } from "../overlay_fs";
import { TagResolver } from "../tag_resolver";
import { watchSources } from "../watcher_bridge";
import type { QueuedEvent } from "../watcher_bridge";
import { runTaskPair } from "./task_pair";
import { MountAlreadyRunningError, toError } from "./union_mount.errors";
import type {
  ChangeHandler,
  UnionMountDependencies,
  UnionMountOptions,
  UnionMountPhase,
  UnionMountStatus,
} from "./union_mount.types";

export class UnionMountModule<S extends MountKey, T extends MountKey> {
  private readonly fileLister: FileLister;
  private readonly fileWatcher: FileWatcher;
  private readonly options: UnionMountOptions<S, T>;
  private readonly ignore: readonly string[];
  private readonly logger: Logger;
  private readonly canonicalizePath: (root: string) => Promise<string>;
  private readonly resolver: TagResolver<T>;
  private overlay = new OverlayFs<S>();
  private phase: UnionMountPhase = "idle";
  private batchesDelivered = 0;
  private eventsDropped = 0;
  private lastError?: Error;

  constructor(deps: UnionMountDependencies<S, T>) {
    this.fileLister = deps.fileLister;
    this.fileWatcher = deps.fileWatcher;
    this.options = deps.options;
    this.ignore = deps.options.ignore ?? [];
    this.logger = deps.logger ?? defaultLogger;
    this.canonicalizePath = deps.canonicalizePath ?? ((root) => realpath(root));
    this.resolver = new TagResolver(deps.options.patterns, this.ignore);
  }

  /**
   * Scans every source, hands the initial batch to `handler`, then watches
   * all sources until `signal` aborts (resolves) or a listing, subscription,
   * watcher or handler failure stops the mount (rejects).
   */
  async run(handler: ChangeHandler<S, T>, signal?: AbortSignal): Promise<void> {
    if (this.phase === "scanning" || this.phase === "watching") {
      throw new MountAlreadyRunningError();
    }

    const controller = new AbortController();
    const stop = () => controller.abort();
    if (signal?.aborted) {
      controller.abort();
    } else {
      signal?.addEventListener("abort", stop, { once: true });
    }

    this.overlay = new OverlayFs<S>();
    this.lastError = undefined;
    const queue = new HandoffQueue<QueuedEvent<S>>();

    try {
      this.phase = "scanning";
      const initial = await this.scan();
      await this.deliver(handler, initial);

      this.phase = "watching";
      await runTaskPair(
        controller,
        (taskSignal) =>
          watchSources(this.options.sources, queue, {
            fileWatcher: this.fileWatcher,
            logger: this.logger,
            canonicalizePath: this.canonicalizePath,
          }, taskSignal),
        (taskSignal) => this.consume(queue, handler, taskSignal)
      );
      this.phase = "stopped";
    } catch (error) {
      this.phase = "failed";
      this.lastError = toError(error);
      throw error;
    } finally {
      queue.close();
      signal?.removeEventListener("abort", stop);
    }
  }

  getStatus(): UnionMountStatus<S> {
    return {
      phase: this.phase,
      sources: this.options.sources.map(({ source }) => source),
      trackedPaths: this.overlay.size,
      batchesDelivered: this.batchesDelivered,
      eventsDropped: this.eventsDropped,
      lastError: this.lastError,
    };
  }

  /** Sources currently providing `path`, ordered by source. */
  sourcesOf(path: string): S[] {
    return this.overlay.sourcesOf(path);
  }

  /** One batch covering every matching file of every source. */
  private async scan(): Promise<Change<S, T>> {
    const change = emptyChange<S, T>();
    for (const { source, root } of this.options.sources) {
      const tagged = await filesMatchingWithTag(
        this.fileLister,
        root,
        this.options.patterns,
        this.ignore,
        this.logger
      );
      for (const { tag, files } of tagged) {
        for (const file of files) {
          recordChange(this.overlay, change, source, tag, file, refresh("existing"));
        }
      }
    }
    return change;
  }

  private async consume(
    queue: HandoffQueue<QueuedEvent<S>>,
    handler: ChangeHandler<S, T>,
    signal: AbortSignal
  ): Promise<void> {
    while (!signal.aborted) {
      let event: QueuedEvent<S>;
      try {
        event = await queue.take(signal);
      } catch (error) {
        if (signal.aborted) return;
        throw error;
      }

      const tag = this.resolver.isIgnored(event.path) ? undefined : this.resolver.resolve(event.path);
      if (tag === undefined) {
        this.eventsDropped++;
        continue;
      }

      const change = emptyChange<S, T>();
      recordChange(this.overlay, change, event.source, tag, event.path, event.action);
      await this.deliver(handler, change);
    }
  }

  private async deliver(handler: ChangeHandler<S, T>, change: Change<S, T>): Promise<void> {
    await handler(sortChange(change));
    this.batchesDelivered++;
  }
}

/**
 * Function form of {@link UnionMountModule.run}.
 *
 * @example
 * ```typescript
 * const controller = new AbortController();
 * await unionMount(
 *   {
 *     fileLister: new FsFileLister(),
 *     fileWatcher: new ChokidarFileWatcher(),
 *     options: {
 *       sources: [{ source: 'base', root: './content' }, { source: 'local', root: './overrides' }],
 *       patterns: [{ tag: 'doc', pattern: '**\/*.md' }],
 *       ignore: ['**\/drafts/**'],
 *     },
 *   },
 *   (change) => console.log(serializeChange(change)),
 *   controller.signal
 * );
 * ```
 */
export function unionMount<S extends MountKey, T extends MountKey>(
  deps: UnionMountDependencies<S, T>,
  handler: ChangeHandler<S, T>,
  signal?: AbortSignal
): Promise<void> {
  return new UnionMountModule(deps).run(handler, signal);
}
