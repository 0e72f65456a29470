/**
 * Model update driver
 *
 * Turns every batch of a union mount into an update of a ModelStore: the
 * first batch initializes the store with `set`, later ones go through
 * `modify`. Handler faults are logged and treated as "no change"; they never
 * stop the mount.
 *
 * @module mount_driver
 */

import { deletion, refresh, sortChange } from "../change/change";
import type { Change, FileAction, MountKey } from "../change/change.types";
import { logger as defaultLogger } from "../logger";
import type { Logger } from "../logger";
import type { ModelStore } from "../model_store";
import type { UnionMountDependencies } from "../union_mount";
import { UnionMountModule } from "../union_mount/union_mount";
import type { TagPattern } from "../tag_resolver";
import { Mutex } from "../utils/mutex";
import { describeError, orFallback } from "./intercept";
import type {
  ChangeToTransform,
  DriverState,
  FileToTransform,
  ModelTransform,
  MountDriverOptions,
} from "./mount_driver.types";

function identity<M>(model: M): M {
  return model;
}

export class ModelUpdateDriver<S extends MountKey, T extends MountKey, M> {
  private state: DriverState = "awaiting-initial-set";
  private readonly mutex = new Mutex();
  private readonly logger: Logger;

  constructor(
    private readonly store: ModelStore<M>,
    private readonly model0: M,
    private readonly handle: ChangeToTransform<S, T, M>,
    logger?: Logger
  ) {
    this.logger = logger ?? defaultLogger;
  }

  /** Applies one batch. Concurrent batches are handled and stored one at a time, in call order. */
  async apply(change: Change<S, T>): Promise<void> {
    await this.mutex.runExclusive(async () => {
      const transform = await orFallback<ModelTransform<M>>(() => this.handle(change), identity, this.logger);
      const update = this.guard(transform);
      const previous = this.state;
      try {
        if (previous === "awaiting-initial-set") {
          await this.store.set(update(this.model0));
        } else {
          await this.store.modify(update);
        }
      } finally {
        this.state = "initialized";
      }
    });
  }

  getState(): DriverState {
    return this.state;
  }

  /** A transform that throws while being applied leaves the model as it was. */
  private guard(transform: ModelTransform<M>): ModelTransform<M> {
    return (model) => {
      try {
        return transform(model);
      } catch (error) {
        this.logger.error(`User exception: ${describeError(error)}`);
        return model;
      }
    };
  }
}

/**
 * Runs `mount` and keeps `store` in sync with it.
 *
 * NOTE: `store` must not hold a value yet; the first batch overwrites it with
 * the update applied to `model0`.
 */
export function unionMountOnStore<S extends MountKey, T extends MountKey, M>(
  mount: UnionMountModule<S, T>,
  store: ModelStore<M>,
  model0: M,
  handle: ChangeToTransform<S, T, M>,
  options: MountDriverOptions = {}
): Promise<void> {
  const driver = new ModelUpdateDriver(store, model0, handle, options.logger);
  return mount.run((change) => driver.apply(change), options.signal);
}

export const DEFAULT_SOURCE = "default";

/** Applies `transforms` left to right. */
export function chainTransforms<M>(transforms: ReadonlyArray<ModelTransform<M>>): ModelTransform<M> {
  return (model) => transforms.reduce((acc, transform) => transform(acc), model);
}

function withoutPayload<P>(action: FileAction<P>): FileAction {
  return action.type === "refresh" ? refresh(action.action) : deletion();
}

/**
 * Single-source form of {@link unionMountOnStore}: `perFile` is called for
 * every file of a batch, tag by tag then path by path in ascending order, and
 * the resulting updates are applied in that order.
 */
export function mountOnStore<T extends MountKey, M>(
  deps: Omit<UnionMountDependencies<typeof DEFAULT_SOURCE, T>, "options">,
  root: string,
  patterns: ReadonlyArray<TagPattern<T>>,
  ignore: readonly string[],
  store: ModelStore<M>,
  model0: M,
  perFile: FileToTransform<T, M>,
  options: MountDriverOptions = {}
): Promise<void> {
  const mount = new UnionMountModule<typeof DEFAULT_SOURCE, T>({
    ...deps,
    logger: deps.logger ?? options.logger,
    options: { sources: [{ source: DEFAULT_SOURCE, root }], patterns, ignore },
  });

  return unionMountOnStore(
    mount,
    store,
    model0,
    async (change) => {
      const transforms: ModelTransform<M>[] = [];
      for (const [tag, files] of sortChange(change)) {
        for (const [path, action] of files) {
          transforms.push(await perFile(tag, path, withoutPayload(action)));
        }
      }
      return chainTransforms(transforms);
    },
    options
  );
}
