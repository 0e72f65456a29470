import type { Change, FileAction, MountKey } from "../change/change.types";
import type { Logger } from "../logger";

export type ModelTransform<M> = (model: M) => M;

/** Builds the model update for one batch. May throw; faults are logged and ignored. */
export type ChangeToTransform<S extends MountKey, T extends MountKey, M> = (
  change: Change<S, T>
) => ModelTransform<M> | Promise<ModelTransform<M>>;

/** Per-file form used by single-source mounts. */
export type FileToTransform<T extends MountKey, M> = (
  tag: T,
  path: string,
  action: FileAction
) => ModelTransform<M> | Promise<ModelTransform<M>>;

/**
 * `awaiting-initial-set` until the first batch has been handled, whether or
 * not its handler failed; `initialized` from then on.
 */
export type DriverState = "awaiting-initial-set" | "initialized";

export type Intercepted<A> = { ok: true; value: A } | { ok: false; error: unknown };

export interface MountDriverOptions {
  logger?: Logger;
  signal?: AbortSignal;
}
