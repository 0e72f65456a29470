/**
 * ModelStore Interface
 *
 * Reactive container the mount driver writes into. Readers observe a
 * linear sequence of completed `set`/`modify` calls.
 *
 * Implementations:
 * - MemoryModelStore: in-process value with subscriber fan-out (model_store/memory/)
 *
 * @module model_store
 */

export interface ModelStore<M> {
  /** Replaces the current value (or provides the first one). */
  set(value: M): Promise<void>;

  /** Replaces the current value with `fn(current)`. */
  modify(fn: (model: M) => M): Promise<void>;

  /** The current value; waits until the store holds one. */
  read(): Promise<M>;
}

export type ModelListener<M> = (model: M) => void;
