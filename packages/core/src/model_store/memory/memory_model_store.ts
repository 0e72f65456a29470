/**
 * MemoryModelStore - in-process ModelStore
 *
 * Updates are applied one at a time in call order. A `modify` issued
 * before the first `set` is held back and applied right after it.
 */

import { logger as defaultLogger } from "../../logger";
import type { Logger } from "../../logger";
import type { ModelListener, ModelStore } from "../model_store";

type Slot<M> = { value: M } | undefined;

export class MemoryModelStore<M> implements ModelStore<M> {
  private slot: Slot<M>;
  private readonly deferred: Array<(model: M) => M> = [];
  private readonly readers: Array<(model: M) => void> = [];
  private readonly listeners = new Set<ModelListener<M>>();
  private readonly logger: Logger;
  private version = 0;

  constructor(options: { initial?: M; logger?: Logger } = {}) {
    this.logger = options.logger ?? defaultLogger;
    if (options.initial !== undefined) {
      this.slot = { value: options.initial };
    }
  }

  async set(value: M): Promise<void> {
    let model = value;
    for (const fn of this.deferred.splice(0)) {
      model = fn(model);
    }
    this.commit(model);
  }

  async modify(fn: (model: M) => M): Promise<void> {
    if (!this.slot) {
      this.deferred.push(fn);
      return;
    }
    this.commit(fn(this.slot.value));
  }

  read(): Promise<M> {
    if (this.slot) {
      return Promise.resolve(this.slot.value);
    }
    return new Promise<M>((resolve) => {
      this.readers.push(resolve);
    });
  }

  /** Current value without waiting. */
  peek(): M | undefined {
    return this.slot?.value;
  }

  isSet(): boolean {
    return this.slot !== undefined;
  }

  /** Number of updates committed so far. */
  getVersion(): number {
    return this.version;
  }

  /** Modifications waiting for the first `set`. */
  get pendingModifications(): number {
    return this.deferred.length;
  }

  /** Calls `listener` after every committed update. Returns an unsubscribe function. */
  subscribe(listener: ModelListener<M>): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private commit(model: M): void {
    this.slot = { value: model };
    this.version++;

    for (const resolve of this.readers.splice(0)) {
      resolve(model);
    }
    for (const listener of this.listeners) {
      try {
        listener(model);
      } catch (error) {
        this.logger.error(`Model listener failed: ${error instanceof Error ? error.message : String(error)}`);
      }
    }
  }
}
