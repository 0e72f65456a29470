/**
 * HandoffQueue - single-slot handoff between producers and one consumer
 *
 * The slot holds one item. A producer whose item finds the slot occupied
 * stays suspended until the consumer has taken the previous item; suspended
 * producers are released in the order they arrived, so the consumer sees
 * items in `put` order. The list of suspended producers is unbounded, since
 * watcher callbacks cannot block.
 *
 * @module handoff_queue
 */

import { HandoffQueueClosedError } from "./handoff_queue.errors";

interface PendingProducer<T> {
  item: T;
  resolve: (handedOff: boolean) => void;
  detach: () => void;
}

interface PendingConsumer<T> {
  resolve: (item: T) => void;
  reject: (reason: unknown) => void;
  detach: () => void;
}

function onAbort(signal: AbortSignal | undefined, listener: () => void): () => void {
  if (!signal) return () => undefined;
  signal.addEventListener("abort", listener, { once: true });
  return () => signal.removeEventListener("abort", listener);
}

export class HandoffQueue<T> {
  private slot: { item: T } | undefined;
  private readonly producers: PendingProducer<T>[] = [];
  private readonly consumers: PendingConsumer<T>[] = [];
  private closed = false;

  /**
   * Offers `item` to the consumer.
   *
   * Resolves `true` once the item sits in the slot or has been handed to a
   * waiting consumer, `false` if the queue closed or `signal` aborted first.
   */
  put(item: T, signal?: AbortSignal): Promise<boolean> {
    if (this.closed || signal?.aborted) {
      return Promise.resolve(false);
    }

    const consumer = this.consumers.shift();
    if (consumer) {
      consumer.detach();
      consumer.resolve(item);
      return Promise.resolve(true);
    }

    if (!this.slot) {
      this.slot = { item };
      return Promise.resolve(true);
    }

    return new Promise<boolean>((resolve) => {
      const producer: PendingProducer<T> = {
        item,
        resolve,
        detach: onAbort(signal, () => {
          this.forget(this.producers, producer);
          resolve(false);
        }),
      };
      this.producers.push(producer);
    });
  }

  /** Takes the next item, suspending until one is available. Rejects with the abort reason if `signal` fires first. */
  take(signal?: AbortSignal): Promise<T> {
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }

    if (this.slot) {
      const { item } = this.slot;
      this.slot = undefined;
      this.promoteProducer();
      return Promise.resolve(item);
    }

    if (this.closed) {
      return Promise.reject(new HandoffQueueClosedError());
    }

    return new Promise<T>((resolve, reject) => {
      const consumer: PendingConsumer<T> = {
        resolve,
        reject,
        detach: onAbort(signal, () => {
          this.forget(this.consumers, consumer);
          reject(signal?.reason);
        }),
      };
      this.consumers.push(consumer);
    });
  }

  /** Releases every suspended producer with `false` and rejects every waiting consumer. */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    for (const producer of this.producers.splice(0)) {
      producer.detach();
      producer.resolve(false);
    }
    for (const consumer of this.consumers.splice(0)) {
      consumer.detach();
      consumer.reject(new HandoffQueueClosedError());
    }
  }

  /** Items waiting: the slot plus suspended producers. */
  get pending(): number {
    return (this.slot ? 1 : 0) + this.producers.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  private promoteProducer(): void {
    const producer = this.producers.shift();
    if (!producer) return;

    producer.detach();
    this.slot = { item: producer.item };
    producer.resolve(true);
  }

  private forget<E>(list: E[], entry: E): void {
    const index = list.indexOf(entry);
    if (index >= 0) list.splice(index, 1);
  }
}
