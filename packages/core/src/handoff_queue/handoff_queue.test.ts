import { HandoffQueue } from "./handoff_queue";
import { HandoffQueueClosedError } from "./handoff_queue.errors";

/** Lets pending promise callbacks run. */
const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

describe("HandoffQueue", () => {
  it("should accept one item without waiting when the slot is free", async () => {
    const queue = new HandoffQueue<number>();

    await expect(queue.put(1)).resolves.toBe(true);
    expect(queue.pending).toBe(1);
    await expect(queue.take()).resolves.toBe(1);
    expect(queue.pending).toBe(0);
  });

  it("should suspend a producer until the previous item is taken", async () => {
    const queue = new HandoffQueue<string>();
    let secondHandedOff = false;

    await queue.put("first");
    const second = queue.put("second").then((handedOff) => {
      secondHandedOff = handedOff;
    });
    await flush();
    expect(secondHandedOff).toBe(false);

    await expect(queue.take()).resolves.toBe("first");
    await second;
    expect(secondHandedOff).toBe(true);
    await expect(queue.take()).resolves.toBe("second");
  });

  it("should deliver items in put order across producers", async () => {
    const queue = new HandoffQueue<string>();
    const puts = ["a1", "b1", "a2", "c1", "b2"].map((item) => queue.put(item));

    const taken: string[] = [];
    for (let i = 0; i < 5; i++) {
      taken.push(await queue.take());
    }

    await Promise.all(puts);
    expect(taken).toEqual(["a1", "b1", "a2", "c1", "b2"]);
  });

  it("should hold every suspended producer while one item sits in the slot", async () => {
    const queue = new HandoffQueue<number>();
    const items = Array.from({ length: 200 }, (_, i) => i);
    const puts = items.map((item) => queue.put(item));
    await flush();

    expect(queue.pending).toBe(200);

    const taken: number[] = [];
    while (taken.length < items.length) {
      taken.push(await queue.take());
    }
    await expect(Promise.all(puts)).resolves.toEqual(items.map(() => true));
    expect(taken).toEqual(items);
  });

  it("should hand an item straight to a waiting consumer", async () => {
    const queue = new HandoffQueue<number>();
    const taken = queue.take();

    await expect(queue.put(7)).resolves.toBe(true);
    await expect(taken).resolves.toBe(7);
    expect(queue.pending).toBe(0);
  });

  it("should reject a waiting take with the abort reason", async () => {
    const queue = new HandoffQueue<number>();
    const controller = new AbortController();
    const reason = new Error("stop");
    const taken = queue.take(controller.signal);

    controller.abort(reason);

    await expect(taken).rejects.toBe(reason);
    await queue.put(1);
    await expect(queue.take()).resolves.toBe(1);
  });

  it("should release a suspended producer with false when aborted", async () => {
    const queue = new HandoffQueue<number>();
    const controller = new AbortController();

    await queue.put(1);
    const blocked = queue.put(2, controller.signal);
    controller.abort();

    await expect(blocked).resolves.toBe(false);
    expect(queue.pending).toBe(1);
    await expect(queue.take()).resolves.toBe(1);
  });

  it("should refuse puts and takes on an aborted signal", async () => {
    const queue = new HandoffQueue<number>();
    const controller = new AbortController();
    controller.abort();

    await expect(queue.put(1, controller.signal)).resolves.toBe(false);
    await expect(queue.take(controller.signal)).rejects.toBe(controller.signal.reason);
  });

  it("should release everyone on close", async () => {
    const queue = new HandoffQueue<number>();
    await queue.put(1);
    const blocked = queue.put(2);

    queue.close();

    await expect(blocked).resolves.toBe(false);
    await expect(queue.take()).resolves.toBe(1);
    await expect(queue.take()).rejects.toBeInstanceOf(HandoffQueueClosedError);
    await expect(queue.put(3)).resolves.toBe(false);
    expect(queue.isClosed).toBe(true);
  });

  it("should reject consumers waiting when the queue closes", async () => {
    const queue = new HandoffQueue<number>();
    const taken = queue.take();

    queue.close();

    await expect(taken).rejects.toBeInstanceOf(HandoffQueueClosedError);
  });
});
