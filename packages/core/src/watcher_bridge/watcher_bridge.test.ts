import * as path from "path";
import { MemoryFileWatcher } from "../file_watcher/memory";
import { HandoffQueue } from "../handoff_queue";
import { createLogger } from "../logger";
import { MountSetupError, WatchRuntimeError } from "../union_mount/union_mount.errors";
import { classifyNativeEvent, toLogicalPath, watchSources } from "./watcher_bridge";
import type { QueuedEvent, WatcherBridgeDependencies } from "./watcher_bridge";

async function waitUntil(predicate: () => boolean): Promise<void> {
  for (let i = 0; i < 200 && !predicate(); i++) {
    await new Promise<void>((resolve) => setImmediate(resolve));
  }
  if (!predicate()) {
    throw new Error("condition never became true");
  }
}

describe("classifyNativeEvent", () => {
  it("should map native kinds to file actions", () => {
    expect(classifyNativeEvent("added")).toEqual({ type: "refresh", action: "new", payload: undefined });
    expect(classifyNativeEvent("modified")).toEqual({ type: "refresh", action: "update", payload: undefined });
    expect(classifyNativeEvent("removed")).toEqual({ type: "delete" });
    expect(classifyNativeEvent("unknown")).toEqual({ type: "delete" });
  });
});

describe("toLogicalPath", () => {
  it("should relativize paths under the root", () => {
    expect(toLogicalPath("/r1", path.join("/r1", "notes", "a.md"))).toBe("notes/a.md");
  });

  it("should keep paths outside the root absolute", () => {
    expect(toLogicalPath("/r1", "/elsewhere/a.md")).toBe("/elsewhere/a.md");
    expect(toLogicalPath("/r1", "/r10/a.md")).toBe("/r10/a.md");
  });
});

describe("watchSources", () => {
  let watcher: MemoryFileWatcher;
  let queue: HandoffQueue<QueuedEvent<string>>;
  let controller: AbortController;
  let deps: WatcherBridgeDependencies;

  beforeEach(() => {
    watcher = new MemoryFileWatcher();
    queue = new HandoffQueue();
    controller = new AbortController();
    deps = {
      fileWatcher: watcher,
      logger: createLogger("", "silent"),
      canonicalizePath: async (root) => root,
    };
  });

  it("should push classified events from every root onto the queue", async () => {
    const running = watchSources(
      [
        { source: "base", root: "/r1" },
        { source: "local", root: "/r2" },
      ],
      queue,
      deps,
      controller.signal
    );
    await waitUntil(() => watcher.isWatching("/r2"));

    watcher.emit("/r2", "added", "/r2/a.md");
    await expect(queue.take()).resolves.toEqual({
      source: "local",
      path: "a.md",
      action: { type: "refresh", action: "new", payload: undefined },
    });
    watcher.emit("/r1", "removed", "/r1/notes/b.md");
    await expect(queue.take()).resolves.toEqual({
      source: "base",
      path: "notes/b.md",
      action: { type: "delete" },
    });

    controller.abort();
    await expect(running).resolves.toBeUndefined();
    expect(watcher.activeRoots()).toEqual([]);
    expect(watcher.stopped).toBe(2);
  });

  it("should watch canonical roots and log monitoring", async () => {
    const info = jest.fn();
    deps = {
      ...deps,
      logger: { debug: jest.fn(), info, warn: jest.fn(), error: jest.fn() },
      canonicalizePath: async (root) => `/canonical${root}`,
    };

    const running = watchSources([{ source: "base", root: "/r1" }], queue, deps, controller.signal);
    await waitUntil(() => watcher.isWatching("/canonical/r1"));
    controller.abort();
    await running;

    expect(info.mock.calls).toEqual([["Monitoring /canonical/r1 for changes"], ["Stopping change monitor"]]);
  });

  it("should reject with MountSetupError when a root cannot be canonicalized", async () => {
    deps = {
      ...deps,
      canonicalizePath: async () => {
        throw new Error("ENOENT");
      },
    };

    await expect(
      watchSources([{ source: "base", root: "/missing" }], queue, deps, controller.signal)
    ).rejects.toThrow(new MountSetupError("/missing", new Error("ENOENT")));
  });

  it("should stop earlier subscriptions when a later root cannot be watched", async () => {
    watcher.failOnWatch("/r2", new Error("too many watchers"));

    const running = watchSources(
      [
        { source: "base", root: "/r1" },
        { source: "local", root: "/r2" },
      ],
      queue,
      deps,
      controller.signal
    );

    await expect(running).rejects.toBeInstanceOf(MountSetupError);
    await expect(running).rejects.toThrow("Failed to mount /r2: too many watchers");
    expect(watcher.activeRoots()).toEqual([]);
    expect(watcher.stopped).toBe(1);
  });

  it("should reject with WatchRuntimeError when a subscription fails", async () => {
    const running = watchSources([{ source: "base", root: "/r1" }], queue, deps, controller.signal);
    await waitUntil(() => watcher.isWatching("/r1"));

    watcher.fail("/r1", new Error("watch lost"));

    await expect(running).rejects.toBeInstanceOf(WatchRuntimeError);
    await expect(running).rejects.toMatchObject({ root: "/r1", message: "Watcher for /r1 failed: watch lost" });
    expect(watcher.activeRoots()).toEqual([]);
  });

  it("should resolve immediately when already aborted", async () => {
    controller.abort();

    await expect(
      watchSources([{ source: "base", root: "/r1" }], queue, deps, controller.signal)
    ).resolves.toBeUndefined();
    expect(watcher.stopped).toBe(0);
  });
});
