/**
 * ChokidarFileWatcher Tests
 *
 * Uses polling so the tests behave the same on every platform.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { ChokidarFileWatcher } from './chokidar_file_watcher';
import type { NativeFileEvent, WatchSubscription } from '../file_watcher';

jest.setTimeout(20000);

async function waitFor(predicate: () => boolean, timeoutMs = 10000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) {
      throw new Error('Timed out waiting for watcher events');
    }
    await new Promise((resolve) => setTimeout(resolve, 25));
  }
}

describe('ChokidarFileWatcher', () => {
  let tempDir: string;
  let subscription: WatchSubscription | undefined;
  let events: NativeFileEvent[];
  const watcher = new ChokidarFileWatcher({ usePolling: true, interval: 50 });

  beforeEach(async () => {
    tempDir = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'chokidar-watcher-test-')));
    events = [];
  });

  afterEach(async () => {
    await subscription?.stop();
    subscription = undefined;
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should not report files that existed before watching', async () => {
    await fs.writeFile(path.join(tempDir, 'existing.md'), 'old');

    subscription = await watcher.watch(tempDir, {
      onEvent: (event) => events.push(event),
      onError: jest.fn(),
    });
    await fs.writeFile(path.join(tempDir, 'marker.md'), 'x');
    await waitFor(() => events.length > 0);

    expect(events).toEqual([{ kind: 'added', path: path.join(tempDir, 'marker.md') }]);
  });

  it('should report additions, modifications and removals with absolute paths', async () => {
    const file = path.join(tempDir, 'a.md');
    subscription = await watcher.watch(tempDir, {
      onEvent: (event) => events.push(event),
      onError: jest.fn(),
    });

    await fs.writeFile(file, 'one');
    await waitFor(() => events.some((e) => e.kind === 'added'));
    await new Promise((resolve) => setTimeout(resolve, 200));
    await fs.writeFile(file, 'two, longer');
    await waitFor(() => events.some((e) => e.kind === 'modified'));
    await fs.unlink(file);
    await waitFor(() => events.some((e) => e.kind === 'removed'));

    expect(events.map((e) => e.path).every((p) => p === file)).toBe(true);
    expect(events[0]).toEqual({ kind: 'added', path: file });
    expect(events[events.length - 1]).toEqual({ kind: 'removed', path: file });
  });

  it('should watch nested directories', async () => {
    await fs.mkdir(path.join(tempDir, 'notes'));
    subscription = await watcher.watch(tempDir, {
      onEvent: (event) => events.push(event),
      onError: jest.fn(),
    });

    const nested = path.join(tempDir, 'notes', 'b.md');
    await fs.writeFile(nested, 'b');
    await waitFor(() => events.length > 0);

    expect(events[0]).toEqual({ kind: 'added', path: nested });
  });

  it('should report files of a removed directory, not the directory itself', async () => {
    const dir = path.join(tempDir, 'sub');
    const file = path.join(dir, 'x.md');
    await fs.mkdir(dir);
    await fs.writeFile(file, 'x');
    subscription = await watcher.watch(tempDir, {
      onEvent: (event) => events.push(event),
      onError: jest.fn(),
    });

    await fs.rm(dir, { recursive: true });
    await waitFor(() => events.some((e) => e.kind === 'removed'));
    await new Promise((resolve) => setTimeout(resolve, 300));

    expect(events).toEqual([{ kind: 'removed', path: file }]);
  });

  it('should stop delivering events after stop', async () => {
    subscription = await watcher.watch(tempDir, {
      onEvent: (event) => events.push(event),
      onError: jest.fn(),
    });
    await subscription.stop();
    subscription = undefined;

    await fs.writeFile(path.join(tempDir, 'late.md'), 'x');
    await new Promise((resolve) => setTimeout(resolve, 300));

    expect(events).toEqual([]);
  });
});
