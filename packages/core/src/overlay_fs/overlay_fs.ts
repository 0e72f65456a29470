import type { MountKey, OverlayFiles, OverlaySource } from "../change/change.types";

/** Total order over mount keys: numbers before strings, then natural order. */
export function compareKeys(a: MountKey, b: MountKey): number {
  if (typeof a !== typeof b) {
    return typeof a === "number" ? -1 : 1;
  }
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Tracks, per logical path, which sources currently provide it.
 *
 * A path whose last source is removed is dropped entirely, so every key
 * present maps to a non-empty set.
 */
export class OverlayFs<S extends MountKey> {
  private readonly entries = new Map<string, Set<S>>();

  add(path: string, source: S): void {
    const sources = this.entries.get(path);
    if (sources) {
      sources.add(source);
    } else {
      this.entries.set(path, new Set([source]));
    }
  }

  remove(path: string, source: S): void {
    const sources = this.entries.get(path);
    if (!sources) return;

    sources.delete(source);
    if (sources.size === 0) {
      this.entries.delete(path);
    }
  }

  /** Overlay files for `path`, ordered by source; `undefined` if nothing provides it. */
  lookup(path: string): OverlayFiles<S> | undefined {
    const [first, ...rest] = this.sourcesOf(path).map((source): OverlaySource<S> => ({ source, path }));
    return first ? [first, ...rest] : undefined;
  }

  sourcesOf(path: string): S[] {
    const sources = this.entries.get(path);
    return sources ? [...sources].sort(compareKeys) : [];
  }

  has(path: string): boolean {
    return this.entries.has(path);
  }

  paths(): string[] {
    return [...this.entries.keys()];
  }

  get size(): number {
    return this.entries.size;
  }
}
