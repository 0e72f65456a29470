/**
 * MemoryFileLister - In-memory FileLister for testing
 *
 * Serves listings from a map of root -> relative paths, filtered with
 * picomatch. No I/O; roots are used as given (no canonicalization).
 *
 * @module file_lister/memory/memory_file_lister
 */

import picomatch from 'picomatch';
import type { FileLister, MemoryFileListerOptions } from '../file_lister';
import { FileListerError } from '../file_lister.errors';

/**
 * Matches file paths against multiple glob patterns using picomatch.
 */
function matchPatterns(patterns: readonly string[], filePaths: string[]): string[] {
  if (!patterns.length) return [];
  const isMatch = picomatch([...patterns], { dot: true });
  return filePaths.filter(filePath => isMatch(filePath));
}

/**
 * Filters out files matching ignore patterns.
 */
function filterIgnored(filePaths: string[], ignorePatterns: readonly string[]): string[] {
  if (!ignorePatterns.length) return filePaths;
  const isIgnored = picomatch([...ignorePatterns], { dot: true });
  return filePaths.filter(filePath => !isIgnored(filePath));
}

/**
 * @example
 * ```typescript
 * const lister = new MemoryFileLister({
 *   roots: {
 *     '/r1': ['a.md'],
 *     '/r2': ['a.md', 'b.md'],
 *   },
 * });
 * await lister.list('/r2', ['*.md'], []); // ['a.md', 'b.md']
 * ```
 */
export class MemoryFileLister implements FileLister {
  private readonly roots: Map<string, string[]>;

  constructor(options: MemoryFileListerOptions = {}) {
    if (options.roots instanceof Map) {
      this.roots = new Map(options.roots);
    } else if (options.roots) {
      this.roots = new Map(Object.entries(options.roots));
    } else {
      this.roots = new Map();
    }
  }

  async list(root: string, include: readonly string[], ignore: readonly string[]): Promise<string[]> {
    const files = this.roots.get(root);
    if (!files) {
      throw new FileListerError(`Mount root not found: ${root}`, 'ROOT_NOT_FOUND', root);
    }
    return filterIgnored(matchPatterns(include, files), ignore).sort();
  }

  /** Replaces the listing of `root`. */
  setFiles(root: string, files: string[]): void {
    this.roots.set(root, [...files]);
  }
}
