/**
 * FsFileLister - Filesystem-based FileLister implementation
 *
 * Uses fast-glob for traversal and fs/promises to canonicalize the root.
 *
 * @module file_lister/fs/fs_file_lister
 */

import fg from 'fast-glob';
import * as fs from 'fs/promises';
import * as path from 'path';
import type { FileLister, FsFileListerOptions } from '../file_lister';
import { FileListerError } from '../file_lister.errors';

/**
 * Filesystem-based FileLister implementation.
 *
 * @example
 * ```typescript
 * const lister = new FsFileLister();
 * const files = await lister.list('/path/to/notes', ['**\/*.md'], ['**\/drafts/**']);
 * ```
 */
export class FsFileLister implements FileLister {
  private readonly followSymbolicLinks: boolean;

  constructor(options: FsFileListerOptions = {}) {
    this.followSymbolicLinks = options.followSymbolicLinks ?? true;
  }

  async list(root: string, include: readonly string[], ignore: readonly string[]): Promise<string[]> {
    for (const pattern of [...include, ...ignore]) {
      if (path.isAbsolute(pattern)) {
        throw new FileListerError(
          `Invalid pattern: absolute paths not allowed: ${pattern}`,
          'INVALID_PATTERN',
          pattern
        );
      }
    }

    const canonicalRoot = await this.canonicalize(root);
    if (include.length === 0) {
      return [];
    }

    try {
      const files = await fg([...include], {
        cwd: canonicalRoot,
        ignore: [...ignore],
        onlyFiles: true,
        absolute: false,
        dot: true,
        followSymbolicLinks: this.followSymbolicLinks,
      });
      return files.sort();
    } catch (err: unknown) {
      const error = err as NodeJS.ErrnoException;
      throw new FileListerError(
        `Failed to traverse ${canonicalRoot}: ${error.message}`,
        error.code === 'EACCES' ? 'PERMISSION_DENIED' : 'READ_ERROR',
        canonicalRoot
      );
    }
  }

  private async canonicalize(root: string): Promise<string> {
    try {
      const canonical = await fs.realpath(root);
      const stats = await fs.stat(canonical);
      if (!stats.isDirectory()) {
        throw new FileListerError(`Mount root is not a directory: ${root}`, 'ROOT_NOT_FOUND', root);
      }
      return canonical;
    } catch (err: unknown) {
      if (err instanceof FileListerError) throw err;
      const error = err as NodeJS.ErrnoException;
      if (error.code === 'ENOENT') {
        throw new FileListerError(`Mount root not found: ${root}`, 'ROOT_NOT_FOUND', root);
      }
      if (error.code === 'EACCES') {
        throw new FileListerError(`Permission denied: ${root}`, 'PERMISSION_DENIED', root);
      }
      throw new FileListerError(`Cannot read mount root ${root}: ${error.message}`, 'READ_ERROR', root);
    }
  }
}
