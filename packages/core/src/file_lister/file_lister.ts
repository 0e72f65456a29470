/**
 * FileLister Interface
 *
 * Lists the files of one mount root that match a set of include globs and
 * none of a set of ignore globs. Used for the initial scan of every source.
 *
 * @module file_lister
 */

/**
 * Options for FsFileLister.
 */
export interface FsFileListerOptions {
  /** Follow symlinked directories while traversing. Default: true */
  followSymbolicLinks?: boolean;
}

/**
 * Options for MemoryFileLister.
 */
export interface MemoryFileListerOptions {
  /** Map of root -> file paths relative to it */
  roots?: Map<string, string[]> | Record<string, string[]>;
}

/**
 * Interface for listing the files of a mount root.
 *
 * @example
 * ```typescript
 * // Filesystem backend
 * const lister = new FsFileLister();
 *
 * // Memory backend (testing)
 * const lister = new MemoryFileLister({ roots: { '/notes': ['index.md'] } });
 *
 * const files = await lister.list('/notes', ['**\/*.md'], ['**\/drafts/**']);
 * ```
 */
export interface FileLister {
  /**
   * Lists files under `root`.
   * @param root - Directory to traverse; canonicalized before listing
   * @param include - A file is returned if it matches at least one of these
   * @param ignore - A file is dropped if it matches any of these
   * @returns Paths relative to the canonical root, `/`-separated
   * @throws FileListerError if the root is missing or unreadable
   */
  list(root: string, include: readonly string[], ignore: readonly string[]): Promise<string[]>;
}
