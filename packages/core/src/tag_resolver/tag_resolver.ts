import picomatch from "picomatch";
import * as path from "path";
import type { MountKey } from "../change/change.types";

/** A glob pattern selecting files for `tag`. */
export interface TagPattern<T extends MountKey> {
  tag: T;
  pattern: string;
}

type Matcher = (input: string) => boolean;

const MATCH_OPTIONS: picomatch.PicomatchOptions = { dot: true };

function compile(pattern: string): Matcher {
  return picomatch(pattern, MATCH_OPTIONS);
}

/**
 * Absolute paths only show up when a symlinked ancestor put the file outside
 * the canonical root. Those are matched against the pattern prefixed with
 * `**` + `/`, after stripping the filesystem root, which may select files the
 * pattern's author did not intend.
 */
function widen(pattern: string): string {
  return `**/${pattern}`;
}

function stripRoot(filePath: string): string {
  return filePath.slice(path.parse(filePath).root.length).split(path.sep).join("/");
}

export function isAbsoluteLogicalPath(filePath: string): boolean {
  return path.isAbsolute(filePath);
}

/**
 * Resolves logical paths to tags. Patterns are evaluated in list order and
 * the first match wins, regardless of how specific later patterns are.
 */
export class TagResolver<T extends MountKey> {
  private readonly relative: Array<{ tag: T; isMatch: Matcher }>;
  private readonly absolute: Array<{ tag: T; isMatch: Matcher }>;
  private readonly ignored: Matcher;

  constructor(patterns: ReadonlyArray<TagPattern<T>>, ignore: readonly string[] = []) {
    this.relative = patterns.map(({ tag, pattern }) => ({ tag, isMatch: compile(pattern) }));
    this.absolute = patterns.map(({ tag, pattern }) => ({ tag, isMatch: compile(widen(pattern)) }));
    const ignoreMatchers = ignore.map(compile);
    this.ignored = (input) => ignoreMatchers.some((isMatch) => isMatch(input));
  }

  resolve(filePath: string): T | undefined {
    if (isAbsoluteLogicalPath(filePath)) {
      const stripped = stripRoot(filePath);
      return this.absolute.find(({ isMatch }) => isMatch(stripped))?.tag;
    }
    return this.relative.find(({ isMatch }) => isMatch(filePath))?.tag;
  }

  isIgnored(filePath: string): boolean {
    return this.ignored(filePath);
  }
}

/** One-off form of {@link TagResolver.resolve}. */
export function resolveTag<T extends MountKey>(
  patterns: ReadonlyArray<TagPattern<T>>,
  filePath: string
): T | undefined {
  return new TagResolver(patterns).resolve(filePath);
}
