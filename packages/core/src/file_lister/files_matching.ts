import type { MountKey } from '../change/change.types';
import type { Logger } from '../logger';
import { TagResolver } from '../tag_resolver';
import type { TagPattern } from '../tag_resolver';
import type { FileLister } from './file_lister';

/** Files of one root selected by one tag. */
export interface TaggedFiles<T extends MountKey> {
  tag: T;
  files: string[];
}

/**
 * Lists `root` and groups the result by the tag that selects each file.
 * Groups come out in the order their tag was first seen.
 */
export async function filesMatchingWithTag<T extends MountKey>(
  lister: FileLister,
  root: string,
  patterns: ReadonlyArray<TagPattern<T>>,
  ignore: readonly string[],
  logger: Logger
): Promise<TaggedFiles<T>[]> {
  const include = patterns.map(({ pattern }) => pattern);
  logger.info(`Traversing ${root} for files matching ${JSON.stringify(include)}, ignoring ${JSON.stringify(ignore)}`);

  const files = await lister.list(root, include, ignore);
  const resolver = new TagResolver(patterns);
  const byTag = new Map<T, string[]>();
  for (const file of files) {
    const tag = resolver.resolve(file);
    if (tag === undefined) continue;

    const group = byTag.get(tag);
    if (group) {
      group.push(file);
    } else {
      byTag.set(tag, [file]);
    }
  }

  return [...byTag].map(([tag, tagged]) => ({ tag, files: tagged }));
}
