export type { FileLister, FsFileListerOptions, MemoryFileListerOptions } from './file_lister';
export { FileListerError, isFileListerError } from './file_lister.errors';
export type { FileListerErrorCode } from './file_lister.errors';
export { filesMatchingWithTag } from './files_matching';
export type { TaggedFiles } from './files_matching';
