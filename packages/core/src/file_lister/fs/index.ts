export { FsFileLister } from './fs_file_lister';
