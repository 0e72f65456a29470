export { MemoryFileLister } from './memory_file_lister';
