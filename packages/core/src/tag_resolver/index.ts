export { TagResolver, resolveTag, isAbsoluteLogicalPath } from "./tag_resolver";
export type { TagPattern } from "./tag_resolver";
