export { loadMountConfig, parseMountConfig, DEFAULT_CONFIG_FILE } from "./mount_config";
export { MountConfigError, isMountConfigError } from "./mount_config.errors";
export type { MountConfig, MountConfigFile } from "./mount_config.types";
