export { ModelUpdateDriver, unionMountOnStore, mountOnStore, chainTransforms, DEFAULT_SOURCE } from "./mount_driver";
export { interceptExceptions, orFallback, describeError } from "./intercept";
export type {
  ChangeToTransform,
  DriverState,
  FileToTransform,
  Intercepted,
  ModelTransform,
  MountDriverOptions,
} from "./mount_driver.types";
