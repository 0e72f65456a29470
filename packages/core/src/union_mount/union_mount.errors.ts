export class UnionMountError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UnionMountError";
    Object.setPrototypeOf(this, UnionMountError.prototype);
  }
}

/** A root could not be canonicalized, listed or subscribed to. */
export class MountSetupError extends UnionMountError {
  constructor(root: string, cause: Error) {
    super(`Failed to mount ${root}: ${cause.message}`);
    this.name = "MountSetupError";
    this.cause = cause;
    Object.setPrototypeOf(this, MountSetupError.prototype);
  }
}

/** A watch subscription failed after it was established. */
export class WatchRuntimeError extends UnionMountError {
  public root: string;

  constructor(root: string, cause: Error) {
    super(`Watcher for ${root} failed: ${cause.message}`);
    this.name = "WatchRuntimeError";
    this.root = root;
    this.cause = cause;
    Object.setPrototypeOf(this, WatchRuntimeError.prototype);
  }
}

export class MountAlreadyRunningError extends UnionMountError {
  constructor() {
    super("This mount is already running");
    this.name = "MountAlreadyRunningError";
    Object.setPrototypeOf(this, MountAlreadyRunningError.prototype);
  }
}

// Type guards
export function isUnionMountError(error: unknown): error is UnionMountError {
  return error instanceof UnionMountError;
}

export function isMountSetupError(error: unknown): error is MountSetupError {
  return error instanceof MountSetupError;
}

export function isWatchRuntimeError(error: unknown): error is WatchRuntimeError {
  return error instanceof WatchRuntimeError;
}

export function isMountAlreadyRunningError(error: unknown): error is MountAlreadyRunningError {
  return error instanceof MountAlreadyRunningError;
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
