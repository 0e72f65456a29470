export class MountConfigError extends Error {
  public readonly details: string[];

  constructor(message: string, public readonly configPath?: string, details: string[] = []) {
    super(details.length > 0 ? `${message}: ${details.join("; ")}` : message);
    this.name = "MountConfigError";
    this.details = details;
    Object.setPrototypeOf(this, MountConfigError.prototype);
  }
}

export function isMountConfigError(error: unknown): error is MountConfigError {
  return error instanceof MountConfigError;
}
