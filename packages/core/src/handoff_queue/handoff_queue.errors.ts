export class HandoffQueueClosedError extends Error {
  constructor() {
    super("Hand-off queue is closed");
    this.name = "HandoffQueueClosedError";
    Object.setPrototypeOf(this, HandoffQueueClosedError.prototype);
  }
}

export function isHandoffQueueClosedError(error: unknown): error is HandoffQueueClosedError {
  return error instanceof HandoffQueueClosedError;
}
