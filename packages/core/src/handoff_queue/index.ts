export { HandoffQueue } from "./handoff_queue";
export { HandoffQueueClosedError, isHandoffQueueClosedError } from "./handoff_queue.errors";
