export type CancellableTask = (signal: AbortSignal) => Promise<void>;

/**
 * Runs two tasks under one cancellation scope.
 *
 * Whichever task settles first aborts `controller`, which the other task is
 * expected to honour. Resolves once both have settled. Rejects with the
 * first failure that is not the abort itself.
 */
export async function runTaskPair(
  controller: AbortController,
  first: CancellableTask,
  second: CancellableTask
): Promise<void> {
  const { signal } = controller;
  let fault: { error: unknown } | undefined;

  const supervise = async (task: CancellableTask): Promise<void> => {
    try {
      await task(signal);
    } catch (error) {
      const cancelled = signal.aborted && error === signal.reason;
      if (!fault && !cancelled) {
        fault = { error };
      }
    } finally {
      controller.abort();
    }
  };

  await Promise.all([supervise(first), supervise(second)]);
  if (fault) {
    throw fault.error;
  }
}
