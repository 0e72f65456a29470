import type { Logger } from "../logger";
import type { Intercepted } from "./mount_driver.types";

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.stack ?? `${error.name}: ${error.message}`;
  }
  return String(error);
}

/** Runs `fn`, capturing a throw or rejection as a failed result. */
export async function interceptExceptions<A>(fn: () => A | Promise<A>): Promise<Intercepted<A>> {
  try {
    return { ok: true, value: await fn() };
  } catch (error) {
    return { ok: false, error };
  }
}

/** `fn` if it succeeds, otherwise `fallback` after logging the fault. */
export async function orFallback<A>(fn: () => A | Promise<A>, fallback: A, logger: Logger): Promise<A> {
  const result = await interceptExceptions(fn);
  if (result.ok) {
    return result.value;
  }
  logger.error(`User exception: ${describeError(result.error)}`);
  return fallback;
}
