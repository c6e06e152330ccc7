/**
 * Cancellation scopes for outbound calls. Every cache, store and upstream
 * round trip gets a child of the request's signal with its own timeout, so a
 * client hang-up or an expired budget stops the call either way.
 */

export function childScope(parent: AbortSignal, timeoutMs: number): AbortSignal {
  return AbortSignal.any([parent, AbortSignal.timeout(timeoutMs)]);
}

/** Settles with `work`, or rejects with `signal.reason` once the signal aborts. */
export function abortable<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    // nobody awaits `work` any more; keep its failure from surfacing as unhandled
    work.catch(() => undefined);
    return Promise.reject(signal.reason);
  }

  let onAbort: (() => void) | undefined;
  const aborted = new Promise<never>((_, reject) => {
    onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
  });

  return Promise.race([work, aborted]).finally(() => {
    if (onAbort) signal.removeEventListener('abort', onAbort);
  });
}
