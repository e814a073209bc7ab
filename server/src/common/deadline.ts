import { LookupCancelledError, LookupTimeoutError } from './errors';

/**
 * Runs `task` with its own AbortSignal, which fires when `timeoutMs` elapses
 * or `parent` aborts. The returned promise settles as soon as the signal
 * fires, even if the task ignores it.
 */
export async function withDeadline<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parent?: AbortSignal,
): Promise<T> {
  if (parent?.aborted) throw new LookupCancelledError();

  const ac = new AbortController();
  let onAbort: (() => void) | undefined;
  const aborted = new Promise<never>((_, reject) => {
    onAbort = () => reject(ac.signal.reason);
    ac.signal.addEventListener('abort', onAbort, { once: true });
  });
  // the losing side of the race must not surface as an unhandled rejection
  aborted.catch(() => undefined);

  const t = setTimeout(
    () => ac.abort(new LookupTimeoutError(timeoutMs)),
    timeoutMs,
  );
  const cancel = () => ac.abort(new LookupCancelledError());
  parent?.addEventListener('abort', cancel, { once: true });

  try {
    return await Promise.race([task(ac.signal), aborted]);
  } finally {
    clearTimeout(t);
    parent?.removeEventListener('abort', cancel);
    if (onAbort) ac.signal.removeEventListener('abort', onAbort);
  }
}
