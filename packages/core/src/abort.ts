// packages/core/src/abort.ts
import { RequestAbortedError } from './errors';

export function abortReason(signal: AbortSignal): string {
  const r: unknown = signal.reason;
  // AbortSignal.timeout() aborts with a DOMException named TimeoutError
  if (typeof r === 'object' && r !== null && 'name' in r && r.name === 'TimeoutError') return 'timed out';
  if (r instanceof Error) return r.message;
  return r === undefined ? 'aborted' : String(r);
}

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) throw new RequestAbortedError(abortReason(signal));
}

/**
 * Settle with `work`, or reject with RequestAbortedError as soon as `signal` aborts.
 * The losing promise keeps its handlers attached so it never rejects unobserved.
 */
export function raceAbort<T>(work: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return work;
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new RequestAbortedError(abortReason(signal)));
    if (signal.aborted) onAbort();
    else signal.addEventListener('abort', onAbort, { once: true });
    work.then(
      (v) => { signal.removeEventListener('abort', onAbort); resolve(v); },
      (e: unknown) => { signal.removeEventListener('abort', onAbort); reject(e); }
    );
  });
}
