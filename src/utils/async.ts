// Small promise helpers: a bounded worker pool and a promise-chain mutex.

export function abortReason(signal: AbortSignal): unknown {
  return signal.reason ?? new Error('aborted');
}

/** Waits for `p`, rejecting early if `signal` aborts. `p` itself keeps running. */
export function raceAbort<T>(p: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return p;
  if (signal.aborted) return Promise.reject(abortReason(signal));
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(abortReason(signal));
    signal.addEventListener('abort', onAbort, { once: true });
    p.then(
      v => { signal.removeEventListener('abort', onAbort); resolve(v); },
      e => { signal.removeEventListener('abort', onAbort); reject(e); },
    );
  });
}

/**
 * Runs `fn` over `items` with at most `limit` calls in flight. Results keep
 * the input order whatever order the calls finish in. Once `signal` aborts
 * no new call starts and the returned promise rejects. A limit that is not
 * a finite number runs one call at a time.
 */
export async function mapPool<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>,
  signal?: AbortSignal,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;
  const worker = async () => {
    while (next < items.length) {
      if (signal?.aborted) throw abortReason(signal);
      const i = next++;
      results[i] = await raceAbort(fn(items[i], i), signal);
    }
  };
  const n = Number.isFinite(limit) ? Math.max(1, Math.min(Math.trunc(limit), items.length)) : 1;
  await Promise.all(Array.from({ length: n }, worker));
  return results;
}

export type Mutex = <T>(fn: () => Promise<T>) => Promise<T>;

/** Serializes async sections: each call starts after the previous one settles. */
export function createMutex(): Mutex {
  let tail: Promise<unknown> = Promise.resolve();
  return <T>(fn: () => Promise<T>): Promise<T> => {
    const run = tail.then(() => fn());
    tail = run.catch(() => undefined);
    return run;
  };
}
