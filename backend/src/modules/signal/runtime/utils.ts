/**
 * SIGNAL RUNTIME UTILS
 */

/**
 * Recursively freeze a published value so handlers can hand it out without
 * copying.
 */
export function deepFreeze<T>(value: T, seen: WeakSet<object> = new WeakSet()): T {
  if (value === null || typeof value !== 'object' || seen.has(value)) return value;
  seen.add(value);
  for (const child of Object.values(value)) {
    deepFreeze(child, seen);
  }
  Object.freeze(value);
  return value;
}

/**
 * Run `fn` with an AbortSignal and reject with `onTimeout()` once
 * `timeoutMs` passes. The signal is aborted on timeout so the underlying
 * request can be torn down.
 */
export function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error
): Promise<T> {
  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      controller.abort();
      reject(onTimeout());
    }, timeoutMs);

    Promise.resolve()
      .then(() => fn(controller.signal))
      .then(
        (result) => {
          clearTimeout(timer);
          resolve(result);
        },
        (err: unknown) => {
          clearTimeout(timer);
          reject(err);
        }
      );
  });
}
