/**
 * Sleep helper aware of AbortSignal.
 *
 * Resolves true after `ms`, or false as soon as `signal` aborts.
 */
export async function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) {
    return false;
  }
  if (ms <= 0) {
    return true;
  }

  if (!signal) {
    await new Promise((resolve) => setTimeout(resolve, ms));
    return true;
  }

  return new Promise<boolean>((resolve) => {
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve(true);
    }, ms);

    const onAbort = (): void => {
      clearTimeout(timer);
      resolve(false);
    };

    signal.addEventListener('abort', onAbort, { once: true });
  });
}
