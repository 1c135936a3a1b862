/** Longest delay setTimeout honours; anything above fires after 1 ms. */
export const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }

    let remaining = ms;
    let timer: ReturnType<typeof setTimeout> | undefined;

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal?.reason);
    };

    // Long sleeps run as a chain of timers no longer than the limit.
    const schedule = (): void => {
      const step = Math.min(remaining, MAX_TIMER_DELAY_MS);
      remaining -= step;
      timer = setTimeout(() => {
        if (remaining > 0) {
          schedule();
          return;
        }
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, step);
    };

    schedule();
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
