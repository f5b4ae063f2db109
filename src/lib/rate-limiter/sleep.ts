import { CancelledError } from "./errors";

/**
 * Sleep utility for delays. Rejects with CancelledError when the signal aborts.
 */
export const sleep = (ms: number, signal?: AbortSignal): Promise<void> =>
  new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError("Operation cancelled before dispatch", { cause: signal.reason }));
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timeoutId);
      reject(new CancelledError("Operation cancelled while waiting", { cause: signal?.reason }));
    };

    const timeoutId = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);

    signal?.addEventListener("abort", onAbort, { once: true });
  });
