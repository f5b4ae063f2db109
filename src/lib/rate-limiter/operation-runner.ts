/**
 * Throttled execution of arbitrary client calls (SDK methods, database
 * clients, anything that is not plain HTTP).
 *
 * The caller resolves the function to call; nothing here looks methods up by
 * name. Bind methods that rely on `this` before passing them in.
 */

import type { RunOptions, ThrottleExecutor } from "./throttle-executor";

export interface OperationRunner {
  /** Runs `fn(...args)` through the executor */
  execute: <A extends unknown[], R>(fn: (...args: A) => R | Promise<R>, ...args: A) => Promise<R>;
  /** Same as `execute`, with run options such as an abort signal */
  executeWith: <A extends unknown[], R>(
    options: RunOptions<R>,
    fn: (...args: A) => R | Promise<R>,
    ...args: A
  ) => Promise<R>;
}

/**
 * @example
 * ```typescript
 * const runner = createOperationRunner(executor);
 * const rows = await runner.execute(sheets.readRange.bind(sheets), "A1:B20");
 * ```
 */
export const createOperationRunner = <C>(executor: ThrottleExecutor<C>): OperationRunner => {
  const executeWith = <A extends unknown[], R>(
    options: RunOptions<R>,
    fn: (...args: A) => R | Promise<R>,
    ...args: A
  ): Promise<R> => executor.run(async () => fn(...args), options);

  return {
    execute: (fn, ...args) => executeWith({}, fn, ...args),
    executeWith,
  };
};
