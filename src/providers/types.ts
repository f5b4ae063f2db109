/**
 * Provider throttler types.
 */

import type { ThrottledHttpClient } from "@/lib/http";
import type { Logger } from "@/lib/logger";
import type { OperationRunner, ThrottleExecutor } from "@/lib/rate-limiter";

import type { ProviderName } from "./config";

export type HttpProviderName = Exclude<ProviderName, "operation">;

/** HTTP provider: bearer-token client over a throttled executor */
export interface HttpProviderThrottler {
  provider: HttpProviderName;
  executor: ThrottleExecutor<string>;
  http: ThrottledHttpClient;
}

/** Non-HTTP provider: throttled `execute(fn, ...args)` */
export interface OperationProviderThrottler {
  provider: "operation";
  executor: ThrottleExecutor;
  runner: OperationRunner;
}

export type ProviderThrottler = HttpProviderThrottler | OperationProviderThrottler;

/** Runtime dependencies that are not part of the validated config */
export interface ProviderThrottlerOptions {
  logger?: Logger;
  /** fetch implementation for HTTP providers */
  fetch?: typeof fetch;
  /** Refreshes a credential before rotating onto it */
  refreshCredential?: (credential: string) => Promise<string>;
  /** Which thrown errors are retried (default: isRetryableError) */
  isTransient?: (error: unknown) => boolean;
}
