/**
 * Throttle executor: proactive throttling, backoff and credential rotation
 * around one logical operation.
 *
 * Order of operations per attempt:
 * 1. WAITING: under the lock, read the active credential's window and limits,
 *    decide the delay and reserve a slot; sleep outside the lock
 * 2. DISPATCHING: call the operation with the active credential
 * 3. Feed the outcome to the feedback hook and apply discovered limits
 * 4. Return, retry after backoff, rotate credentials, or fail
 *
 * All shared state (windows, limits, rotation cursor) is touched only inside
 * a single-concurrency queue, so "check load, decide delay, record" is atomic
 * with respect to other callers. Waits never hold the queue.
 */

import PQueue from "p-queue";
import * as v from "valibot";

import type { Logger } from "@/lib/logger";

import {
  type BackoffConfig,
  DEFAULT_BACKOFF_CONFIG,
  createBackoffState,
  isRetryableError,
  nextBackoff,
} from "./backoff";
import {
  type CredentialRotator,
  type CredentialSet,
  createCredentialRotator,
} from "./credential-rotator";
import { DEFAULT_JITTER_FACTOR, getDelay, getThresholdCounts } from "./delay-policy";
import {
  CancelledError,
  CredentialsExhaustedError,
  FatalOperationError,
  InvalidThrottleConfigError,
  MaxRetriesExceededError,
  RateLimitedError,
  TransientError,
} from "./errors";
import {
  type CallOutcome,
  type FeedbackVerdict,
  type LimitFeedbackHook,
  createFeedbackHook,
} from "./feedback";
import {
  type LimitParameters,
  type LimitPatch,
  type LimitSnapshot,
  type LimitState,
  createLimitState,
  limitParametersSchema,
} from "./limit-state";
import { sleep } from "./sleep";
import { type WindowCounter, createWindowCounter } from "./window-counter";

export type WindowScope = "per-credential" | "shared";

export interface ThrottleExecutorConfig<C = undefined> {
  /** Name used in log entries (provider) */
  name?: string;
  /** Initial limits; provider feedback may change them later */
  limits: LimitParameters;
  /** Backoff configuration for transient retries */
  backoff?: Partial<BackoffConfig>;
  /** Maximum dispatch attempts per run (default 5) */
  maxAttempts?: number;
  /** Relative jitter on proactive delays (default 0.1) */
  jitterFactor?: number;
  /** Primary and backup credentials */
  credentials?: CredentialSet<C>;
  /** Whether each credential gets its own window and limits (default per-credential) */
  windowScope?: WindowScope;
  /** Provider feedback hook (default: Retry-After aware status classification) */
  feedback?: LimitFeedbackHook;
  /** Transient-error predicate (default: isRetryableError) */
  isTransient?: (error: unknown) => boolean;
  /**
   * Called once before rotating onto a credential, returns the value to use.
   * The rotation becomes visible only after it resolves; a rejection leaves
   * the active credential unchanged.
   */
  refreshCredential?: (credential: C) => Promise<C>;
  /** Logger for events */
  logger?: Logger;
}

export interface OperationContext<C> {
  /** Active credential, undefined when the executor has none */
  credential: C | undefined;
  /** Dispatch attempt within this run (0-indexed) */
  attempt: number;
  signal: AbortSignal | undefined;
}

export type Operation<T, C = undefined> = (context: OperationContext<C>) => Promise<T>;

export interface RunOptions<T = unknown> {
  /** Abandons the run while it waits */
  signal?: AbortSignal;
  /** Releases a result that is retried or rotated away instead of returned */
  discardResult?: (result: T) => void | Promise<void>;
}

export interface ThrottleMetrics {
  totalRuns: number;
  successfulRuns: number;
  failedRuns: number;
  totalRetries: number;
  /** Admissions that had to wait */
  throttleWaits: number;
  throttleWaitTimeMs: number;
  credentialRotations: number;
}

export interface ThrottleExecutor<C = undefined> {
  /**
   * Runs an operation with throttling, backoff and rotation.
   *
   * When the attempts run out the last failure is not rethrown as is: it is
   * wrapped in `MaxRetriesExceededError` and kept as its `lastError` and `cause`.
   */
  run: <T>(operation: Operation<T, C>, options?: RunOptions<T>) => Promise<T>;
  getMetrics: () => ThrottleMetrics;
  resetMetrics: () => void;
  /** Limits of the active credential */
  getLimitState: () => Promise<LimitSnapshot>;
  /** Current window load of the active credential */
  getLoad: () => Promise<number>;
  getActiveCredential: () => C | undefined;
}

interface WindowSlot {
  counter: WindowCounter;
  limits: LimitState;
}

interface Admission<C> {
  slot: WindowSlot;
  credential: C | undefined;
  credentialIndex: number;
  reservedAt: number;
}

type AdmissionStep<C> =
  | { kind: "reserved"; admission: Admission<C>; delayMs: number }
  | { kind: "blocked"; delayMs: number };

const throttleConfigSchema = v.object({
  limits: limitParametersSchema,
  backoff: v.object({
    baseDelayMs: v.pipe(v.number(), v.gtValue(0)),
    multiplier: v.pipe(v.number(), v.minValue(1)),
    maxDelayMs: v.pipe(v.number(), v.gtValue(0)),
  }),
  maxAttempts: v.pipe(v.number(), v.integer(), v.minValue(1)),
  jitterFactor: v.pipe(v.number(), v.minValue(0), v.maxValue(1)),
});

const DEFAULT_MAX_ATTEMPTS = 5;

const defaultFeedback = createFeedbackHook({ kind: "retry-after" });

const emptyMetrics = (): ThrottleMetrics => ({
  totalRuns: 0,
  successfulRuns: 0,
  failedRuns: 0,
  totalRetries: 0,
  throttleWaits: 0,
  throttleWaitTimeMs: 0,
  credentialRotations: 0,
});

const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * Creates a throttle executor for one provider / credential set.
 *
 * @example
 * ```typescript
 * const executor = createThrottleExecutor({
 *   name: "crm",
 *   limits: {
 *     maxOperationsInWindow: 100,
 *     rateLimitWindowMs: 10_000,
 *     throttleStartPercentage: 0.75,
 *     fullThrottlePercentage: 0.9,
 *   },
 *   credentials: { primary: "key-a", backups: ["key-b"] },
 *   feedback: createFeedbackHook({ kind: "retry-after", rotateOnRateLimit: true }),
 * });
 *
 * const response = await executor.run(({ credential }) =>
 *   fetch(url, { headers: { authorization: `Bearer ${credential}` } }),
 * );
 * ```
 */
export const createThrottleExecutor = <C = undefined>(
  config: ThrottleExecutorConfig<C>,
): ThrottleExecutor<C> => {
  const parsed = v.safeParse(throttleConfigSchema, {
    limits: config.limits,
    backoff: { ...DEFAULT_BACKOFF_CONFIG, ...config.backoff },
    maxAttempts: config.maxAttempts ?? DEFAULT_MAX_ATTEMPTS,
    jitterFactor: config.jitterFactor ?? DEFAULT_JITTER_FACTOR,
  });
  if (!parsed.success) {
    const issues = parsed.issues.map((issue) => {
      const path = issue.path?.map((item) => String(item.key)).join(".");
      return path ? `${path}: ${issue.message}` : issue.message;
    });
    throw new InvalidThrottleConfigError(
      `Invalid throttle configuration: ${issues.join("; ")}`,
      issues,
    );
  }

  const { limits: initialLimits, backoff: backoffConfig, maxAttempts, jitterFactor } = parsed.output;
  const {
    name = "throttle",
    credentials,
    windowScope = "per-credential",
    feedback = defaultFeedback,
    isTransient = isRetryableError,
    refreshCredential,
    logger,
  } = config;

  const rotator: CredentialRotator<C> | undefined = credentials
    ? createCredentialRotator(credentials)
    : undefined;

  // Single-concurrency queue guarding windows, limits and the rotation cursor
  const lock = new PQueue({ concurrency: 1 });
  const withLock = <T>(fn: () => T): Promise<T> =>
    lock.add(async () => fn(), { throwOnTimeout: true });
  const withLockAsync = <T>(fn: () => Promise<T>): Promise<T> =>
    lock.add(fn, { throwOnTimeout: true });

  const createSlot = (): WindowSlot => {
    const limits = createLimitState(initialLimits);
    return { limits, counter: createWindowCounter(limits.getWindowMs) };
  };

  const slots = new Map<number, WindowSlot>();
  const slotFor = (credentialIndex: number): WindowSlot => {
    const key = windowScope === "shared" ? 0 : credentialIndex;
    let slot = slots.get(key);
    if (!slot) {
      slot = createSlot();
      slots.set(key, slot);
    }
    return slot;
  };

  const activeIndex = (): number => rotator?.currentIndex() ?? 0;

  let metrics = emptyMetrics();

  /**
   * One locked admission decision. Non-hard delays reserve the slot at the
   * planned dispatch time so concurrent callers see it immediately.
   */
  const decide = (): AdmissionStep<C> => {
    const credentialIndex = activeIndex();
    const slot = slotFor(credentialIndex);
    const now = Date.now();
    const decision = getDelay(
      slot.counter.snapshot(now),
      slot.limits.get(),
      now,
      Math.random,
      jitterFactor,
    );

    // Timers fire on whole milliseconds: round up so a wait never ends early
    const delayMs = Math.ceil(decision.delayMs);

    if (decision.mode === "hard") {
      return { kind: "blocked", delayMs };
    }

    const reservedAt = now + delayMs;
    slot.counter.record(reservedAt);
    return {
      kind: "reserved",
      delayMs,
      admission: { slot, credential: rotator?.current(), credentialIndex, reservedAt },
    };
  };

  const waitForAdmission = async (signal: AbortSignal | undefined): Promise<Admission<C>> => {
    for (;;) {
      if (signal?.aborted) {
        throw new CancelledError("Operation cancelled before dispatch", { cause: signal.reason });
      }

      const step = await withLock(decide);

      if (step.delayMs > 0) {
        metrics.throttleWaits++;
        metrics.throttleWaitTimeMs += step.delayMs;
        logger?.debug("Throttle wait", {
          name,
          delayMs: step.delayMs,
          mode: step.kind === "blocked" ? "hard" : "soft",
        });
      }

      if (step.kind === "blocked") {
        await sleep(step.delayMs, signal);
        continue;
      }

      const { admission } = step;
      if (step.delayMs > 0) {
        try {
          await sleep(step.delayMs, signal);
        } catch (error) {
          // Cancelled before dispatch: give the reserved slot back
          await withLock(() => admission.slot.counter.release(admission.reservedAt));
          throw error;
        }

        // Another caller rotated while this one slept: re-admit on the new credential
        if (rotator && rotator.currentIndex() !== admission.credentialIndex) {
          await withLock(() => admission.slot.counter.release(admission.reservedAt));
          continue;
        }
      }

      return admission;
    }
  };

  const applyLimits = async (slot: WindowSlot, patch: LimitPatch): Promise<void> => {
    const result = await withLock(() => slot.limits.update(patch));
    if (!result.applied) {
      logger?.warn("Rejected limit update", { name, reason: result.reason });
      return;
    }
    if (patch.maxOperationsInWindow !== undefined || patch.rateLimitWindowMs !== undefined) {
      logger?.debug("Limits updated", {
        name,
        maxOperationsInWindow: result.limits.maxOperationsInWindow,
        rateLimitWindowMs: result.limits.rateLimitWindowMs,
        ...getThresholdCounts(result.limits),
      });
    }
  };

  /**
   * Moves past a rate-limited credential. Returns false when none are left.
   *
   * The refresh runs while holding the lock, so no caller is admitted on the
   * next credential before its refreshed value is stored.
   */
  const rotateAway = async (fromIndex: number): Promise<boolean> => {
    if (!rotator) {
      return false;
    }
    const rotation = await withLockAsync(async () => {
      const next = rotator.peekNext();
      if (refreshCredential && next && fromIndex === rotator.currentIndex()) {
        rotator.replace(next.index, await refreshCredential(next.credential));
      }
      return rotator.rotateFrom(fromIndex);
    });
    if (rotation.status === "exhausted") {
      return false;
    }
    if (rotation.advanced) {
      metrics.credentialRotations++;
      logger?.warn("Credential rate limited, rotating", {
        name,
        fromIndex,
        toIndex: rotation.index,
        credentialCount: rotator.size(),
      });
    }
    return true;
  };

  const run = async <T>(operation: Operation<T, C>, options: RunOptions<T> = {}): Promise<T> => {
    const { signal, discardResult } = options;
    metrics.totalRuns++;

    let backoff = createBackoffState(backoffConfig.baseDelayMs);
    let attempt = 0;

    const fail = (error: unknown): never => {
      metrics.failedRuns++;
      throw error;
    };

    const discard = async (outcome: CallOutcome<T>): Promise<void> => {
      if (!outcome.ok || !discardResult) {
        return;
      }
      try {
        await discardResult(outcome.result);
      } catch (error) {
        logger?.warn("Failed to release discarded result", { name, error: describeError(error) });
      }
    };

    for (;;) {
      let admission: Admission<C>;
      try {
        admission = await waitForAdmission(signal);
      } catch (error) {
        return fail(error);
      }

      let outcome: CallOutcome<T>;
      try {
        const result = await operation({ credential: admission.credential, attempt, signal });
        outcome = { ok: true, result, completedAt: Date.now() };
      } catch (error) {
        outcome = { ok: false, error, completedAt: Date.now() };
      }
      attempt++;

      if (signal?.aborted) {
        await discard(outcome);
        return fail(
          new CancelledError("Operation cancelled during dispatch", { cause: signal.reason }),
        );
      }

      const verdict: FeedbackVerdict = feedback(outcome, { isTransient });

      if (verdict.limits) {
        await applyLimits(admission.slot, verdict.limits);
      }

      const lastError = outcome.ok ? undefined : outcome.error;

      if (verdict.kind === "transient" || verdict.kind === "rate_limited") {
        await discard(outcome);
      }

      switch (verdict.kind) {
        case "ok": {
          if (!outcome.ok) {
            return fail(outcome.error);
          }
          metrics.successfulRuns++;
          if (attempt > 1) {
            logger?.info("Operation succeeded after retry", { name, attempts: attempt });
          }
          return outcome.result;
        }

        case "fatal": {
          if (!outcome.ok) {
            return fail(outcome.error);
          }
          return fail(
            new FatalOperationError(`${name}: operation returned a non-retryable result`, {
              result: outcome.result,
            }),
          );
        }

        case "rate_limited": {
          if (rotator) {
            let rotated: boolean;
            try {
              rotated = await rotateAway(admission.credentialIndex);
            } catch (error) {
              return fail(error);
            }
            if (!rotated) {
              logger?.error("All credentials exhausted", undefined, {
                name,
                credentialCount: rotator.size(),
              });
              return fail(
                new CredentialsExhaustedError(
                  `${name}: all ${rotator.size()} credentials are rate limited`,
                  {
                    credentialCount: rotator.size(),
                    cause: lastError ?? new RateLimitedError(`${name}: rate limited`),
                  },
                ),
              );
            }
            // Fresh credential: back to WAITING without a backoff step
            continue;
          }
          break;
        }

        case "transient":
          break;
      }

      // TRANSIENT_FAILURE (or a rate limit with nothing to rotate to)
      const retryAfterMs =
        verdict.kind === "transient" || verdict.kind === "rate_limited"
          ? verdict.retryAfterMs
          : undefined;
      const failure =
        lastError ??
        new TransientError(`${name}: operation returned a retryable result`, { retryAfterMs });

      if (attempt >= maxAttempts) {
        return fail(
          new MaxRetriesExceededError(
            `${name}: max attempts (${maxAttempts}) exceeded`,
            attempt,
            failure,
          ),
        );
      }

      const step = nextBackoff(backoff, backoffConfig, { overrideDelayMs: retryAfterMs });
      backoff = step.state;

      metrics.totalRetries++;
      logger?.debug(retryAfterMs === undefined ? "Retrying operation" : "Using Retry-After", {
        name,
        attempt: backoff.attempt,
        backoffMs: step.delayMs,
        error: describeError(failure),
      });

      try {
        await sleep(step.delayMs, signal);
      } catch (error) {
        return fail(error);
      }
    }
  };

  const getMetrics = (): ThrottleMetrics => ({ ...metrics });

  const resetMetrics = (): void => {
    metrics = emptyMetrics();
  };

  const getLimitState = (): Promise<LimitSnapshot> =>
    withLock(() => slotFor(activeIndex()).limits.get());

  const getLoad = (): Promise<number> => withLock(() => slotFor(activeIndex()).counter.load());

  return {
    run,
    getMetrics,
    resetMetrics,
    getLimitState,
    getLoad,
    getActiveCredential: () => rotator?.current(),
  };
};
