/**
 * Live throttling parameters.
 *
 * Limits start from the provider preset and may be rewritten at runtime by
 * provider feedback (rate-limit headers). Updates set values rather than
 * accumulate them, so applying the same patch twice yields the same state.
 */

import * as v from "valibot";

const limitFieldsSchema = v.object({
  maxOperationsInWindow: v.pipe(v.number(), v.integer(), v.minValue(1)),
  rateLimitWindowMs: v.pipe(v.number(), v.gtValue(0)),
  throttleStartPercentage: v.pipe(v.number(), v.gtValue(0), v.ltValue(1)),
  fullThrottlePercentage: v.pipe(v.number(), v.gtValue(0), v.maxValue(1)),
});

export const limitParametersSchema = v.pipe(
  limitFieldsSchema,
  v.check(
    (limits) => limits.throttleStartPercentage < limits.fullThrottlePercentage,
    "throttleStartPercentage must be lower than fullThrottlePercentage",
  ),
);

export type LimitParameters = v.InferOutput<typeof limitParametersSchema>;

/**
 * Partial limits, used by presets that let callers override single fields.
 * The merged result is validated again when the executor is created.
 */
export const limitOverridesSchema = v.partial(limitFieldsSchema);

export interface ReportedUsage {
  /** Operations the provider says were used in the current window */
  used: number;
  /** When the provider reported it (epoch ms) */
  observedAt: number;
}

export interface LimitSnapshot extends LimitParameters {
  reportedUsage?: ReportedUsage;
}

export interface LimitPatch extends Partial<LimitParameters> {
  reportedUsage?: ReportedUsage;
}

export type LimitUpdateResult =
  | { applied: true; limits: LimitSnapshot }
  | { applied: false; reason: string };

export interface LimitState {
  /** Returns a copy of the current limits */
  get: () => LimitSnapshot;
  /** Current window length, read on every window prune */
  getWindowMs: () => number;
  /** Merges a patch; rejected whole if the result breaks an invariant */
  update: (patch: LimitPatch) => LimitUpdateResult;
}

const reportedUsageSchema = v.object({
  used: v.pipe(v.number(), v.integer(), v.minValue(0)),
  observedAt: v.pipe(v.number(), v.finite()),
});

const formatIssues = (issues: readonly { message: string }[]): string =>
  issues.map((issue) => issue.message).join("; ");

/**
 * Parses limit parameters, throwing a ValiError when invalid.
 */
export const parseLimitParameters = (value: unknown): LimitParameters =>
  v.parse(limitParametersSchema, value);

/**
 * Creates the mutable limit state for one credential (or for the whole
 * executor when window state is shared).
 */
export const createLimitState = (initial: LimitParameters): LimitState => {
  let state: LimitSnapshot = { ...parseLimitParameters(initial) };

  const get = (): LimitSnapshot => ({
    ...state,
    ...(state.reportedUsage && { reportedUsage: { ...state.reportedUsage } }),
  });

  const update = (patch: LimitPatch): LimitUpdateResult => {
    const { reportedUsage, ...parameters } = patch;

    const merged = v.safeParse(limitParametersSchema, {
      maxOperationsInWindow: parameters.maxOperationsInWindow ?? state.maxOperationsInWindow,
      rateLimitWindowMs: parameters.rateLimitWindowMs ?? state.rateLimitWindowMs,
      throttleStartPercentage: parameters.throttleStartPercentage ?? state.throttleStartPercentage,
      fullThrottlePercentage: parameters.fullThrottlePercentage ?? state.fullThrottlePercentage,
    });
    if (!merged.success) {
      return { applied: false, reason: formatIssues(merged.issues) };
    }

    let nextUsage = state.reportedUsage;
    if (reportedUsage !== undefined) {
      const usage = v.safeParse(reportedUsageSchema, reportedUsage);
      if (!usage.success) {
        return { applied: false, reason: formatIssues(usage.issues) };
      }
      nextUsage = usage.output;
    }

    state = {
      ...merged.output,
      ...(nextUsage && { reportedUsage: nextUsage }),
    };
    return { applied: true, limits: get() };
  };

  return {
    get,
    getWindowMs: () => state.rateLimitWindowMs,
    update,
  };
};
