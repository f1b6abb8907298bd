import { ENV } from "../_core/env";

export interface RetryPolicy {
  baseDelayMs: number;
  factor: number;
  maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  baseDelayMs: ENV.RETRY_BASE_DELAY_MS,
  factor: 2,
  maxDelayMs: ENV.RETRY_MAX_DELAY_MS,
};

/**
 * Delay before the n-th retry (1-based): base * factor^(n-1), capped at maxDelayMs.
 */
export function backoffDelay(retry: number, policy: RetryPolicy = DEFAULT_RETRY_POLICY): number {
  if (retry < 1) return 0;
  return Math.min(policy.maxDelayMs, policy.baseDelayMs * policy.factor ** (retry - 1));
}
