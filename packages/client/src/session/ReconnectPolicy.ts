export interface ReconnectPolicyOptions {
  baseDelayMs: number;
  maxDelayMs: number;
  maxAttempts: number;
}

export const DEFAULT_RECONNECT_POLICY: ReconnectPolicyOptions = {
  baseDelayMs: 2_000,
  maxDelayMs: 30_000,
  maxAttempts: 5
};

/**
 * Backoff delay for the 1-based `attempt`, or `null` once the attempt cap is
 * exceeded and no further reconnect should be scheduled.
 */
export function reconnectDelay(
  attempt: number,
  options: ReconnectPolicyOptions = DEFAULT_RECONNECT_POLICY
): number | null {
  if (!Number.isInteger(attempt) || attempt < 1 || attempt > options.maxAttempts) {
    return null;
  }
  return Math.min(options.baseDelayMs * Math.pow(2, attempt - 1), options.maxDelayMs);
}
