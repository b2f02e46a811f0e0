import type { RetryPolicy } from '@ideaweaver/schemas/src/ideation.schema.js';

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function computeBackoffMs(
  policy: RetryPolicy,
  attempt: number,
  random: () => number = Math.random,
): number {
  const raw = Math.min(policy.maxDelayMs, policy.baseDelayMs * Math.pow(2, attempt));
  if (!policy.jitter) {
    return raw;
  }
  const delta = Math.floor(raw * 0.2);
  return raw - delta + Math.floor(random() * (2 * delta + 1));
}
