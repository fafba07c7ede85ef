/**
 * Bounded Polling
 *
 * A single retry-policy abstraction (attempt count + fixed interval) shared by
 * the health gate and every driver-side wait.
 */

import { setTimeout as delay } from 'node:timers/promises';

/**
 * Attempt limit and fixed interval between attempts
 */
export interface RetryPolicy {
  /** Maximum number of attempts (>= 1) */
  attempts: number;
  /** Delay between attempts in milliseconds */
  intervalMs: number;
}

/**
 * Sleep function, injectable so tests do not wait on real timers
 */
export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = async (ms) => {
  await delay(ms);
};

/**
 * Outcome of a single attempt
 */
export interface AttemptOutcome {
  ok: boolean;
  /** Output captured for diagnosis */
  output: string;
}

/**
 * Record of one attempt made by pollUntil
 */
export interface AttemptRecord extends AttemptOutcome {
  attempt: number;
}

/**
 * Result of a bounded poll
 */
export interface PollResult {
  ok: boolean;
  attempts: AttemptRecord[];
}

/**
 * Run `attempt` until it reports success or the policy is exhausted.
 *
 * A thrown error counts as a failed attempt with the error message as output.
 * No sleep follows the final attempt.
 */
export async function pollUntil(
  attempt: (attemptNumber: number) => Promise<AttemptOutcome>,
  policy: RetryPolicy,
  sleep: Sleep = defaultSleep
): Promise<PollResult> {
  const limit = Math.max(1, Math.floor(policy.attempts));
  const attempts: AttemptRecord[] = [];

  for (let n = 1; n <= limit; n++) {
    let outcome: AttemptOutcome;
    try {
      outcome = await attempt(n);
    } catch (error) {
      outcome = {
        ok: false,
        output: error instanceof Error ? error.message : String(error),
      };
    }

    attempts.push({ attempt: n, ...outcome });
    if (outcome.ok) {
      return { ok: true, attempts };
    }

    if (n < limit) {
      await sleep(policy.intervalMs);
    }
  }

  return { ok: false, attempts };
}

/**
 * Render attempt records as `attempt n/N: output` lines.
 */
export function formatAttempts(attempts: AttemptRecord[], limit: number): string {
  return attempts
    .map((a) => `attempt ${a.attempt}/${limit}: ${a.output.trim() || '(no output)'}`)
    .join('\n');
}
