/**
 * Fallback Ladder
 *
 * Runs an ordered list of strategies and stops at the first one that
 * produces a usable value. Strategies report failure as a value, never by
 * throwing; a thrown error is recorded as that strategy's failure.
 */

import { CancelledError } from './errors/index.js';

export type StrategyOutcome<T> =
  | { status: 'success'; value: T }
  | { status: 'degraded'; value: T; reason: string }
  | { status: 'failure'; error: string };

export interface Strategy<T> {
  name: string;
  run(): Promise<StrategyOutcome<T>>;
}

export interface StrategyAttempt {
  strategy: string;
  error: string;
}

export type LadderResult<T> =
  | { status: 'success'; value: T; strategy: string; attempts: StrategyAttempt[] }
  | { status: 'degraded'; value: T; strategy: string; reason: string; attempts: StrategyAttempt[] }
  | { status: 'failure'; attempts: StrategyAttempt[] };

export interface LadderOptions {
  signal?: AbortSignal;
  onFailure?: (attempt: StrategyAttempt, next: string | null) => void;
}

/**
 * Evaluate strategies in order, short-circuiting on the first success or
 * degraded success. Throws CancelledError if the signal is aborted before a
 * strategy starts.
 */
export async function runFallbackLadder<T>(
  strategies: ReadonlyArray<Strategy<T>>,
  options: LadderOptions = {}
): Promise<LadderResult<T>> {
  const attempts: StrategyAttempt[] = [];

  for (let i = 0; i < strategies.length; i++) {
    const strategy = strategies[i];
    if (!strategy) continue;

    if (options.signal?.aborted) {
      throw new CancelledError();
    }

    let outcome: StrategyOutcome<T>;
    try {
      outcome = await strategy.run();
    } catch (error) {
      if (error instanceof CancelledError) throw error;
      outcome = {
        status: 'failure',
        error: error instanceof Error ? error.message : String(error),
      };
    }

    if (outcome.status === 'success') {
      return { status: 'success', value: outcome.value, strategy: strategy.name, attempts };
    }
    if (outcome.status === 'degraded') {
      return {
        status: 'degraded',
        value: outcome.value,
        strategy: strategy.name,
        reason: outcome.reason,
        attempts,
      };
    }

    const attempt: StrategyAttempt = { strategy: strategy.name, error: outcome.error };
    attempts.push(attempt);
    options.onFailure?.(attempt, strategies[i + 1]?.name ?? null);
  }

  return { status: 'failure', attempts };
}
