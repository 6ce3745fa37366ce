/**
 * RetryStrategy — per-kind retry policy and exponential backoff.
 *
 * The strategy itself is stateless apart from its config; all counters live
 * in a RetryState created for each attemptWithRecovery() call.
 */

import type { ErrorKind } from '../detection/types.js';
import type { RecoveryConfig } from '../config/recovery.js';

// ── Types ────────────────────────────────────────────────────────────────

/**
 * What the recovery loop does with a failure of a given kind.
 *
 * - `backoff`: sleep then retry (rate limit, network)
 * - `manual`:  pause for a human, never auto-retried (CAPTCHA)
 * - `fatal`:   stop the current action, caller must re-authenticate
 * - `skip`:    give up on this item without failing the session
 * - `retry_once`: unexplained failure, allow a single cautious retry
 */
export type Disposition = 'backoff' | 'manual' | 'fatal' | 'skip' | 'retry_once';

export interface RetryState {
  /** Retries scheduled so far in this call */
  attempt: number;
  currentBackoffSeconds: number;
  consecutiveRateLimitCount: number;
  unknownRetryCount: number;
  maxRetries: number;
}

const DISPOSITIONS: Record<ErrorKind, Disposition> = {
  captcha: 'manual',
  rate_limit: 'backoff',
  network_error: 'backoff',
  session_timeout: 'fatal',
  login_required: 'fatal',
  form_not_found: 'skip',
  unknown: 'retry_once',
  none: 'retry_once',
};

// ── RetryStrategy ────────────────────────────────────────────────────────

export class RetryStrategy {
  constructor(private readonly config: RecoveryConfig) {}

  createState(maxRetries?: number): RetryState {
    return {
      attempt: 0,
      currentBackoffSeconds: this.config.initialBackoffSeconds,
      consecutiveRateLimitCount: 0,
      unknownRetryCount: 0,
      maxRetries: maxRetries ?? this.config.maxRetries,
    };
  }

  dispositionOf(kind: ErrorKind): Disposition {
    return DISPOSITIONS[kind];
  }

  /**
   * Record a failure of `kind` and decide whether to retry.
   *
   * Call exactly once per failure: the rate-limit streak and the unknown
   * retry budget are counted here.
   */
  shouldRetry(kind: ErrorKind, state: RetryState): boolean {
    if (kind === 'rate_limit') {
      state.consecutiveRateLimitCount += 1;
      if (state.consecutiveRateLimitCount >= this.config.rateLimitMaxConsecutive) {
        return false;
      }
      return state.attempt < state.maxRetries;
    }

    state.consecutiveRateLimitCount = 0;

    switch (this.dispositionOf(kind)) {
      case 'backoff':
        return state.attempt < state.maxRetries;
      case 'retry_once':
        if (state.unknownRetryCount >= this.config.unknownMaxRetries || state.attempt >= state.maxRetries) {
          return false;
        }
        state.unknownRetryCount += 1;
        return true;
      default:
        return false;
    }
  }

  /**
   * Seconds to wait before the next retry. Advances the state so the
   * following call returns min(current * multiplier, maxBackoff).
   */
  nextBackoff(state: RetryState): number {
    const wait = Math.min(state.currentBackoffSeconds, this.config.maxBackoffSeconds);
    state.currentBackoffSeconds = Math.min(
      state.currentBackoffSeconds * this.config.backoffMultiplier,
      this.config.maxBackoffSeconds,
    );
    state.attempt += 1;
    return wait;
  }

  reset(state: RetryState): void {
    state.attempt = 0;
    state.currentBackoffSeconds = this.config.initialBackoffSeconds;
    state.consecutiveRateLimitCount = 0;
    state.unknownRetryCount = 0;
  }
}
