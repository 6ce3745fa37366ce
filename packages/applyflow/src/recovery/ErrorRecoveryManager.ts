/**
 * ErrorRecoveryManager — runs a caller-supplied action with failure
 * detection and retry.
 *
 *   attempt -> execute action
 *     success          -> reset retry state, return success
 *     failure          -> classify the page (ErrorDetector)
 *       backoff kinds  -> sleep nextBackoff(), attempt again
 *       captcha        -> optional bounded wait for requestResume()
 *       fatal / skip   -> return failure immediately
 *
 * Construct one manager per browser session and pass it to whatever needs
 * it. attemptWithRecovery() never throws; every outcome is a RecoveryResult.
 */

import { EventEmitter } from 'eventemitter3';
import { resolveRecoveryConfig, type RecoveryConfig, type RecoveryConfigInput } from '../config/recovery.js';
import { ErrorDetector, describeError } from '../detection/ErrorDetector.js';
import type { ErrorClassification, ErrorKind } from '../detection/types.js';
import { getLogger, type Logger } from '../monitoring/logger.js';
import type { SessionContext } from '../session/SessionContext.js';
import { RetryStrategy, type RetryState } from './RetryStrategy.js';

// ── Types ────────────────────────────────────────────────────────────────

/** Returns true when the step completed. May also throw. */
export type RecoveryAction = () => boolean | Promise<boolean>;

export interface RecoveryResult {
  success: boolean;
  errorMessage: string | null;
  /** Classification of the failure that ended the call, `none` on success */
  errorKind: ErrorKind;
  /** How many times the action was executed */
  attempts: number;
  /** True when the item should be skipped rather than treated as a session failure */
  skipped: boolean;
}

export interface CaptchaEvent {
  actionName: string;
  message: string;
  url: string | null;
  at: Date;
}

export interface RecoveryEvents {
  captcha_paused: (event: CaptchaEvent) => void;
  captcha_resumed: (event: CaptchaEvent) => void;
  captcha_timeout: (event: CaptchaEvent) => void;
}

export interface ErrorRecoveryManagerOptions {
  session: SessionContext;
  config?: RecoveryConfigInput;
  detector?: ErrorDetector;
  logger?: Logger;
  /** Injected for tests; defaults to a setTimeout-based delay */
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

// ── ErrorRecoveryManager ─────────────────────────────────────────────────

export class ErrorRecoveryManager extends EventEmitter<RecoveryEvents> {
  readonly config: RecoveryConfig;
  private session: SessionContext;
  private detector: ErrorDetector;
  private strategy: RetryStrategy;
  private logger: Logger;
  private sleep: (ms: number) => Promise<void>;
  private resumeWaiter: (() => void) | null = null;

  constructor(opts: ErrorRecoveryManagerOptions) {
    super();
    this.config = resolveRecoveryConfig(opts.config);
    this.session = opts.session;
    this.detector = opts.detector ?? new ErrorDetector();
    this.strategy = new RetryStrategy(this.config);
    this.logger = opts.logger ?? getLogger().child({ component: 'ErrorRecoveryManager' });
    this.sleep = opts.sleep ?? defaultSleep;
  }

  async attemptWithRecovery(
    action: RecoveryAction,
    actionName = 'Job Application',
    maxRetries?: number,
  ): Promise<RecoveryResult> {
    const state = this.strategy.createState(maxRetries);
    const log = this.logger.child({ action: actionName });
    let attempts = 0;
    let captchaResumes = 0;

    for (;;) {
      attempts += 1;
      log.info(`Attempting ${actionName}`, { attempt: attempts });

      const failure = await this.runOnce(action, log);
      if (!failure) {
        this.strategy.reset(state);
        log.success(`${actionName} successful`, { attempts });
        return { success: true, errorMessage: null, errorKind: 'none', attempts, skipped: false };
      }

      const disposition = this.strategy.dispositionOf(failure.kind);

      if (disposition === 'manual') {
        if (!this.config.captchaBlockingWait) {
          log.warn('CAPTCHA detected, manual intervention required', { message: failure.message });
          return this.failed(failure, `CAPTCHA detected: ${failure.message}`, attempts);
        }
        if (captchaResumes >= state.maxRetries) {
          log.error('CAPTCHA keeps reappearing after resume', { resumes: captchaResumes });
          return this.failed(failure, `CAPTCHA unresolved after ${captchaResumes} resumes`, attempts);
        }
        const resumed = await this.waitForCaptcha(actionName, failure, log);
        if (!resumed) {
          return this.failed(failure, `CAPTCHA timeout: ${failure.message}`, attempts);
        }
        captchaResumes += 1;
        if (this.stopRequested()) return this.stopped(attempts);
        continue;
      }

      if (disposition === 'fatal') {
        log.error(`${actionName} failed: ${failure.message}`, { kind: failure.kind });
        return this.failed(failure, failure.message, attempts);
      }

      if (disposition === 'skip') {
        log.warn(`${actionName} skipped: ${failure.message}`, { kind: failure.kind });
        return { ...this.failed(failure, failure.message, attempts), skipped: true };
      }

      if (!this.strategy.shouldRetry(failure.kind, state)) {
        const message = this.giveUpMessage(failure, state);
        log.error(`${actionName} failed: ${message}`, { kind: failure.kind, attempts });
        return this.failed(failure, message, attempts);
      }

      const waitSeconds = this.strategy.nextBackoff(state);
      log.warn(`${actionName} failed: ${failure.kind}, retrying`, {
        message: failure.message,
        waitSeconds,
        retry: state.attempt,
        maxRetries: state.maxRetries,
      });
      await this.sleep(waitSeconds * 1000);

      if (this.stopRequested()) return this.stopped(attempts);
    }
  }

  /** Classify the current page without running an action. */
  checkForError(): Promise<ErrorClassification> {
    return this.detector.detectFromSession(this.session);
  }

  /**
   * Release a pending CAPTCHA wait. Returns false when no attempt is
   * currently waiting.
   */
  requestResume(): boolean {
    const waiter = this.resumeWaiter;
    if (!waiter) return false;
    this.resumeWaiter = null;
    waiter();
    return true;
  }

  // ── Internals ──────────────────────────────────────────────────────────

  private async runOnce(action: RecoveryAction, log: Logger): Promise<ErrorClassification | null> {
    let thrown: unknown = null;
    try {
      if (await action()) return null;
    } catch (err) {
      thrown = err;
      log.error('Action threw', { error: describeError(err) });
    }

    const detected = await this.detector.detectFromSession(this.session);
    if (detected.kind !== 'none') return detected;

    return thrown === null
      ? { ...detected, message: 'Action failed without a detectable page error' }
      : { ...detected, kind: 'unknown', message: describeError(thrown) };
  }

  private async waitForCaptcha(actionName: string, failure: ErrorClassification, log: Logger): Promise<boolean> {
    const event: CaptchaEvent = {
      actionName,
      message: failure.message,
      url: await this.session.currentUrl().catch((err: unknown) => {
        log.debug('Could not read URL for CAPTCHA event', { error: describeError(err) });
        return null;
      }),
      at: new Date(),
    };

    log.warn('CAPTCHA detected, pausing for manual resolution', {
      maxWaitSeconds: this.config.captchaMaxWaitSeconds,
    });

    const waiting = this.waitForResume(this.config.captchaMaxWaitSeconds * 1000);
    this.emit('captcha_paused', event);
    const resumed = await waiting;

    if (resumed) {
      log.info('Resuming after CAPTCHA by user action');
      this.emit('captcha_resumed', { ...event, at: new Date() });
    } else {
      log.error('CAPTCHA wait timed out', { maxWaitSeconds: this.config.captchaMaxWaitSeconds });
      this.emit('captcha_timeout', { ...event, at: new Date() });
    }
    return resumed;
  }

  private waitForResume(ms: number): Promise<boolean> {
    return new Promise<boolean>((resolve) => {
      const timer = setTimeout(() => {
        this.resumeWaiter = null;
        resolve(false);
      }, ms);
      this.resumeWaiter = () => {
        clearTimeout(timer);
        resolve(true);
      };
    });
  }

  private giveUpMessage(failure: ErrorClassification, state: RetryState): string {
    if (failure.kind === 'rate_limit' && state.consecutiveRateLimitCount >= this.config.rateLimitMaxConsecutive) {
      return `Max consecutive rate limits (${this.config.rateLimitMaxConsecutive}) reached: ${failure.message}`;
    }
    if (state.attempt >= state.maxRetries) {
      return `Max retries (${state.maxRetries}) exceeded: ${failure.message}`;
    }
    return failure.message;
  }

  private stopRequested(): boolean {
    return this.session.shouldStop?.() ?? false;
  }

  private failed(failure: ErrorClassification, message: string, attempts: number): RecoveryResult {
    return { success: false, errorMessage: message, errorKind: failure.kind, attempts, skipped: false };
  }

  private stopped(attempts: number): RecoveryResult {
    this.logger.info('Stop requested, abandoning retries', { attempts });
    return { success: false, errorMessage: 'Stopped by caller', errorKind: 'none', attempts, skipped: false };
  }
}
