/**
 * ErrorDetector — classifies why an action failed by looking at the page.
 *
 * Detection is a flat rule table of (kind, predicate) pairs evaluated in
 * priority order. The first matching rule wins, so when a page shows both a
 * CAPTCHA and a throttling message the result is `captcha`:
 *
 *   captcha > rate_limit > session_timeout / login_required > network_error > form_not_found
 *
 * All matching is case-insensitive substring search over the page source and
 * the URL. detectError() never throws; a failing rule yields `unknown`.
 */

import type { SessionContext } from '../session/SessionContext.js';
import { DetectableKindSchema, type DetectionInput, type DetectionRule, type ErrorClassification } from './types.js';

// ── Indicator lists ──────────────────────────────────────────────────────

const CAPTCHA_TEXT = [
  'captcha',
  "verify it's you",
  'verify it’s you',
  'are you human',
  'are you a human',
  "verify you're not a robot",
  'verify you are not a robot',
  "i'm not a robot",
  "let's do a quick security check",
  'solve this puzzle',
];

const CAPTCHA_PATH_SEGMENTS = ['checkpoint', 'challenge', 'captcha'];

const RATE_LIMIT_TEXT = [
  'too many requests',
  'too many attempts',
  'slow down',
  'try again later',
  'temporarily unavailable',
  'rate limit',
];

const SESSION_TIMEOUT_TEXT = [
  'session expired',
  'session has expired',
  'session timed out',
  'session has timed out',
];

const LOGIN_REQUIRED_TEXT = [
  'login required',
  'you must be logged in',
  'sign in to continue',
  'please log in',
  'please sign in',
];

const LOGIN_PATH_SEGMENTS = ['login', 'signin', 'sign-in', 'authwall'];

const NETWORK_TEXT = [
  'connection refused',
  'connection reset',
  'connection timed out',
  'connection timeout',
  'unable to connect',
  'no internet',
  'network error',
  'err_connection',
  'err_name_not_resolved',
  '502 bad gateway',
  '503 service unavailable',
  '504 gateway timeout',
];

/** Text whose presence means the application form (or its entry button) is on the page */
export const DEFAULT_FORM_INDICATORS = ['apply', '<form'];

// ── Helpers ──────────────────────────────────────────────────────────────

function containsAny(haystack: string, needles: readonly string[]): boolean {
  return needles.some((needle) => haystack.includes(needle));
}

function hasPathSegment(path: string, segments: readonly string[]): boolean {
  const parts = path.split('/').filter(Boolean);
  return parts.some((part) => segments.includes(part));
}

function toUrlPath(url: string): string {
  if (!url) return '';
  try {
    return new URL(url).pathname.toLowerCase();
  } catch {
    return url;
  }
}

/**
 * Build the default rule table. Order is priority order.
 */
export function buildDefaultRules(formIndicators: readonly string[] = DEFAULT_FORM_INDICATORS): DetectionRule[] {
  const indicators = formIndicators.map((i) => i.toLowerCase());

  return [
    {
      kind: 'captcha',
      message: 'CAPTCHA detected on page',
      matches: ({ pageSource, urlPath }) =>
        containsAny(pageSource, CAPTCHA_TEXT) || hasPathSegment(urlPath, CAPTCHA_PATH_SEGMENTS),
    },
    {
      kind: 'rate_limit',
      message: 'Rate limit or throttling detected',
      matches: ({ pageSource }) => containsAny(pageSource, RATE_LIMIT_TEXT),
    },
    {
      kind: 'session_timeout',
      message: 'Session timeout - re-login required',
      matches: ({ pageSource }) => containsAny(pageSource, SESSION_TIMEOUT_TEXT),
    },
    {
      kind: 'login_required',
      message: 'Login required - re-authenticate before continuing',
      matches: ({ pageSource, urlPath }) =>
        containsAny(pageSource, LOGIN_REQUIRED_TEXT) || hasPathSegment(urlPath, LOGIN_PATH_SEGMENTS),
    },
    {
      kind: 'network_error',
      message: 'Network error detected',
      matches: ({ pageSource }) => containsAny(pageSource, NETWORK_TEXT),
    },
    {
      kind: 'form_not_found',
      message: 'Application form not found',
      matches: ({ pageSource }) => indicators.length > 0 && !containsAny(pageSource, indicators),
    },
  ];
}

/** Reject injected rules whose kind the recovery table does not know. */
function checkRule(rule: DetectionRule, index: number): DetectionRule {
  const kind = DetectableKindSchema.safeParse(rule.kind);
  if (!kind.success) {
    throw new Error(`Detection rule ${index} has invalid kind ${JSON.stringify(rule.kind)}`);
  }
  return rule;
}

// ── ErrorDetector ────────────────────────────────────────────────────────

export interface ErrorDetectorOptions {
  /** Replace the whole rule table (still evaluated top to bottom) */
  rules?: DetectionRule[];
  /** Strings that prove the form is present; ignored when `rules` is given */
  formIndicators?: string[];
  now?: () => Date;
}

export class ErrorDetector {
  private rules: DetectionRule[];
  private now: () => Date;

  constructor(opts: ErrorDetectorOptions = {}) {
    this.rules = opts.rules ? opts.rules.map(checkRule) : buildDefaultRules(opts.formIndicators);
    this.now = opts.now ?? (() => new Date());
  }

  /**
   * Classify the page. Returns kind `none` when no rule matches and
   * `unknown` when the input could not be inspected.
   */
  detectError(pageSource: string, currentUrl: string): ErrorClassification {
    try {
      const input: DetectionInput = {
        pageSource: pageSource.toLowerCase(),
        currentUrl: currentUrl.toLowerCase(),
        urlPath: toUrlPath(currentUrl.toLowerCase()),
      };

      for (const rule of this.rules) {
        if (rule.matches(input)) {
          return this.classification(rule.kind, rule.message);
        }
      }
      return this.classification('none', 'No error detected');
    } catch (err) {
      return this.classification('unknown', `Error during detection: ${describeError(err)}`);
    }
  }

  /**
   * Read the page through the session and classify it. Failures to read the
   * page (closed tab, dropped connection) are reported as `unknown`.
   */
  async detectFromSession(session: SessionContext): Promise<ErrorClassification> {
    let pageSource: string;
    let currentUrl: string;
    try {
      [pageSource, currentUrl] = await Promise.all([session.pageSource(), session.currentUrl()]);
    } catch (err) {
      return this.classification('unknown', `Could not read page state: ${describeError(err)}`);
    }
    return this.detectError(pageSource, currentUrl);
  }

  private classification(kind: ErrorClassification['kind'], message: string): ErrorClassification {
    return { kind, message, detectedAt: this.now() };
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
