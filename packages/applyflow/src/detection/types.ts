import { z } from 'zod';

// ── ErrorKind ────────────────────────────────────────────────────────────

export const ErrorKindSchema = z.enum([
  'captcha',
  'rate_limit',
  'session_timeout',
  'network_error',
  'form_not_found',
  'login_required',
  'unknown',
  'none',
]);

export type ErrorKind = z.infer<typeof ErrorKindSchema>;

/** Kinds a detection rule may report; `none` and `unknown` are the detector's own. */
export const DetectableKindSchema = ErrorKindSchema.exclude(['none', 'unknown']);

export type DetectableKind = z.infer<typeof DetectableKindSchema>;

// ── ErrorClassification ──────────────────────────────────────────────────
// Produced once per failed attempt and dropped after it has been handled.

export interface ErrorClassification {
  kind: ErrorKind;
  message: string;
  detectedAt: Date;
}

/** Lowercased page state handed to each detection rule. */
export interface DetectionInput {
  pageSource: string;
  currentUrl: string;
  /** Pathname of currentUrl, or the raw URL when it does not parse */
  urlPath: string;
}

export interface DetectionRule {
  kind: DetectableKind;
  message: string;
  matches: (input: DetectionInput) => boolean;
}
