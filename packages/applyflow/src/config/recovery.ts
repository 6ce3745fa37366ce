/**
 * Error-recovery configuration.
 *
 * Backoff values are in seconds. Defaults give the retry sequence
 * 5, 10, 20, 40, 80, 160, 300, 300, ...
 */

import { z } from 'zod';

export const RecoveryConfigSchema = z.object({
  /** Retries allowed per attemptWithRecovery call (first attempt not counted) */
  maxRetries: z.number().int().nonnegative().default(3),
  initialBackoffSeconds: z.number().positive().default(5),
  backoffMultiplier: z.number().min(1).default(2.0),
  maxBackoffSeconds: z.number().positive().default(300),
  /** Give up once this many rate-limit failures arrive back to back */
  rateLimitMaxConsecutive: z.number().int().positive().default(3),
  /** Retries granted to failures the detector cannot explain */
  unknownMaxRetries: z.number().int().nonnegative().default(1),
  /** Upper bound on the manual-intervention wait for a CAPTCHA */
  captchaMaxWaitSeconds: z.number().positive().default(300),
  /** When false a CAPTCHA fails the attempt immediately instead of waiting for requestResume() */
  captchaBlockingWait: z.boolean().default(false),
}).refine(
  (cfg) => cfg.maxBackoffSeconds >= cfg.initialBackoffSeconds,
  { message: 'maxBackoffSeconds must be >= initialBackoffSeconds' },
);

export type RecoveryConfig = z.infer<typeof RecoveryConfigSchema>;
export type RecoveryConfigInput = z.input<typeof RecoveryConfigSchema>;

export function resolveRecoveryConfig(overrides: RecoveryConfigInput = {}): RecoveryConfig {
  return RecoveryConfigSchema.parse(overrides);
}
