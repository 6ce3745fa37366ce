export { getEnv, type Env } from './env.js';
export { resolveRecoveryConfig, RecoveryConfigSchema } from './recovery.js';
export type { RecoveryConfig, RecoveryConfigInput } from './recovery.js';
export { MATCHING_THRESHOLDS, type MatchingThresholds } from './matching.js';
export { loadStaticAnswers, StaticAnswersFileSchema, type StaticAnswersFile } from './answers.js';
