export { ErrorDetector, buildDefaultRules, describeError, DEFAULT_FORM_INDICATORS, type ErrorDetectorOptions } from './ErrorDetector.js';
export { DetectableKindSchema, ErrorKindSchema } from './types.js';
export type { DetectableKind, ErrorKind, ErrorClassification, DetectionInput, DetectionRule } from './types.js';
