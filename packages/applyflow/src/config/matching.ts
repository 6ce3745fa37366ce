/**
 * Fuzzy-matching thresholds.
 *
 * These were picked by hand against a small set of real application forms
 * and have not been tuned systematically. Callers can override each one
 * where it is accepted as an option.
 */
export const MATCHING_THRESHOLDS = {
  /** Minimum score before a static answer is used for a question */
  confidenceGate: 0.45,
  /** A form field is filled only when its best label score exceeds this */
  fieldMatch: 0.6,
  /** Minimum similarity for reusing a learned answer */
  learnedReuse: 0.8,
  /** Similarity above which an upsert merges into an existing learned entry */
  learnedMerge: 0.8,
  /** Confidence assigned to answers produced by the answer generator */
  generatedConfidence: 0.9,
} as const;

export type MatchingThresholds = typeof MATCHING_THRESHOLDS;
