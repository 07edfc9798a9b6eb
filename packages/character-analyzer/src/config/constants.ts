/**
 * Token accounting shared by every pass.
 *
 * Token counts are a heuristic: a fixed number of characters per token.
 */
export const TOKEN_BUDGET = {
  CHARS_PER_TOKEN: 4,
  /** Hard ceiling on prompt + input + output tokens for one engine call */
  TOTAL_TOKENS: 4096,
} as const;

/**
 * Paragraph segmentation thresholds
 */
export const NORMALIZER = {
  /** Paragraphs this short or shorter are dropped as noise */
  MIN_PARAGRAPH_LENGTH: 10,
  PARAGRAPH_SEPARATOR: '\n\n',
} as const;

/**
 * Fuzzy name matching thresholds
 */
export const NAME_MATCHING = {
  /** Shortest shared token that links two names ("Mr" does not, "Harry" does) */
  MIN_SHARED_TOKEN_LENGTH: 3,
} as const;

/**
 * Defaults applied when a voice attribute has not been inferred
 */
export const VOICE_PROFILE_DEFAULTS = {
  gender: 'unknown',
  age: 'unknown',
  accent: 'neutral',
  pitch: 1.0,
  speed: 1.0,
  energy: 1.0,
} as const;

/**
 * Defaults for LLM-backed extraction
 */
export const LLM_DEFAULTS = {
  MAX_RETRIES: 3,
  TEMPERATURE: 0,
} as const;

/**
 * Checkpoint persistence format
 */
export const CHECKPOINT = {
  VERSION: 1,
  /** Length of the hex content hash prefix kept in a checkpoint */
  HASH_LENGTH: 16,
  MAX_AGE_MS: 24 * 60 * 60 * 1000,
} as const;
