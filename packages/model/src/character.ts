/**
 * Voice attributes inferred for a character.
 *
 * Every field is optional. A string field holding only whitespace counts as
 * empty. Defaults: gender `unknown`, age `unknown`, accent `neutral`, and
 * `1.0` for pitch, speed and energy.
 */
export interface VoiceProfile {
  gender?: string;
  age?: string;
  accent?: string;
  pitch?: number;
  speed?: number;
  energy?: number;
}

/**
 * One character as reported by the extraction engine for a single batch
 */
export interface ExtractedCharacterData {
  /**
   * Display name as it appeared in the batch
   */
  name: string;

  /**
   * Dialog lines attributed to the character, in text order
   */
  dialogs: string[];

  /**
   * Descriptive traits (e.g. 'brave', 'sarcastic')
   */
  traits: string[];

  voiceProfile?: VoiceProfile;
}

/**
 * Accumulated view of one character across every batch merged so far
 */
export interface MergedCharacterData {
  /**
   * First-seen display name. Later variants never replace it.
   */
  name: string;

  /**
   * Normalized form used as the accumulator key
   */
  canonicalName: string;

  /**
   * Dialog lines in merge order. Duplicates are kept.
   */
  dialogs: string[];

  /**
   * Unique case-insensitively, keeping the first-seen casing
   */
  traits: string[];

  voiceProfile?: VoiceProfile;

  /**
   * Canonical forms of every name that has been resolved to this character
   */
  knownVariants: Set<string>;
}
