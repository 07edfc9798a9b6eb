import { NAME_MATCHING } from '../config/constants';

/**
 * Strategy for deciding whether two character names denote the same entity
 */
export interface CharacterNameMatcher {
  /**
   * Normalized form used as an accumulator key. May be empty.
   */
  canonicalize(name: string): string;

  matches(name1: string, name2: string): boolean;

  /**
   * Whether `name` resolves to an existing character, known by its canonical
   * name and the variants already merged into it
   */
  isVariant(
    name: string,
    canonicalReference: string,
    knownVariants: Iterable<string>,
  ): boolean;
}

export type NameMatchingMode = 'fuzzy' | 'strict';

abstract class BaseCharacterNameMatcher implements CharacterNameMatcher {
  abstract canonicalize(name: string): string;

  abstract matches(name1: string, name2: string): boolean;

  isVariant(
    name: string,
    canonicalReference: string,
    knownVariants: Iterable<string>,
  ): boolean {
    const canonical = this.canonicalize(name);
    if (!canonical) return false;

    for (const variant of knownVariants) {
      if (this.canonicalize(variant) === canonical) return true;
    }

    return this.matches(name, canonicalReference);
  }
}

/**
 * Exact matching on lowercased, whitespace-normalized names
 */
export class StrictCharacterNameMatcher extends BaseCharacterNameMatcher {
  canonicalize(name: string): string {
    return name.normalize('NFC').toLowerCase().trim().replace(/\s+/g, ' ');
  }

  matches(name1: string, name2: string): boolean {
    const canonical1 = this.canonicalize(name1);
    return canonical1 !== '' && canonical1 === this.canonicalize(name2);
  }
}

/**
 * Lexical fuzzy matching.
 *
 * Two names match when their canonical forms are equal, one contains the
 * other, or they share a word of at least `MIN_SHARED_TOKEN_LENGTH`
 * characters. "Harry Potter" matches "Harry"; "Mr A" does not match "Mr B".
 */
export class FuzzyCharacterNameMatcher extends BaseCharacterNameMatcher {
  canonicalize(name: string): string {
    return name
      .normalize('NFC')
      .toLowerCase()
      .replace(/[^\p{L}\p{M}\p{N}\s]/gu, '')
      .replace(/\s+/g, ' ')
      .trim();
  }

  matches(name1: string, name2: string): boolean {
    const canonical1 = this.canonicalize(name1);
    const canonical2 = this.canonicalize(name2);
    if (!canonical1 || !canonical2) return false;

    if (canonical1 === canonical2) return true;
    if (canonical1.includes(canonical2) || canonical2.includes(canonical1)) {
      return true;
    }

    const words1 = new Set(this.significantWords(canonical1));
    return this.significantWords(canonical2).some((word) => words1.has(word));
  }

  private significantWords(canonical: string): string[] {
    return canonical
      .split(' ')
      .filter((word) => word.length >= NAME_MATCHING.MIN_SHARED_TOKEN_LENGTH);
  }
}

export function createNameMatcher(
  mode: NameMatchingMode = 'fuzzy',
): CharacterNameMatcher {
  return mode === 'strict'
    ? new StrictCharacterNameMatcher()
    : new FuzzyCharacterNameMatcher();
}
