import { describe, expect, test } from 'vitest';

import {
  FuzzyCharacterNameMatcher,
  StrictCharacterNameMatcher,
  createNameMatcher,
} from './character-name-matcher';

describe('FuzzyCharacterNameMatcher', () => {
  const matcher = new FuzzyCharacterNameMatcher();

  describe('canonicalize', () => {
    test('lowercases, strips punctuation and collapses whitespace', () => {
      expect(matcher.canonicalize('  Mr.   SMITH!  ')).toBe('mr smith');
      expect(matcher.canonicalize("O'Brien")).toBe('obrien');
    });

    test('keeps letters outside ASCII', () => {
      expect(matcher.canonicalize('Zo\u00EB \u00C9clair')).toBe(
        'zo\u00EB \u00E9clair',
      );
    });

    test('keeps combining vowel signs', () => {
      // Devanagari "Ram" with and without the aa sign
      expect(matcher.canonicalize('\u0930\u093E\u092E')).toBe(
        '\u0930\u093E\u092E',
      );
      expect(matcher.matches('\u0930\u093E\u092E', '\u0930\u092E')).toBe(
        false,
      );
    });

    test('punctuation-only names canonicalize to empty', () => {
      expect(matcher.canonicalize('...')).toBe('');
    });
  });

  describe('matches', () => {
    test('matches on a shared significant word', () => {
      expect(matcher.matches('Harry Potter', 'Harry')).toBe(true);
      expect(matcher.matches('Harry Potter', 'Potter Harry')).toBe(true);
    });

    test('does not match on short shared words', () => {
      expect(matcher.matches('Mr A', 'Mr B')).toBe(false);
    });

    test('matches case and punctuation variants', () => {
      expect(matcher.matches('Mr. Smith', 'mr smith')).toBe(true);
    });

    test('matches when one name contains the other', () => {
      expect(matcher.matches('John Smith', 'Smith')).toBe(true);
      expect(matcher.matches('Al', 'Alice')).toBe(true);
    });

    test('unrelated names do not match', () => {
      expect(matcher.matches('Alice', 'Bob')).toBe(false);
    });

    test('empty canonical forms never match', () => {
      expect(matcher.matches('', 'Alice')).toBe(false);
      expect(matcher.matches('!!!', '???')).toBe(false);
    });
  });

  describe('isVariant', () => {
    test('accepts a known variant regardless of case', () => {
      expect(
        matcher.isVariant('THE BOY', 'harry potter', new Set(['the boy'])),
      ).toBe(true);
    });

    test('falls back to fuzzy matching the reference name', () => {
      expect(matcher.isVariant('Potter', 'harry potter', new Set())).toBe(true);
      expect(matcher.isVariant('Ron', 'harry potter', ['harry'])).toBe(false);
    });

    test('rejects names that canonicalize to empty', () => {
      expect(matcher.isVariant('--', 'harry', new Set(['']))).toBe(false);
    });
  });
});

describe('StrictCharacterNameMatcher', () => {
  const matcher = new StrictCharacterNameMatcher();

  test('canonicalizes case and whitespace only', () => {
    expect(matcher.canonicalize('  Mr.   Smith ')).toBe('mr. smith');
  });

  test('matches only equal canonical forms', () => {
    expect(matcher.matches('Alice', ' alice ')).toBe(true);
    expect(matcher.matches('Harry Potter', 'Harry')).toBe(false);
    expect(matcher.matches('', '  ')).toBe(false);
  });

  test('isVariant consults known variants first', () => {
    expect(matcher.isVariant('Hermione', 'granger', ['hermione'])).toBe(true);
    expect(matcher.isVariant('Hermione', 'granger', [])).toBe(false);
  });
});

describe('createNameMatcher', () => {
  test('defaults to fuzzy matching', () => {
    expect(createNameMatcher()).toBeInstanceOf(FuzzyCharacterNameMatcher);
    expect(createNameMatcher('strict')).toBeInstanceOf(
      StrictCharacterNameMatcher,
    );
  });
});
