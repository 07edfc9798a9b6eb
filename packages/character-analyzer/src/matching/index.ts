export {
  FuzzyCharacterNameMatcher,
  StrictCharacterNameMatcher,
  createNameMatcher,
  type CharacterNameMatcher,
  type NameMatchingMode,
} from './character-name-matcher';
