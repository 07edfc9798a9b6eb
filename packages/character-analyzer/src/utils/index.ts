export {
  TextNormalizer,
  type ParagraphsWithPageMapping,
} from './text-normalizer';
