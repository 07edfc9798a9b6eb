export { LlmCharacterExtractor } from './character-extractor';
export type { ExtractionEngine } from './extraction-engine';
