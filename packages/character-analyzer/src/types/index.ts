export {
  BatchOutputSchema,
  CharacterExtractionResponseSchema,
  ExtractedCharacterDataSchema,
  VoiceProfileSchema,
  type CharacterExtractionResponse,
} from './extraction-schema';
export type {
  AnalysisCallbacks,
  BatchCompleteDetails,
} from './analysis-callbacks';
