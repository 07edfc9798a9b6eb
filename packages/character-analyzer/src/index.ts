export {
  CharacterAnalyzer,
  type CharacterAnalysisResult,
  type CharacterAnalyzerOptions,
} from './character-analyzer';
export { ParagraphBatcher } from './batching';
export {
  PASS_BUDGETS,
  PassTokenBudget,
  TokenBudgetManager,
  type PassBudgetName,
  type PassTokenBudgetParts,
} from './budget';
export {
  AnalysisCheckpointSchema,
  CheckpointManager,
  type AnalysisCheckpoint,
  type CheckpointCharacter,
  type CheckpointState,
} from './checkpoint';
export { createModel, type ModelProvider } from './config/model-factory';
export {
  ConfigurationError,
  EngineError,
  NormalizationAnomalyError,
} from './errors';
export { LlmCharacterExtractor, type ExtractionEngine } from './extractors';
export {
  FuzzyCharacterNameMatcher,
  StrictCharacterNameMatcher,
  createNameMatcher,
  type CharacterNameMatcher,
  type NameMatchingMode,
} from './matching';
export {
  IncrementalMerger,
  PreferDetailedVoiceProfileMerger,
  PreferExistingVoiceProfileMerger,
  PreferNewVoiceProfileMerger,
  createVoiceProfileMerger,
  type CharacterAccumulator,
  type VoiceMergeStrategy,
  type VoiceProfileMerger,
} from './merging';
export {
  BatchOrchestrator,
  type BatchOrchestratorOptions,
  type OrchestratorRunOptions,
} from './orchestrator';
export {
  BatchOutputSchema,
  ExtractedCharacterDataSchema,
  type AnalysisCallbacks,
  type BatchCompleteDetails,
} from './types';
export { TextNormalizer, type ParagraphsWithPageMapping } from './utils';
