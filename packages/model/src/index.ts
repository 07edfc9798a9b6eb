export type {
  ExtractedCharacterData,
  MergedCharacterData,
  VoiceProfile,
} from './character';
export type { PageRange, ParagraphBatch } from './batch';
export type {
  AnalysisSessionResult,
  AnalysisStatus,
  BatchFailure,
  OrchestratorState,
} from './analysis-result';
export type {
  ComponentUsageReport,
  ModelUsageDetail,
  PhaseUsageReport,
  TokenUsageReport,
  TokenUsageSummary,
} from './token-usage-report';
