import type { MergedCharacterData } from './character';

/**
 * Terminal state of an analysis session
 *
 * - `completed`: every batch was attempted (some may have failed)
 * - `failed`: the session could not start, e.g. normalization produced nothing
 * - `cancelled`: stopped between batches; results cover the merged prefix
 */
export type AnalysisStatus = 'completed' | 'failed' | 'cancelled';

/**
 * Lifecycle state of a batch orchestrator
 */
export type OrchestratorState = 'idle' | 'running' | AnalysisStatus;

/**
 * A batch whose engine call failed and whose output was skipped
 */
export interface BatchFailure {
  batchIndex: number;
  startParagraphIndex: number;
  endParagraphIndex: number;
  error: Error;
}

/**
 * Outcome of one analysis session
 */
export interface AnalysisSessionResult {
  status: AnalysisStatus;

  /**
   * Merged characters, most dialog first
   */
  characters: MergedCharacterData[];

  /**
   * Number of batches the session was planned with, including any resumed
   * from a checkpoint
   */
  totalBatches: number;

  /**
   * Batches attempted during this run
   */
  attemptedBatches: number;

  failedBatchCount: number;
  failures: BatchFailure[];
  totalParagraphs: number;

  /**
   * Whether the run continued from a checkpoint
   */
  resumedFromCheckpoint: boolean;

  /**
   * Set when `status` is `failed`
   */
  error?: Error;
}
