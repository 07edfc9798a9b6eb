import type {
  BatchFailure,
  MergedCharacterData,
  PageRange,
  ParagraphBatch,
} from '@storycast/model';

import type { AnalysisCheckpoint } from '../checkpoint';

/**
 * Extra context passed along with a completed batch
 */
export interface BatchCompleteDetails {
  batch: ParagraphBatch;

  /**
   * Source pages the batch's paragraphs came from, null when unknown
   */
  pageRange: PageRange | null;
}

/**
 * Progress hooks for an analysis session
 *
 * Every hook is optional. A hook that throws is logged and the session
 * keeps running. Characters handed to hooks are snapshots.
 */
export interface AnalysisCallbacks {
  /**
   * Called after a batch's output has been merged
   */
  onBatchComplete?: (
    batchIndex: number,
    totalBatches: number,
    characters: MergedCharacterData[],
    details: BatchCompleteDetails,
  ) => void;

  /**
   * Called when a batch's engine call failed and the batch was skipped
   */
  onBatchFailed?: (failure: BatchFailure, totalBatches: number) => void;

  /**
   * Called once a session completes or is cancelled
   */
  onSessionComplete?: (
    characters: MergedCharacterData[],
    failedBatchCount: number,
  ) => void;

  /**
   * Called after every attempted batch with a resumable snapshot
   */
  onCheckpoint?: (checkpoint: AnalysisCheckpoint) => void;
}
