import type { LoggerMethods } from '@storycast/logger';
import type {
  AnalysisSessionResult,
  AnalysisStatus,
  BatchFailure,
  OrchestratorState,
  ParagraphBatch,
} from '@storycast/model';

import type { AnalysisCheckpoint } from '../checkpoint';
import type { ExtractionEngine } from '../extractors';
import type { CharacterAccumulator, IncrementalMerger } from '../merging';
import type { AnalysisCallbacks } from '../types';

import { PASS_BUDGETS, type PassTokenBudget } from '../budget';
import { ParagraphBatcher } from '../batching';
import { CheckpointManager } from '../checkpoint';
import { EngineError, NormalizationAnomalyError } from '../errors';
import { BatchOutputSchema } from '../types';
import { TextNormalizer } from '../utils';

export interface BatchOrchestratorOptions extends AnalysisCallbacks {
  /**
   * Token split for each engine call (default: PASS_BUDGETS.batchedAnalysis)
   */
  budget?: PassTokenBudget;

  /**
   * Checked between batches; an in-flight engine call is never interrupted
   */
  abortSignal?: AbortSignal;

  /**
   * Clock used for checkpoint timestamps and expiry (default: Date.now)
   */
  now?: () => number;
}

export interface OrchestratorRunOptions {
  /**
   * Continue from this checkpoint when it matches the input and has not
   * expired
   */
  resumeFrom?: AnalysisCheckpoint;

  /**
   * Only analyze the first N pages
   */
  maxPages?: number;
}

interface SessionPlan {
  accumulator: CharacterAccumulator;
  batches: ParagraphBatch[];
  totalBatches: number;
  resumed: boolean;
}

interface SessionProgress {
  attemptedBatches: number;
  failures: BatchFailure[];
}

/**
 * BatchOrchestrator
 *
 * Runs one analysis session: normalizes pages, packs paragraphs into
 * batches and feeds them to the extraction engine strictly one at a time,
 * merging each batch's output before the next call starts.
 *
 * State machine: idle -> running -> completed | failed | cancelled.
 * An instance runs once.
 */
export class BatchOrchestrator {
  private currentState: OrchestratorState = 'idle';
  private readonly budget: PassTokenBudget;
  private readonly now: () => number;

  constructor(
    private readonly logger: LoggerMethods,
    private readonly engine: ExtractionEngine,
    private readonly merger: IncrementalMerger,
    private readonly options: BatchOrchestratorOptions = {},
  ) {
    this.budget = options.budget ?? PASS_BUDGETS.batchedAnalysis;
    this.now = options.now ?? Date.now;
  }

  get state(): OrchestratorState {
    return this.currentState;
  }

  /**
   * Analyze pages of text.
   *
   * Batch failures are recorded in the result and do not stop the session.
   *
   * @throws Error when the orchestrator has already run
   */
  async run(
    pages: readonly string[],
    runOptions: OrchestratorRunOptions = {},
  ): Promise<AnalysisSessionResult> {
    if (this.currentState !== 'idle') {
      throw new Error(
        `BatchOrchestrator can only run once (current state: ${this.currentState})`,
      );
    }
    this.currentState = 'running';

    const sourcePages =
      runOptions.maxPages === undefined
        ? pages
        : pages.slice(0, Math.max(0, runOptions.maxPages));
    const { paragraphs, boundaries } =
      TextNormalizer.splitWithPageMapping(sourcePages);

    if (paragraphs.length === 0) {
      const nonEmptyPages = sourcePages.filter(
        (page) => TextNormalizer.cleanPage(page).length > 0,
      ).length;

      if (nonEmptyPages > 0) {
        const error = new NormalizationAnomalyError(nonEmptyPages);
        this.log('error', error.message);
        this.currentState = 'failed';
        return {
          ...this.emptyResult('failed'),
          error,
        };
      }

      this.log('info', 'No text to analyze');
      this.currentState = 'completed';
      this.notify('onSessionComplete', () =>
        this.options.onSessionComplete?.([], 0),
      );
      return this.emptyResult('completed');
    }

    this.log(
      'info',
      `Starting analysis: ${paragraphs.length} paragraph(s) from ${sourcePages.length} page(s), ` +
        `~${ParagraphBatcher.estimateBatchCount(paragraphs, this.budget.inputTokens)} batch(es) estimated`,
    );

    const contentHash = CheckpointManager.computeContentHash(paragraphs);
    const plan = this.planSession(paragraphs, contentHash, runOptions.resumeFrom);
    const progress: SessionProgress = { attemptedBatches: 0, failures: [] };

    for (const batch of plan.batches) {
      if (this.options.abortSignal?.aborted) {
        this.log(
          'info',
          `Cancelled before batch ${batch.batchIndex + 1}/${plan.totalBatches}`,
        );
        return this.finish('cancelled', plan, progress, paragraphs.length);
      }

      const merged = await this.processBatch(batch, plan, progress);
      if (merged) {
        const pageRange = TextNormalizer.findPagesForParagraphRange(
          batch.startParagraphIndex,
          batch.endParagraphIndex,
          boundaries,
        );
        this.notify('onBatchComplete', () =>
          this.options.onBatchComplete?.(
            batch.batchIndex,
            plan.totalBatches,
            this.merger.toList(plan.accumulator),
            { batch, pageRange },
          ),
        );
      }

      const checkpoint = CheckpointManager.create(
        {
          contentHash,
          lastProcessedParagraphIndex: batch.endParagraphIndex,
          totalParagraphs: paragraphs.length,
          batchesCompleted: batch.batchIndex + 1,
          totalBatches: plan.totalBatches,
          characters: plan.accumulator.values(),
        },
        this.now(),
      );
      this.notify('onCheckpoint', () =>
        this.options.onCheckpoint?.(checkpoint),
      );
    }

    return this.finish('completed', plan, progress, paragraphs.length);
  }

  private planSession(
    paragraphs: string[],
    contentHash: string,
    checkpoint: AnalysisCheckpoint | undefined,
  ): SessionPlan {
    if (checkpoint && this.canResume(checkpoint, contentHash)) {
      const startIndex = CheckpointManager.getResumeIndex(checkpoint);
      const batches = ParagraphBatcher.createBatchesFromIndex(
        paragraphs,
        this.budget.inputTokens,
        startIndex,
        checkpoint.batchesCompleted,
      );
      this.log(
        'info',
        `Resuming from checkpoint at paragraph ${startIndex} ` +
          `(${CheckpointManager.getProgressPercent(checkpoint)}% done, ` +
          `${checkpoint.characters.length} character(s) restored)`,
      );
      return {
        accumulator: CheckpointManager.restoreAccumulator(checkpoint),
        batches,
        totalBatches: checkpoint.batchesCompleted + batches.length,
        resumed: true,
      };
    }

    const batches = ParagraphBatcher.createBatches(
      paragraphs,
      this.budget.inputTokens,
    );
    return {
      accumulator: new Map(),
      batches,
      totalBatches: batches.length,
      resumed: false,
    };
  }

  private canResume(checkpoint: AnalysisCheckpoint, contentHash: string): boolean {
    if (checkpoint.contentHash !== contentHash) {
      this.log('warn', 'Checkpoint does not match the input, starting fresh');
      return false;
    }
    if (CheckpointManager.isExpired(checkpoint, this.now())) {
      this.log('warn', 'Checkpoint has expired, starting fresh');
      return false;
    }
    return true;
  }

  /**
   * @returns whether the batch output was merged
   */
  private async processBatch(
    batch: ParagraphBatch,
    plan: SessionPlan,
    progress: SessionProgress,
  ): Promise<boolean> {
    const label = `Batch ${batch.batchIndex + 1}/${plan.totalBatches}`;
    progress.attemptedBatches++;

    try {
      const output = await this.engine.analyze(
        batch.text,
        batch.batchIndex,
        plan.totalBatches,
        this.budget,
      );

      const parsed = BatchOutputSchema.safeParse(output);
      if (!parsed.success) {
        throw new EngineError(`${label} returned invalid output`, {
          cause: parsed.error,
          batchIndex: batch.batchIndex,
        });
      }

      this.merger.merge(plan.accumulator, parsed.data);
      this.log(
        'info',
        `${label} complete: ${plan.accumulator.size} character(s) total`,
      );
      return true;
    } catch (error) {
      const failure: BatchFailure = {
        batchIndex: batch.batchIndex,
        startParagraphIndex: batch.startParagraphIndex,
        endParagraphIndex: batch.endParagraphIndex,
        error: EngineError.fromError(`${label} failed`, error, batch.batchIndex),
      };
      progress.failures.push(failure);
      this.log('warn', `${label} skipped: ${failure.error.message}`);
      this.notify('onBatchFailed', () =>
        this.options.onBatchFailed?.(failure, plan.totalBatches),
      );
      return false;
    }
  }

  private finish(
    status: Exclude<AnalysisStatus, 'failed'>,
    plan: SessionPlan,
    progress: SessionProgress,
    totalParagraphs: number,
  ): AnalysisSessionResult {
    this.currentState = status;
    const characters = this.merger.toList(plan.accumulator);
    const failedBatchCount = progress.failures.length;

    this.log(
      'info',
      `Analysis ${status}: ${characters.length} character(s), ` +
        `${progress.attemptedBatches}/${plan.batches.length} batch(es) attempted, ${failedBatchCount} failed`,
    );
    this.notify('onSessionComplete', () =>
      this.options.onSessionComplete?.(
        this.merger.toList(plan.accumulator),
        failedBatchCount,
      ),
    );

    return {
      status,
      characters,
      totalBatches: plan.totalBatches,
      attemptedBatches: progress.attemptedBatches,
      failedBatchCount,
      failures: progress.failures,
      totalParagraphs,
      resumedFromCheckpoint: plan.resumed,
    };
  }

  private emptyResult(status: AnalysisStatus): AnalysisSessionResult {
    return {
      status,
      characters: [],
      totalBatches: 0,
      attemptedBatches: 0,
      failedBatchCount: 0,
      failures: [],
      totalParagraphs: 0,
      resumedFromCheckpoint: false,
    };
  }

  // Callback errors are logged and never interrupt the session
  private notify(name: keyof AnalysisCallbacks, invoke: () => void): void {
    try {
      invoke();
    } catch (error) {
      this.log(
        'error',
        `${name} callback threw: ${EngineError.getErrorMessage(error)}`,
      );
    }
  }

  private log(
    level: 'debug' | 'info' | 'warn' | 'error',
    message: string,
  ): void {
    this.logger[level](`[BatchOrchestrator] ${message}`);
  }
}
