import type { MergedCharacterData } from '@storycast/model';

import type { CharacterAccumulator } from '../merging';
import type { AnalysisCheckpoint } from './checkpoint-schema';

import { createHash } from 'node:crypto';

import { CHECKPOINT } from '../config/constants';
import { AnalysisCheckpointSchema } from './checkpoint-schema';

/**
 * Fields needed to snapshot a session
 */
export interface CheckpointState {
  contentHash: string;
  lastProcessedParagraphIndex: number;
  totalParagraphs: number;
  batchesCompleted: number;
  totalBatches: number;
  characters: Iterable<MergedCharacterData>;
}

/**
 * CheckpointManager - snapshot and restore of analysis progress
 *
 * Storage is left to the caller; checkpoints round-trip through
 * `serialize` and `parse`.
 */
export class CheckpointManager {
  /**
   * Short SHA-256 prefix identifying a paragraph sequence
   */
  static computeContentHash(paragraphs: readonly string[]): string {
    return createHash('sha256')
      .update(paragraphs.join('\n'), 'utf8')
      .digest('hex')
      .slice(0, CHECKPOINT.HASH_LENGTH);
  }

  static create(
    state: CheckpointState,
    now: number = Date.now(),
  ): AnalysisCheckpoint {
    return {
      version: CHECKPOINT.VERSION,
      contentHash: state.contentHash,
      lastProcessedParagraphIndex: state.lastProcessedParagraphIndex,
      totalParagraphs: state.totalParagraphs,
      batchesCompleted: state.batchesCompleted,
      totalBatches: state.totalBatches,
      timestamp: now,
      characters: Array.from(state.characters, (character) => ({
        name: character.name,
        canonicalName: character.canonicalName,
        dialogs: [...character.dialogs],
        traits: [...character.traits],
        ...(character.voiceProfile && {
          voiceProfile: { ...character.voiceProfile },
        }),
        knownVariants: [...character.knownVariants],
      })),
    };
  }

  /**
   * Rebuild a fresh accumulator from a checkpoint
   */
  static restoreAccumulator(checkpoint: AnalysisCheckpoint): CharacterAccumulator {
    return new Map(
      checkpoint.characters.map((character): [string, MergedCharacterData] => [
        character.canonicalName,
        {
          name: character.name,
          canonicalName: character.canonicalName,
          dialogs: [...character.dialogs],
          traits: [...character.traits],
          voiceProfile: character.voiceProfile && { ...character.voiceProfile },
          knownVariants: new Set(character.knownVariants),
        },
      ]),
    );
  }

  static serialize(checkpoint: AnalysisCheckpoint): string {
    return JSON.stringify(checkpoint);
  }

  /**
   * @returns null for malformed JSON or a document that is not a checkpoint
   */
  static parse(json: string): AnalysisCheckpoint | null {
    let value: unknown;
    try {
      value = JSON.parse(json);
    } catch {
      return null;
    }

    const result = AnalysisCheckpointSchema.safeParse(value);
    return result.success ? result.data : null;
  }

  static isComplete(checkpoint: AnalysisCheckpoint): boolean {
    return (
      checkpoint.lastProcessedParagraphIndex >= checkpoint.totalParagraphs - 1
    );
  }

  static getResumeIndex(checkpoint: AnalysisCheckpoint): number {
    return checkpoint.lastProcessedParagraphIndex + 1;
  }

  static getProgressPercent(checkpoint: AnalysisCheckpoint): number {
    if (checkpoint.totalParagraphs === 0) return 100;
    return Math.floor(
      ((checkpoint.lastProcessedParagraphIndex + 1) * 100) /
        checkpoint.totalParagraphs,
    );
  }

  static isExpired(
    checkpoint: AnalysisCheckpoint,
    now: number = Date.now(),
    maxAgeMs: number = CHECKPOINT.MAX_AGE_MS,
  ): boolean {
    return now - checkpoint.timestamp > maxAgeMs;
  }
}
