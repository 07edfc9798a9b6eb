import { z } from 'zod';

import { VoiceProfileSchema } from '../types/extraction-schema';

export const CheckpointCharacterSchema = z.object({
  name: z.string(),
  canonicalName: z.string().min(1),
  dialogs: z.array(z.string()),
  traits: z.array(z.string()),
  voiceProfile: VoiceProfileSchema.optional(),
  knownVariants: z.array(z.string()),
});

/**
 * Serializable snapshot of a session, taken after each attempted batch
 */
export const AnalysisCheckpointSchema = z.object({
  version: z.literal(1),
  /** Hash prefix of the paragraphs the session was run on */
  contentHash: z.string(),
  /** Last paragraph covered by an attempted batch, -1 before the first */
  lastProcessedParagraphIndex: z.number().int().min(-1),
  totalParagraphs: z.number().int().min(0),
  batchesCompleted: z.number().int().min(0),
  totalBatches: z.number().int().min(0),
  /** Epoch milliseconds */
  timestamp: z.number(),
  characters: z.array(CheckpointCharacterSchema),
});

export type CheckpointCharacter = z.infer<typeof CheckpointCharacterSchema>;
export type AnalysisCheckpoint = z.infer<typeof AnalysisCheckpointSchema>;
