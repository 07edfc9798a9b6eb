export { CheckpointManager, type CheckpointState } from './checkpoint-manager';
export {
  AnalysisCheckpointSchema,
  type AnalysisCheckpoint,
  type CheckpointCharacter,
} from './checkpoint-schema';
