export {
  IncrementalMerger,
  cloneCharacter,
  type CharacterAccumulator,
} from './incremental-merger';
export {
  PreferDetailedVoiceProfileMerger,
  PreferExistingVoiceProfileMerger,
  PreferNewVoiceProfileMerger,
  createVoiceProfileMerger,
  type VoiceMergeStrategy,
  type VoiceProfileMerger,
} from './voice-profile-merger';
