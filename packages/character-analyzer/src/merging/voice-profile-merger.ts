import type { VoiceProfile } from '@storycast/model';

import { VOICE_PROFILE_DEFAULTS } from '../config/constants';

/**
 * Strategy for reconciling two partial voice profiles
 */
export interface VoiceProfileMerger {
  /**
   * Returns a new profile; neither argument is modified
   */
  merge(
    existing: VoiceProfile | undefined,
    incoming: VoiceProfile | undefined,
  ): VoiceProfile | undefined;
}

export type VoiceMergeStrategy =
  | 'prefer-detailed'
  | 'prefer-new'
  | 'prefer-existing';

const STRING_FIELDS = ['gender', 'age', 'accent'] as const;
const NUMBER_FIELDS = ['pitch', 'speed', 'energy'] as const;

// 0 = empty, 1 = default, 2 = detailed
function stringDetail(
  value: string | undefined,
  defaultValue: string,
): number {
  const trimmed = value?.trim();
  if (!trimmed) return 0;
  return trimmed.toLowerCase() === defaultValue ? 1 : 2;
}

function numberDetail(
  value: number | undefined,
  defaultValue: number,
): number {
  if (value === undefined || !Number.isFinite(value)) return 0;
  return value === defaultValue ? 1 : 2;
}

function copyProfile(
  profile: VoiceProfile | undefined,
): VoiceProfile | undefined {
  return profile && { ...profile };
}

/**
 * Field by field, adopts the incoming value only when it is more specific
 * than the existing one (empty < default < specific). Ties keep the existing
 * value.
 */
export class PreferDetailedVoiceProfileMerger implements VoiceProfileMerger {
  merge(
    existing: VoiceProfile | undefined,
    incoming: VoiceProfile | undefined,
  ): VoiceProfile | undefined {
    if (!existing || !incoming) return copyProfile(existing ?? incoming);

    const merged: VoiceProfile = {};

    for (const field of STRING_FIELDS) {
      const defaultValue = VOICE_PROFILE_DEFAULTS[field];
      const value =
        stringDetail(incoming[field], defaultValue) >
        stringDetail(existing[field], defaultValue)
          ? incoming[field]
          : existing[field];
      if (value !== undefined) merged[field] = value;
    }

    for (const field of NUMBER_FIELDS) {
      const defaultValue = VOICE_PROFILE_DEFAULTS[field];
      const value =
        numberDetail(incoming[field], defaultValue) >
        numberDetail(existing[field], defaultValue)
          ? incoming[field]
          : existing[field];
      if (value !== undefined) merged[field] = value;
    }

    return merged;
  }
}

/**
 * The latest profile replaces the previous one whole
 */
export class PreferNewVoiceProfileMerger implements VoiceProfileMerger {
  merge(
    existing: VoiceProfile | undefined,
    incoming: VoiceProfile | undefined,
  ): VoiceProfile | undefined {
    return copyProfile(incoming ?? existing);
  }
}

/**
 * The first profile seen is kept whole
 */
export class PreferExistingVoiceProfileMerger implements VoiceProfileMerger {
  merge(
    existing: VoiceProfile | undefined,
    incoming: VoiceProfile | undefined,
  ): VoiceProfile | undefined {
    return copyProfile(existing ?? incoming);
  }
}

export function createVoiceProfileMerger(
  strategy: VoiceMergeStrategy = 'prefer-detailed',
): VoiceProfileMerger {
  switch (strategy) {
    case 'prefer-new':
      return new PreferNewVoiceProfileMerger();
    case 'prefer-existing':
      return new PreferExistingVoiceProfileMerger();
    default:
      return new PreferDetailedVoiceProfileMerger();
  }
}
