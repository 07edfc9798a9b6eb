import type { LoggerMethods } from '@storycast/logger';
import type {
  ExtractedCharacterData,
  MergedCharacterData,
} from '@storycast/model';

import type { CharacterNameMatcher } from '../matching';
import type { VoiceProfileMerger } from './voice-profile-merger';

import { orderBy, uniqBy } from 'es-toolkit';

/**
 * Accumulated characters keyed by canonical name
 */
export type CharacterAccumulator = Map<string, MergedCharacterData>;

function normalizeTraits(traits: readonly string[]): string[] {
  return uniqBy(
    traits.map((trait) => trait.trim()).filter((trait) => trait.length > 0),
    (trait) => trait.toLowerCase(),
  );
}

/**
 * Deep copy of an accumulator entry
 */
export function cloneCharacter(
  character: MergedCharacterData,
): MergedCharacterData {
  return {
    ...character,
    dialogs: [...character.dialogs],
    traits: [...character.traits],
    voiceProfile: character.voiceProfile && { ...character.voiceProfile },
    knownVariants: new Set(character.knownVariants),
  };
}

/**
 * IncrementalMerger - folds per-batch extraction output into an accumulator
 *
 * Name resolution and voice reconciliation are delegated to the injected
 * strategies. Within one batch, entities are processed in order, so the
 * first of two colliding names claims the entry.
 */
export class IncrementalMerger {
  constructor(
    private readonly logger: LoggerMethods,
    private readonly nameMatcher: CharacterNameMatcher,
    private readonly voiceProfileMerger: VoiceProfileMerger,
  ) {}

  /**
   * Merge one batch's characters into the accumulator.
   *
   * @returns the same accumulator, mutated
   */
  merge(
    accumulator: CharacterAccumulator,
    batchOutput: readonly ExtractedCharacterData[],
  ): CharacterAccumulator {
    for (const character of batchOutput) {
      const canonicalName = this.nameMatcher.canonicalize(character.name);
      if (!canonicalName) {
        this.logger.warn(
          `[IncrementalMerger] Skipping character with empty name: "${character.name}"`,
        );
        continue;
      }

      const existing =
        accumulator.get(canonicalName) ??
        this.findVariantOwner(accumulator, character.name);

      if (existing) {
        this.mergeInto(existing, character, canonicalName);
      } else {
        accumulator.set(canonicalName, {
          name: character.name,
          canonicalName,
          dialogs: [...character.dialogs],
          traits: normalizeTraits(character.traits),
          voiceProfile: this.voiceProfileMerger.merge(
            undefined,
            character.voiceProfile,
          ),
          knownVariants: new Set([canonicalName]),
        });
        this.logger.debug(
          `[IncrementalMerger] New character "${character.name}" (${canonicalName})`,
        );
      }
    }

    return accumulator;
  }

  /**
   * Snapshot of the accumulator, most dialog first, then by canonical name
   */
  toList(accumulator: CharacterAccumulator): MergedCharacterData[] {
    return orderBy(
      Array.from(accumulator.values(), cloneCharacter),
      [(character) => character.dialogs.length, 'canonicalName'],
      ['desc', 'asc'],
    );
  }

  private findVariantOwner(
    accumulator: CharacterAccumulator,
    name: string,
  ): MergedCharacterData | undefined {
    for (const entry of accumulator.values()) {
      if (
        this.nameMatcher.isVariant(
          name,
          entry.canonicalName,
          entry.knownVariants,
        )
      ) {
        return entry;
      }
    }
    return undefined;
  }

  private mergeInto(
    target: MergedCharacterData,
    incoming: ExtractedCharacterData,
    canonicalName: string,
  ): void {
    target.dialogs.push(...incoming.dialogs);
    target.traits = normalizeTraits([...target.traits, ...incoming.traits]);
    target.voiceProfile = this.voiceProfileMerger.merge(
      target.voiceProfile,
      incoming.voiceProfile,
    );
    target.knownVariants.add(canonicalName);

    if (canonicalName !== target.canonicalName) {
      this.logger.debug(
        `[IncrementalMerger] "${incoming.name}" resolved to "${target.name}"`,
      );
    }
  }
}
