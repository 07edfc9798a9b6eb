import { z } from 'zod';

export const VoiceProfileSchema = z.object({
  gender: z.string().optional(),
  age: z.string().optional(),
  accent: z.string().optional(),
  pitch: z.number().optional(),
  speed: z.number().optional(),
  energy: z.number().optional(),
});

/**
 * One character as returned by an extraction engine for a single batch
 */
export const ExtractedCharacterDataSchema = z.object({
  name: z.string(),
  dialogs: z.array(z.string()),
  traits: z.array(z.string()),
  voiceProfile: VoiceProfileSchema.optional(),
});

export const BatchOutputSchema = z.array(ExtractedCharacterDataSchema);

/**
 * Schema for the model's structured response
 *
 * Optional values are nullable rather than omitted so the schema stays
 * usable as a strict structured-output schema.
 */
export const CharacterExtractionResponseSchema = z.object({
  characters: z
    .array(
      z.object({
        name: z
          .string()
          .describe('Character name as written in the text, without titles added'),
        dialogs: z
          .array(z.string())
          .describe('Every quoted line this character speaks, verbatim and in order'),
        traits: z
          .array(z.string())
          .describe('Short physical or personality traits, e.g. "brave", "tall"'),
        voice: z
          .object({
            gender: z.enum(['male', 'female', 'unknown']),
            age: z
              .enum(['child', 'young', 'middle-aged', 'elderly', 'unknown'])
              .describe('Apparent age group'),
            accent: z
              .string()
              .describe('Accent or "neutral" when nothing suggests one'),
          })
          .nullable()
          .describe('Inferred speaking voice, null when the text gives no hint'),
      }),
    )
    .describe('Characters who speak at least one quoted line, each exactly once'),
});

export type CharacterExtractionResponse = z.infer<
  typeof CharacterExtractionResponseSchema
>;
