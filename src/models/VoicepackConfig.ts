import { z } from 'zod';
import { FIRMWARE_AUDIO_FORMAT } from '../config/constants';
import { PhraseSchema } from './Phrase';
import type { Phrase } from './Phrase';
import { createVoiceModel, VoiceModelSchema } from './VoiceModel';
import type { VoiceModel } from './VoiceModel';
import type { AudioFormat } from './Audio';

export const BitDepthSchema = z.union([z.literal(8), z.literal(16), z.literal(24), z.literal(32)]);

export const OutputOptionsSchema = z.object({
  sampleRate: z.number().int().min(8000).max(48000).default(FIRMWARE_AUDIO_FORMAT.sampleRate),
  channels: z.number().int().min(1).max(2).default(FIRMWARE_AUDIO_FORMAT.channels),
  bitDepth: BitDepthSchema.default(FIRMWARE_AUDIO_FORMAT.bitDepth),
  normalize: z.boolean().default(true),
  zip: z.boolean().default(false),
  checksum: z.boolean().default(true),
  languageDir: z
    .string()
    .regex(/^[a-z]{2,3}$/, 'language directory must be a lowercase language code')
    .optional()
});

export type OutputOptions = z.infer<typeof OutputOptionsSchema>;

export const VoicepackConfigSchema = z
  .object({
    name: z.string().min(1),
    packname: z.string().regex(/^[A-Za-z0-9_.-]+$/, 'packname must be usable as a file name').optional(),
    description: z.string().default(''),
    creator: z.string().default(''),
    contact: z.string().default(''),
    voice: VoiceModelSchema,
    phrases: z.array(PhraseSchema).min(1, 'a voicepack needs at least one phrase'),
    output: OutputOptionsSchema.default({})
  })
  .superRefine((config, ctx) => {
    // The SD card file system is case-insensitive
    const seen = new Map<string, string>();
    config.phrases.forEach((phrase, index) => {
      const folded = phrase.id.toLowerCase();
      const previous = seen.get(folded);
      if (previous !== undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['phrases', index, 'id'],
          message: `duplicate phrase id '${phrase.id}' (collides with '${previous}')`
        });
      } else {
        seen.set(folded, phrase.id);
      }
    });
  });

export type VoicepackConfigInput = z.input<typeof VoicepackConfigSchema>;

/**
 * Parsed pack definition. Read-only input to a build.
 */
export interface VoicepackConfig {
  readonly name: string;
  readonly packname: string;
  readonly description: string;
  readonly creator: string;
  readonly contact: string;
  readonly voice: VoiceModel;
  readonly phrases: readonly Phrase[];
  readonly output: Readonly<OutputOptions>;
}

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}

export type ConfigValidation =
  | { ok: true; config: VoicepackConfig }
  | { ok: false; issues: string[] };

export function validateVoicepackConfig(input: unknown): ConfigValidation {
  const parsed = VoicepackConfigSchema.safeParse(input);
  if (!parsed.success) {
    return { ok: false, issues: formatIssues(parsed.error) };
  }
  const data = parsed.data;
  return {
    ok: true,
    config: {
      ...data,
      packname: data.packname ?? defaultPackname(data.name),
      voice: createVoiceModel(data.voice)
    }
  };
}

export function defaultPackname(name: string): string {
  return name.trim().replace(/\s+/g, '_').replace(/[^A-Za-z0-9_.-]/g, '');
}

export function targetFormat(output: OutputOptions): AudioFormat {
  return {
    sampleRate: output.sampleRate,
    channels: output.channels,
    bitDepth: output.bitDepth
  };
}
