import { z } from 'zod';

export const ParameterValueSchema = z.union([z.string(), z.number(), z.boolean()]);

export type ParameterValue = z.infer<typeof ParameterValueSchema>;

export const LanguageSchema = z
  .string()
  .refine((v) => {
    const parts = v.replace(/-/g, '_').split('_');
    return parts.length === 2 && parts.every((p) => p.length > 0);
  }, "language must be in the format 'xx_YY' or 'xx-YY'");

export const VoiceModelSchema = z.object({
  provider: z.string().min(1),
  voice: z.string().min(1),
  language: LanguageSchema,
  parameters: z.record(ParameterValueSchema).default({})
});

/**
 * A single synthesizable voice. Identity is provider + voice id.
 */
export interface VoiceModel {
  readonly provider: string;
  readonly voice: string;
  readonly language: string;
  readonly parameters: Readonly<Record<string, ParameterValue>>;
}

export function createVoiceModel(data: z.input<typeof VoiceModelSchema>): VoiceModel {
  const parsed = VoiceModelSchema.parse(data);
  return Object.freeze({
    provider: parsed.provider,
    voice: parsed.voice,
    language: parsed.language,
    parameters: Object.freeze({ ...parsed.parameters })
  });
}

export function voiceKey(voice: Pick<VoiceModel, 'provider' | 'voice'>): string {
  return `${voice.provider}:${voice.voice}`;
}

export function sameVoice(a: VoiceModel, b: VoiceModel): boolean {
  return voiceKey(a) === voiceKey(b);
}

/** 'en_GB' -> 'en-GB' */
export function hyphenLanguage(language: string): string {
  return language.replace(/_/g, '-');
}

/** 'en-GB' -> 'en_GB' */
export function underscoreLanguage(language: string): string {
  return language.replace(/-/g, '_');
}

/** 'en_GB' -> 'en' */
export function primaryLanguage(language: string): string {
  return underscoreLanguage(language).split('_')[0].toLowerCase();
}

export function withParameters(
  voice: VoiceModel,
  parameters: Readonly<Record<string, ParameterValue>>
): VoiceModel {
  return createVoiceModel({
    provider: voice.provider,
    voice: voice.voice,
    language: voice.language,
    parameters: { ...voice.parameters, ...parameters }
  });
}

export function numberParameter(voice: VoiceModel, name: string): number | undefined {
  const value = voice.parameters[name];
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value))) {
    return Number(value);
  }
  return undefined;
}

export function stringParameter(voice: VoiceModel, name: string): string | undefined {
  const value = voice.parameters[name];
  return value === undefined ? undefined : String(value);
}
