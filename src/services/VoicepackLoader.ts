/**
 * Voicepack Loader
 *
 * Reads pack definitions from YAML/JSON documents or from the community CSV
 * translation sheets (Filename, Path, Translation).
 */

import fs from 'fs/promises';
import path from 'path';
import { parse as parseCsv } from 'csv-parse/sync';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { VoicepackConfigError, errorMessage } from '../errors';
import { MARKUP_KINDS } from '../models/Phrase';
import type { MarkupKind } from '../models/Phrase';
import { ParameterValueSchema } from '../models/VoiceModel';
import type { ParameterValue } from '../models/VoiceModel';
import { BitDepthSchema, formatIssues, validateVoicepackConfig } from '../models/VoicepackConfig';
import type { OutputOptions, VoicepackConfig, VoicepackConfigInput } from '../models/VoicepackConfig';
import { createLogger } from '../utils/logger';

const logger = createLogger({ service: 'VoicepackLoader' });

const VoiceDocumentSchema = z.object({
  provider: z.string(),
  id: z.string(),
  language: z.string(),
  parameters: z.record(ParameterValueSchema).optional()
});

const OutputDocumentSchema = z
  .object({
    sample_rate: z.number().optional(),
    channels: z.number().optional(),
    bit_depth: BitDepthSchema.optional(),
    normalize: z.boolean().optional(),
    zip: z.boolean().optional(),
    checksum: z.boolean().optional(),
    language_dir: z.string().optional()
  })
  .strict();

const PhraseDocumentSchema = z.object({
  id: z.string(),
  text: z.string(),
  markup: z.enum(MARKUP_KINDS).optional()
});

const VoicepackDocumentSchema = z
  .object({
    ovp_schema: z.literal(1).optional(),
    name: z.string().optional(),
    packname: z.string().optional(),
    description: z.string().optional(),
    creator: z.string().optional(),
    contact: z.string().optional(),
    voice: VoiceDocumentSchema.optional(),
    sounds: z.record(z.unknown()).optional(),
    phrases: z.array(PhraseDocumentSchema).optional(),
    output: OutputDocumentSchema.optional()
  })
  .strict();

type VoicepackDocument = z.infer<typeof VoicepackDocumentSchema>;

const CsvRowSchema = z.object({
  Filename: z.string(),
  Path: z.string(),
  Translation: z.string()
});

export const CSV_COLUMNS = ['Filename', 'Path', 'Translation'] as const;

export interface VoiceOverride {
  provider: string;
  voice: string;
  language: string;
  parameters?: Record<string, ParameterValue>;
}

/**
 * Values supplied by the caller that replace or complete the file's own
 */
export interface LoaderOverrides {
  name?: string;
  voice?: VoiceOverride;
  output?: Partial<OutputOptions>;
}

interface PhraseInput {
  id: string;
  text: string;
  markup?: MarkupKind;
}

export class VoicepackLoader {
  /**
   * Load and validate a pack definition. The format follows the extension:
   * .csv, .json, .yml or .yaml.
   * @throws VoicepackConfigError
   */
  async load(filePath: string, overrides: LoaderOverrides = {}): Promise<VoicepackConfig> {
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      throw new VoicepackConfigError(`Cannot read ${filePath}: ${errorMessage(error)}`);
    }

    const ext = path.extname(filePath).toLowerCase();
    const input = ext === '.csv' ? this.fromCsv(content, overrides) : this.fromDocument(content, overrides);
    const config = this.validate(input, filePath);

    logger.info({ file: filePath, name: config.name, phrases: config.phrases.length }, 'Loaded voicepack');
    return config;
  }

  /**
   * YAML or JSON (a JSON document is valid YAML)
   */
  fromDocument(content: string, overrides: LoaderOverrides = {}): VoicepackConfigInput {
    let raw: unknown;
    try {
      raw = parseYaml(content);
    } catch (error) {
      throw new VoicepackConfigError(`Invalid YAML: ${errorMessage(error)}`);
    }

    const parsed = VoicepackDocumentSchema.safeParse(raw ?? {});
    if (!parsed.success) {
      throw new VoicepackConfigError('Invalid voicepack document', formatIssues(parsed.error));
    }
    const doc = parsed.data;

    const phrases: PhraseInput[] = [...(doc.phrases ?? [])];
    if (doc.sounds) {
      const issues: string[] = [];
      phrases.push(...flattenSounds(doc.sounds, [], issues));
      if (issues.length > 0) {
        throw new VoicepackConfigError('Invalid sounds tree', issues);
      }
    }

    const voice = overrides.voice ?? documentVoice(doc);
    if (!voice) {
      throw new VoicepackConfigError('Voicepack has no voice; add a voice section or pass one explicitly');
    }

    return {
      name: overrides.name ?? doc.name ?? '',
      packname: doc.packname,
      description: doc.description,
      creator: doc.creator,
      contact: doc.contact,
      voice,
      phrases,
      output: mergeOutput(doc.output ?? {}, overrides.output ?? {})
    };
  }

  /**
   * Community translation sheet. The sheet carries no voice or metadata.
   */
  fromCsv(content: string, overrides: LoaderOverrides = {}): VoicepackConfigInput {
    let records: unknown[];
    try {
      records = parseCsv(content, {
        columns: true,
        skip_empty_lines: true,
        trim: true
      });
    } catch (error) {
      throw new VoicepackConfigError(`Invalid CSV: ${errorMessage(error)}`);
    }

    const phrases: PhraseInput[] = [];
    const issues: string[] = [];
    records.forEach((record, index) => {
      const row = CsvRowSchema.safeParse(record);
      if (!row.success) {
        issues.push(`row ${index + 2}: expected columns ${CSV_COLUMNS.join(', ')}`);
        return;
      }
      const file = row.data.Filename.replace(/\.wav$/i, '');
      const dir = row.data.Path.replace(/^\/+|\/+$/g, '').toUpperCase();
      phrases.push({ id: dir ? `${dir}/${file}` : file, text: row.data.Translation });
    });
    if (issues.length > 0) {
      throw new VoicepackConfigError('CSV not formatted correctly', issues);
    }

    if (!overrides.voice) {
      throw new VoicepackConfigError('CSV voicepacks need a voice (provider, voice id and language)');
    }

    return {
      name: overrides.name ?? 'Unnamed',
      description: 'Imported from CSV',
      voice: overrides.voice,
      phrases,
      output: mergeOutput({}, overrides.output ?? {})
    };
  }

  private validate(input: VoicepackConfigInput, source: string): VoicepackConfig {
    const result = validateVoicepackConfig(input);
    if (!result.ok) {
      throw new VoicepackConfigError(`Invalid voicepack ${source}`, result.issues);
    }
    return result.config;
  }
}

function documentVoice(doc: VoicepackDocument): VoiceOverride | undefined {
  if (!doc.voice) return undefined;
  return {
    provider: doc.voice.provider,
    voice: doc.voice.id,
    language: doc.voice.language,
    parameters: doc.voice.parameters
  };
}

type OutputDocument = z.infer<typeof OutputDocumentSchema>;

type OutputInput = NonNullable<VoicepackConfigInput['output']>;

/**
 * snake_case document keys -> OutputOptions; explicit overrides win
 */
function mergeOutput(doc: OutputDocument, override: Partial<OutputOptions>): OutputInput {
  return {
    sampleRate: override.sampleRate ?? doc.sample_rate,
    channels: override.channels ?? doc.channels,
    bitDepth: override.bitDepth ?? doc.bit_depth,
    normalize: override.normalize ?? doc.normalize,
    zip: override.zip ?? doc.zip,
    checksum: override.checksum ?? doc.checksum,
    languageDir: override.languageDir ?? doc.language_dir
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * `{ system: { armed: 'Armed' } }` -> `SYSTEM/armed`. A leaf is a string or
 * `{ text, markup? }`; any other mapping is a directory.
 */
export function flattenSounds(tree: Record<string, unknown>, dirs: string[], issues: string[]): PhraseInput[] {
  const phrases: PhraseInput[] = [];

  for (const [key, value] of Object.entries(tree)) {
    const location = [...dirs, key].join('/');
    if (typeof value === 'string' || typeof value === 'number') {
      phrases.push({ id: location, text: String(value) });
      continue;
    }
    if (!isRecord(value)) {
      issues.push(`${location}: expected text or a mapping`);
      continue;
    }
    const text = value.text;
    if (typeof text === 'string') {
      const markup = MARKUP_KINDS.find((kind) => kind === value.markup);
      if (value.markup !== undefined && !markup) {
        issues.push(`${location}: markup must be one of ${MARKUP_KINDS.join(', ')}`);
        continue;
      }
      phrases.push({ id: location, text, markup });
    } else {
      phrases.push(...flattenSounds(value, [...dirs, key.toUpperCase()], issues));
    }
  }

  return phrases;
}
