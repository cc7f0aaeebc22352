import { describe, it, expect } from 'vitest';
import { stripMarkup } from '../models/Phrase';
import {
  createVoiceModel,
  hyphenLanguage,
  numberParameter,
  primaryLanguage,
  sameVoice,
  voiceKey,
  withParameters
} from '../models/VoiceModel';
import { defaultPackname, targetFormat, validateVoicepackConfig } from '../models/VoicepackConfig';
import type { VoicepackConfigInput } from '../models/VoicepackConfig';

const base: VoicepackConfigInput = {
  name: 'English Alba',
  voice: { provider: 'piper', voice: 'en_GB-alba-medium', language: 'en_GB' },
  phrases: [
    { id: 'batt_low', text: 'Battery low' },
    { id: 'armed', text: 'Armed' }
  ]
};

describe('VoiceModel', () => {
  it('should freeze the model and its parameters', () => {
    const voice = createVoiceModel({ provider: 'polly', voice: 'Amy', language: 'en-GB', parameters: { engine: 'neural' } });

    expect(Object.isFrozen(voice)).toBe(true);
    expect(Object.isFrozen(voice.parameters)).toBe(true);
    expect(voice.language).toBe('en-GB');
  });

  it('should reject languages without a region', () => {
    expect(() => createVoiceModel({ provider: 'polly', voice: 'Amy', language: 'english' })).toThrow(
      "language must be in the format 'xx_YY' or 'xx-YY'"
    );
  });

  it('should identify voices by provider and voice id', () => {
    const a = createVoiceModel({ provider: 'polly', voice: 'Amy', language: 'en_GB' });
    const b = createVoiceModel({ provider: 'polly', voice: 'Amy', language: 'en_US', parameters: { engine: 'neural' } });

    expect(voiceKey(a)).toBe('polly:Amy');
    expect(sameVoice(a, b)).toBe(true);
  });

  it('should convert language tags', () => {
    expect(hyphenLanguage('de_DE')).toBe('de-DE');
    expect(primaryLanguage('PT-br')).toBe('pt');
  });

  it('should merge parameters into a new model', () => {
    const voice = createVoiceModel({ provider: 'piper', voice: 'x', language: 'en_GB', parameters: { length_scale: 1 } });

    const merged = withParameters(voice, { length_scale: '1.2', noise_w: 0 });

    expect(merged.parameters).toEqual({ length_scale: '1.2', noise_w: 0 });
    expect(numberParameter(merged, 'length_scale')).toBe(1.2);
    expect(voice.parameters).toEqual({ length_scale: 1 });
  });
});

describe('validateVoicepackConfig()', () => {
  it('should apply output defaults and derive the packname', () => {
    const result = validateVoicepackConfig(base);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.config.packname).toBe('English_Alba');
    expect(result.config.output).toEqual({
      sampleRate: 16000,
      channels: 1,
      bitDepth: 16,
      normalize: true,
      zip: false,
      checksum: true
    });
    expect(result.config.phrases[0]).toEqual({ id: 'batt_low', text: 'Battery low', markup: 'plaintext' });
    expect(Object.isFrozen(result.config.voice)).toBe(true);
  });

  it('should report ids that collide on a case-insensitive file system', () => {
    const result = validateVoicepackConfig({
      ...base,
      phrases: [
        { id: 'armed', text: 'Armed' },
        { id: 'ARMED', text: 'Armed again' }
      ]
    });

    expect(result).toEqual({ ok: false, issues: ["phrases.1.id: duplicate phrase id 'ARMED' (collides with 'armed')"] });
  });

  it('should reject empty text and unsafe ids', () => {
    const result = validateVoicepackConfig({
      ...base,
      phrases: [
        { id: '../escape', text: 'x' },
        { id: 'blank', text: '   ' }
      ]
    });

    expect(result).toEqual({
      ok: false,
      issues: [
        'phrases.0.id: phrase id must be path segments of letters, digits, _ or -',
        'phrases.1.text: phrase text must not be empty'
      ]
    });
  });

  it('should require at least one phrase', () => {
    const result = validateVoicepackConfig({ ...base, phrases: [] });

    expect(result).toEqual({ ok: false, issues: ['phrases: a voicepack needs at least one phrase'] });
  });

  it('should bound the output format', () => {
    const result = validateVoicepackConfig({ ...base, output: { sampleRate: 96000 } });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.issues).toHaveLength(1);
    expect(result.issues[0]).toMatch(/^output\.sampleRate: /);
  });

  it('should pick the target format from the output options', () => {
    const result = validateVoicepackConfig({ ...base, output: { sampleRate: 22050, channels: 2, bitDepth: 8 } });

    expect(result.ok && targetFormat(result.config.output)).toEqual({ sampleRate: 22050, channels: 2, bitDepth: 8 });
  });
});

describe('helpers', () => {
  it('should make a file-safe packname', () => {
    expect(defaultPackname('  Deutsch (Thorsten)  ')).toBe('Deutsch_Thorsten');
  });

  it('should strip markup tags', () => {
    expect(stripMarkup('<speak>Battery <break time="1s"/> low</speak>')).toBe('Battery low');
  });
});
