import { LOUDNESS } from '../config/constants';
import { AudioDecodeError } from '../errors';
import { describeFormat } from '../models/Audio';
import type { AudioEncoding, AudioFormat, BitDepth } from '../models/Audio';
import { createLogger } from '../utils/logger';
import {
  calculatePeak,
  calculateRms,
  dbToGain,
  decodePcm,
  encodePcm,
  isBitDepth,
  parseWav,
  pcmToWav,
  remixChannels,
  resample,
  rmsToDb
} from './AudioUtils';
import type { PlanarAudio } from './AudioUtils';

const logger = createLogger({ service: 'AudioProcessor' });

export interface LoudnessOptions {
  targetDbfs: number;
  peakCeilingDbfs: number;
  blockMs: number;
  relativeGateDb: number;
  minGainDb: number;
}

/**
 * Turns provider output into the canonical sound-file encoding.
 * Stateless; safe to share between concurrent phrases.
 */
export class AudioProcessor {
  private readonly loudness: LoudnessOptions;

  constructor(loudness: Partial<LoudnessOptions> = {}) {
    this.loudness = {
      targetDbfs: loudness.targetDbfs ?? LOUDNESS.TARGET_DBFS,
      peakCeilingDbfs: loudness.peakCeilingDbfs ?? LOUDNESS.PEAK_CEILING_DBFS,
      blockMs: loudness.blockMs ?? LOUDNESS.BLOCK_MS,
      relativeGateDb: loudness.relativeGateDb ?? LOUDNESS.RELATIVE_GATE_DB,
      minGainDb: loudness.minGainDb ?? LOUDNESS.MIN_GAIN_DB
    };
  }

  /**
   * Resample, remix and requantize to `target`, wrapped in a 44-byte WAV header
   *
   * @throws AudioDecodeError if `raw` cannot be decoded
   */
  convert(raw: Buffer, source: AudioEncoding, target: AudioFormat): Buffer {
    const decoded = this.decode(raw, source);

    let channels = remixChannels(decoded.channels, target.channels);
    if (decoded.sampleRate !== target.sampleRate) {
      channels = channels.map((channel) => resample(channel, decoded.sampleRate, target.sampleRate));
    }

    const wav = pcmToWav(encodePcm(channels, target.bitDepth), target);
    logger.debug(
      {
        from: `${decoded.sampleRate}Hz/${decoded.channels.length}ch`,
        to: describeFormat(target),
        bytes: wav.length
      },
      'Converted audio'
    );
    return wav;
  }

  /**
   * Level a canonical WAV to the target loudness, keeping peaks under the ceiling.
   * Re-normalizing already-levelled audio returns it unchanged.
   */
  normalize(wav: Buffer): Buffer {
    const { layout, data } = parseWav(wav);
    const audio = decodePcm(data, layout);
    const loudness = this.measure(audio);
    const peak = calculatePeak(audio.channels);

    if (!Number.isFinite(loudness) || peak === 0) {
      return wav;
    }

    const gainDb = Math.min(
      this.loudness.targetDbfs - loudness,
      this.loudness.peakCeilingDbfs - rmsToDb(peak)
    );
    if (Math.abs(gainDb) < this.loudness.minGainDb) {
      return wav;
    }

    const gain = dbToGain(gainDb);
    const scaled = audio.channels.map((channel) => channel.map((x) => x * gain));
    const bitDepth: BitDepth = !layout.float && isBitDepth(layout.bitsPerSample) ? layout.bitsPerSample : 16;

    logger.debug({ loudness, gainDb }, 'Normalized audio');
    return pcmToWav(encodePcm(scaled, bitDepth), {
      sampleRate: layout.sampleRate,
      channels: layout.channels,
      bitDepth
    });
  }

  /**
   * Gated loudness of a WAV in dBFS (-Infinity for silence)
   */
  measureLoudness(wav: Buffer): number {
    const { layout, data } = parseWav(wav);
    return this.measure(decodePcm(data, layout));
  }

  private decode(raw: Buffer, source: AudioEncoding): PlanarAudio {
    if (source.container === 'wav') {
      const { layout, data } = parseWav(raw);
      return decodePcm(data, layout);
    }
    if (raw.length === 0) {
      throw new AudioDecodeError('Provider returned no audio');
    }
    return decodePcm(raw, {
      sampleRate: source.sampleRate,
      channels: source.channels,
      bitsPerSample: source.bitDepth,
      float: false
    });
  }

  /**
   * Mean-square energy over fixed blocks, ignoring blocks more than
   * relativeGateDb below the loudest one (leading/trailing silence)
   */
  private measure(audio: PlanarAudio): number {
    const frames = audio.channels[0].length;
    const blockFrames = Math.max(1, Math.round((audio.sampleRate * this.loudness.blockMs) / 1000));

    const blocks: number[] = [];
    for (let start = 0; start < frames; start += blockFrames) {
      const rms = calculateRms(audio.channels, start, Math.min(frames, start + blockFrames));
      blocks.push(rms * rms);
    }

    const loudest = Math.max(...blocks);
    if (loudest <= 0) {
      return -Infinity;
    }

    const gate = loudest * dbToGain(-this.loudness.relativeGateDb) ** 2;
    const gated = blocks.filter((energy) => energy > 0 && energy >= gate);
    const mean = gated.reduce((sum, energy) => sum + energy, 0) / gated.length;
    return 10 * Math.log10(mean);
  }
}
