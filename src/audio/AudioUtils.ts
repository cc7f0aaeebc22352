import { AudioDecodeError } from '../errors';
import type { AudioFormat, BitDepth } from '../models/Audio';

/**
 * Audio Utility Functions
 *
 * RIFF/WAVE parsing and writing, PCM sample (de)quantization,
 * channel remixing, resampling and level measurement.
 * Samples are handled as planar Float32Arrays in [-1, 1).
 */

const WAVE_FORMAT_PCM = 0x0001;
const WAVE_FORMAT_IEEE_FLOAT = 0x0003;
const WAVE_FORMAT_EXTENSIBLE = 0xfffe;

export const WAV_HEADER_SIZE = 44;

export interface PcmLayout {
  sampleRate: number;
  channels: number;
  bitsPerSample: number;
  float: boolean;
}

export interface ParsedWav {
  layout: PcmLayout;
  data: Buffer;
}

export interface PlanarAudio {
  sampleRate: number;
  channels: Float32Array[];
}

export const BIT_DEPTHS: readonly BitDepth[] = [8, 16, 24, 32];

export function isBitDepth(value: number): value is BitDepth {
  return BIT_DEPTHS.some((depth) => depth === value);
}

/**
 * Wrap raw PCM in a canonical 44-byte RIFF/WAVE header
 *
 * @param pcmData - Interleaved little-endian PCM
 * @param format - Layout of pcmData
 * @returns WAV buffer with proper headers
 */
export function pcmToWav(pcmData: Buffer, format: AudioFormat): Buffer {
  const { sampleRate, channels, bitDepth } = format;
  const blockAlign = channels * (bitDepth / 8);
  const byteRate = sampleRate * blockAlign;

  const wavBuffer = Buffer.alloc(WAV_HEADER_SIZE + pcmData.length);

  // RIFF header
  wavBuffer.write('RIFF', 0, 'ascii');
  wavBuffer.writeUInt32LE(36 + pcmData.length, 4); // File size - 8
  wavBuffer.write('WAVE', 8, 'ascii');

  // fmt subchunk
  wavBuffer.write('fmt ', 12, 'ascii');
  wavBuffer.writeUInt32LE(16, 16); // Subchunk1Size (16 for PCM)
  wavBuffer.writeUInt16LE(WAVE_FORMAT_PCM, 20);
  wavBuffer.writeUInt16LE(channels, 22);
  wavBuffer.writeUInt32LE(sampleRate, 24);
  wavBuffer.writeUInt32LE(byteRate, 28);
  wavBuffer.writeUInt16LE(blockAlign, 32);
  wavBuffer.writeUInt16LE(bitDepth, 34);

  // data subchunk
  wavBuffer.write('data', 36, 'ascii');
  wavBuffer.writeUInt32LE(pcmData.length, 40);

  pcmData.copy(wavBuffer, WAV_HEADER_SIZE);
  return wavBuffer;
}

/**
 * Extract the sample layout and data chunk from a WAV file.
 * Unknown chunks (LIST, fact, ...) are skipped.
 *
 * @throws AudioDecodeError when the container is malformed or the codec unsupported
 */
export function parseWav(wavData: Buffer): ParsedWav {
  if (wavData.length < 12 || wavData.toString('ascii', 0, 4) !== 'RIFF') {
    throw new AudioDecodeError('Invalid WAV file: missing RIFF header');
  }
  if (wavData.toString('ascii', 8, 12) !== 'WAVE') {
    throw new AudioDecodeError('Invalid WAV file: missing WAVE format');
  }

  let layout: PcmLayout | undefined;
  let data: Buffer | undefined;
  let offset = 12;

  while (offset + 8 <= wavData.length) {
    const chunkId = wavData.toString('ascii', offset, offset + 4);
    const chunkSize = wavData.readUInt32LE(offset + 4);
    const body = offset + 8;

    if (chunkId === 'fmt ') {
      if (chunkSize < 16 || body + 16 > wavData.length) {
        throw new AudioDecodeError('Invalid WAV file: truncated fmt chunk');
      }
      layout = readFmtChunk(wavData, body, chunkSize);
    } else if (chunkId === 'data') {
      // Streamed WAVs (piped ffmpeg, etc.) leave the size at 0xFFFFFFFF
      const end = Math.min(wavData.length, body + chunkSize);
      data = wavData.subarray(body, end);
    }

    offset = body + chunkSize + (chunkSize % 2);
  }

  if (!layout) {
    throw new AudioDecodeError('Invalid WAV file: missing fmt chunk');
  }
  if (!data) {
    throw new AudioDecodeError('Invalid WAV file: missing data chunk');
  }
  return { layout, data };
}

function readFmtChunk(buf: Buffer, body: number, size: number): PcmLayout {
  let tag = buf.readUInt16LE(body);
  const channels = buf.readUInt16LE(body + 2);
  const sampleRate = buf.readUInt32LE(body + 4);
  const bitsPerSample = buf.readUInt16LE(body + 14);

  if (tag === WAVE_FORMAT_EXTENSIBLE) {
    if (size < 40 || body + 26 > buf.length) {
      throw new AudioDecodeError('Invalid WAV file: truncated extensible fmt chunk');
    }
    // first two bytes of the sub-format GUID carry the actual format tag
    tag = buf.readUInt16LE(body + 24);
  }

  const layout: PcmLayout = {
    sampleRate,
    channels,
    bitsPerSample,
    float: tag === WAVE_FORMAT_IEEE_FLOAT
  };

  if (tag !== WAVE_FORMAT_PCM && tag !== WAVE_FORMAT_IEEE_FLOAT) {
    throw new AudioDecodeError(`Unsupported WAV codec (format tag 0x${tag.toString(16)})`);
  }
  validateLayout(layout);
  return layout;
}

export function validateLayout(layout: PcmLayout): void {
  if (layout.channels < 1) {
    throw new AudioDecodeError('Invalid audio: no channels');
  }
  if (!Number.isInteger(layout.sampleRate) || layout.sampleRate <= 0) {
    throw new AudioDecodeError(`Invalid audio: sample rate ${layout.sampleRate}`);
  }
  const supported: readonly number[] = layout.float ? [32, 64] : BIT_DEPTHS;
  if (!supported.some((bits) => bits === layout.bitsPerSample)) {
    throw new AudioDecodeError(
      `Unsupported ${layout.float ? 'float' : 'integer'} sample width: ${layout.bitsPerSample} bits`
    );
  }
}

/**
 * De-interleave and dequantize PCM into planar float samples
 */
export function decodePcm(data: Buffer, layout: PcmLayout): PlanarAudio {
  validateLayout(layout);
  const bytesPerSample = layout.bitsPerSample / 8;
  const frameSize = bytesPerSample * layout.channels;
  const frames = Math.floor(data.length / frameSize);

  if (frames === 0) {
    throw new AudioDecodeError('Audio contains no sample frames');
  }

  const read = sampleReader(layout);
  const channels: Float32Array[] = [];
  for (let c = 0; c < layout.channels; c++) {
    channels.push(new Float32Array(frames));
  }

  for (let frame = 0; frame < frames; frame++) {
    const base = frame * frameSize;
    for (let c = 0; c < layout.channels; c++) {
      channels[c][frame] = read(data, base + c * bytesPerSample);
    }
  }

  return { sampleRate: layout.sampleRate, channels };
}

function sampleReader(layout: PcmLayout): (buf: Buffer, offset: number) => number {
  if (layout.float) {
    return layout.bitsPerSample === 64
      ? (buf, offset) => buf.readDoubleLE(offset)
      : (buf, offset) => buf.readFloatLE(offset);
  }
  switch (layout.bitsPerSample) {
    case 8:
      // 8-bit WAV is unsigned
      return (buf, offset) => (buf.readUInt8(offset) - 128) / 128;
    case 16:
      return (buf, offset) => buf.readInt16LE(offset) / 32768;
    case 24:
      return (buf, offset) => buf.readIntLE(offset, 3) / 8388608;
    default:
      return (buf, offset) => buf.readInt32LE(offset) / 2147483648;
  }
}

/**
 * Interleave and quantize planar float samples
 */
export function encodePcm(channels: Float32Array[], bitDepth: BitDepth): Buffer {
  const frames = channels.length > 0 ? channels[0].length : 0;
  const bytesPerSample = bitDepth / 8;
  const out = Buffer.alloc(frames * channels.length * bytesPerSample);
  let offset = 0;

  for (let frame = 0; frame < frames; frame++) {
    for (const channel of channels) {
      const x = channel[frame];
      switch (bitDepth) {
        case 8:
          out.writeUInt8(clamp(Math.round(x * 128) + 128, 0, 255), offset);
          break;
        case 16:
          out.writeInt16LE(clamp(Math.round(x * 32768), -32768, 32767), offset);
          break;
        case 24:
          out.writeIntLE(clamp(Math.round(x * 8388608), -8388608, 8388607), offset, 3);
          break;
        case 32:
          out.writeInt32LE(clamp(Math.round(x * 2147483648), -2147483648, 2147483647), offset);
          break;
      }
      offset += bytesPerSample;
    }
  }
  return out;
}

function clamp(value: number, min: number, max: number): number {
  return value < min ? min : value > max ? max : value;
}

/**
 * Change the channel count. Down-mix to mono averages all channels,
 * other changes map channels round-robin.
 */
export function remixChannels(channels: Float32Array[], target: number): Float32Array[] {
  if (channels.length === target) {
    return channels;
  }
  if (target === 1) {
    const frames = channels[0].length;
    const mono = new Float32Array(frames);
    for (let i = 0; i < frames; i++) {
      let sum = 0;
      for (const channel of channels) sum += channel[i];
      mono[i] = sum / channels.length;
    }
    return [mono];
  }
  const result: Float32Array[] = [];
  for (let c = 0; c < target; c++) {
    result.push(Float32Array.from(channels[c % channels.length]));
  }
  return result;
}

/**
 * Resample one channel. Down-sampling averages the source samples each
 * output sample covers; up-sampling interpolates linearly.
 */
export function resample(samples: Float32Array, fromRate: number, toRate: number): Float32Array {
  if (fromRate === toRate) {
    return samples;
  }

  const outputLength = Math.max(1, Math.round((samples.length * toRate) / fromRate));
  const ratio = fromRate / toRate;
  const result = new Float32Array(outputLength);
  const last = samples.length - 1;

  if (ratio > 1) {
    for (let i = 0; i < outputLength; i++) {
      const start = Math.min(last, Math.floor(i * ratio));
      const end = Math.min(samples.length, Math.max(start + 1, Math.floor((i + 1) * ratio)));
      let sum = 0;
      for (let j = start; j < end; j++) sum += samples[j];
      result[i] = sum / (end - start);
    }
    return result;
  }

  for (let i = 0; i < outputLength; i++) {
    const sourceIndex = i * ratio;
    const idx = Math.min(last, Math.floor(sourceIndex));
    const frac = sourceIndex - idx;
    const s0 = samples[idx];
    const s1 = idx + 1 <= last ? samples[idx + 1] : s0;
    result[i] = s0 + (s1 - s0) * frac;
  }
  return result;
}

/**
 * Largest absolute sample value across all channels (0-1)
 */
export function calculatePeak(channels: Float32Array[]): number {
  let peak = 0;
  for (const channel of channels) {
    for (let i = 0; i < channel.length; i++) {
      const v = Math.abs(channel[i]);
      if (v > peak) peak = v;
    }
  }
  return peak;
}

/**
 * Calculate RMS (Root Mean Square) level of a sample range across channels
 *
 * @returns RMS value normalized to 0-1 range
 */
export function calculateRms(channels: Float32Array[], start = 0, end?: number): number {
  const stop = end ?? (channels.length > 0 ? channels[0].length : 0);
  let sumSquares = 0;
  let count = 0;
  for (const channel of channels) {
    for (let i = start; i < stop; i++) {
      sumSquares += channel[i] * channel[i];
    }
    count += stop - start;
  }
  return count > 0 ? Math.sqrt(sumSquares / count) : 0;
}

/**
 * Convert RMS to decibels
 *
 * @param rms - RMS value (0-1 normalized)
 * @returns Decibel value (negative, where 0 dB = max volume)
 */
export function rmsToDb(rms: number): number {
  if (rms <= 0) return -Infinity;
  return 20 * Math.log10(rms);
}

export function dbToGain(db: number): number {
  return Math.pow(10, db / 20);
}
