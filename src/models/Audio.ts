export type BitDepth = 8 | 16 | 24 | 32;

/**
 * Sample layout of PCM audio
 */
export interface AudioFormat {
  sampleRate: number;
  channels: number;
  bitDepth: BitDepth;
}

/**
 * How a provider hands back its audio.
 * 'wav' buffers carry their own header, which wins over the declared fields.
 * 'pcm' buffers are headerless little-endian signed integer samples.
 */
export interface AudioEncoding extends AudioFormat {
  container: 'wav' | 'pcm';
}

export function describeFormat(format: AudioFormat): string {
  return `${format.sampleRate}Hz/${format.channels}ch/${format.bitDepth}bit`;
}
