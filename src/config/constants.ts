import type { AudioFormat } from '../models/Audio';

export const MAX_RETRIES = 2;

/**
 * Sound file encoding EdgeTX and OpenTX play from the SD card
 */
export const FIRMWARE_AUDIO_FORMAT: AudioFormat = {
  sampleRate: 16000,
  channels: 1,
  bitDepth: 16
};

/**
 * Published Piper voices (voices.json plus model files)
 */
export const PIPER_VOICES_URL = 'https://huggingface.co/rhasspy/piper-voices/resolve/main';

export const SOUNDS_DIR = 'SOUNDS';
export const SOUND_FILE_EXTENSION = '.wav';
export const CHECKSUM_MANIFEST = 'checksums.sha256';

export const LOUDNESS = {
  TARGET_DBFS: -20,
  PEAK_CEILING_DBFS: -1,
  BLOCK_MS: 50,
  RELATIVE_GATE_DB: 30,
  // gains below this are left unapplied
  MIN_GAIN_DB: 0.05
};
