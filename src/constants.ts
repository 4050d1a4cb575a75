/**
 * Default encoder settings and the value tables they are validated against.
 *
 * Used by:
 * - `buildEncoderConfig()` in `./encoder-config.ts` for defaults and validation
 * - `EncoderSession` in `./encoder-session.ts` for frame sizing
 *
 * @module streaming-mp3-encoder/constants
 */

export const DEFAULTS = {
  /** Input and output sample rate (Hz). */
  SAMPLE_RATE: 44100,
  /** Mono. */
  CHANNELS: 1,
  /** Mid-range constant bitrate (kbps), valid for every supported sample rate. */
  BITRATE: 128,
  /** LAME "standard" quality ordinal. */
  QUALITY: 5,
  /** Constant bitrate unless a VBR mode is chosen. */
  VBR_MODE: "off",
  /** LAME's default VBR quality. */
  VBR_QUALITY: 4,
} as const;

/**
 * Quality presets (0 = best/slowest, 9 = fastest).
 */
export const QUALITY = {
  BEST: 0,
  HIGH: 2,
  GOOD: 4,
  STANDARD: 5,
  FAST: 7,
  FASTEST: 9,
} as const;

export const MIN_QUALITY = 0;
export const MAX_QUALITY = 9;

/** Sample rates accepted by MPEG-1, MPEG-2 and MPEG-2.5 Layer III. */
export const SUPPORTED_SAMPLE_RATES: readonly number[] = [
  8000, 11025, 12000, 16000, 22050, 24000, 32000, 44100, 48000,
];

/** Layer III bitrates for MPEG-1 (32, 44.1 and 48 kHz). */
export const MPEG1_BITRATES: readonly number[] = [
  32, 40, 48, 56, 64, 80, 96, 112, 128, 160, 192, 224, 256, 320,
];

/** Layer III bitrates for MPEG-2 and MPEG-2.5 (below 32 kHz). */
export const MPEG2_BITRATES: readonly number[] = [
  8, 16, 24, 32, 40, 48, 56, 64, 80, 96, 112, 128, 144, 160,
];

/** Lowest MPEG-1 sample rate. Anything below is MPEG-2 or MPEG-2.5. */
const MPEG1_MIN_SAMPLE_RATE = 32000;

/** MPEG-1 Layer III frames carry two granules of 576 samples. */
const MPEG1_FRAME_SIZE = 1152;

/** MPEG-2/2.5 Layer III frames carry a single granule. */
const MPEG2_FRAME_SIZE = 576;

export const SAMPLE_MIN = -32768;
export const SAMPLE_MAX = 32767;

/** Bitrates valid for the MPEG version implied by `sampleRate`. */
export function bitratesForSampleRate(sampleRate: number): readonly number[] {
  return sampleRate >= MPEG1_MIN_SAMPLE_RATE ? MPEG1_BITRATES : MPEG2_BITRATES;
}

/** Samples per channel in one encoded frame at `sampleRate`. */
export function frameSizeForSampleRate(sampleRate: number): number {
  return sampleRate >= MPEG1_MIN_SAMPLE_RATE ? MPEG1_FRAME_SIZE : MPEG2_FRAME_SIZE;
}

/** Prefix for console diagnostics. */
export const LOG_PREFIX = "[streaming-mp3-encoder]";
