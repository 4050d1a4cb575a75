/**
 * Public TypeScript interfaces for streaming-mp3-encoder.
 *
 * Re-exported from `./index.ts`.
 *
 * Used by:
 * - `buildEncoderConfig()` in `./encoder-config.ts`: produces `EncoderConfiguration`
 * - `Id3TagBuilder` in `./id3-tag.ts`: produces `TagFields` snapshots
 * - `toCanonicalPcm()` in `./pcm-input.ts`: consumes `PcmInput`
 * - `EncoderSession` in `./encoder-session.ts`: implements the lifecycle contract
 *
 * @module streaming-mp3-encoder/types
 */

export type ChannelCount = 1 | 2;

/**
 * Rate control selector.
 * - `"off"`: constant bitrate
 * - `"vbr"`: variable bitrate driven by `vbrQuality`
 * - `"abr"`: average bitrate targeting `bitrate`
 */
export type VbrMode = "off" | "vbr" | "abr";

/** Which of {fixed bitrate, VBR mode} decides the output. */
export type RateControl = "bitrate" | "vbr";

/**
 * Encoder parameters accepted by `buildEncoderConfig()`.
 * All fields are optional; defaults come from `DEFAULTS`.
 */
export interface EncoderOptions {
  /**
   * Sample rate in Hz.
   * @default 44100
   */
  sampleRate?: number;
  /**
   * 1 = mono, 2 = stereo.
   * @default 1
   */
  channels?: number;
  /**
   * Target bitrate in kbps.
   * @default 128
   */
  bitrate?: number;
  /**
   * Algorithm quality, 0 (best, slowest) to 9 (fastest).
   * @default 5
   */
  quality?: number;
  /** @default "off" */
  vbrMode?: VbrMode;
  /**
   * VBR quality, 0 (best) to 9. Kept but ignored while `vbrMode` is `"off"`.
   * @default 4
   */
  vbrQuality?: number;
  /**
   * Which setting is authoritative when both a bitrate and a VBR mode are present.
   * Defaults to `"vbr"` when `vbrMode` is set to something other than `"off"`.
   */
  rateControl?: RateControl;
}

/**
 * Validated, immutable encoder configuration.
 * Created only by `buildEncoderConfig()` / `EncoderConfigBuilder.build()`.
 */
export interface EncoderConfiguration {
  readonly sampleRate: number;
  readonly channels: ChannelCount;
  readonly bitrate: number;
  readonly quality: number;
  readonly vbrMode: VbrMode;
  readonly vbrQuality: number;
  readonly rateControl: RateControl;
  /** Samples per channel the codec consumes for one MP3 frame. */
  readonly frameSize: number;
}

/**
 * ID3 fields. Unset fields are left out of the rendered tag.
 */
export interface TagFields {
  title?: string;
  artist?: string;
  album?: string;
  year?: string;
  comment?: string;
  /** Track number in [0, 255]. */
  track?: number;
  /** Genre name, or `"(n)"` for an ID3v1 genre index. */
  genre?: string;
  albumArtist?: string;
}

/** A sequence of signed 16-bit samples. `Int16Array` skips the range scan. */
export type SampleSequence = readonly number[] | Int16Array;

/**
 * The accepted PCM input shapes.
 */
export type PcmInput =
  | {
      /** Interleaved little-endian signed 16-bit samples. */
      shape: "bytes";
      data: Uint8Array;
    }
  | {
      shape: "mono";
      samples: SampleSequence;
    }
  | {
      shape: "planar";
      left: SampleSequence;
      right: SampleSequence;
    }
  | {
      /** L, R, L, R, … for stereo; plain samples for mono. */
      shape: "interleaved";
      samples: SampleSequence;
    };

/**
 * Canonical internal PCM: one Int16Array per channel, equal lengths.
 */
export interface CanonicalPcm {
  readonly channels: readonly Int16Array[];
  /** Samples per channel. */
  readonly length: number;
}

/**
 * Session lifecycle.
 * `configured` → `encoding` (first successful encode) → `flushed` (terminal).
 */
export type EncoderSessionState = "configured" | "encoding" | "flushed";

/**
 * Read-only view of a session, delivered by `getState()` and `subscribe()`.
 */
export interface EncoderSessionSnapshot {
  state: EncoderSessionState;
  /** Samples per channel handed to the codec so far. */
  samplesEncoded: number;
  /** Samples per channel waiting for a complete frame. */
  bufferedSamples: number;
  /** Total bytes returned to the caller so far. */
  bytesEmitted: number;
  /** True once a tag with at least one field has been applied. */
  hasTag: boolean;
  /** True after `close()`, `flush()` or a codec failure released the codec. */
  released: boolean;
}
