/**
 * Codec boundary and its lamejs implementation.
 *
 * `EncoderSession` talks to the encoder only through `Mp3Codec` /
 * `Mp3CodecHandle`, so the psychoacoustic engine stays a black box and tests
 * can drive the session with an in-process fake.
 *
 * Calls:
 * - `loadLameJs()` from `./load-lamejs.ts`
 *
 * @module streaming-mp3-encoder/lame-codec
 */

import { createRequire } from "node:module";
import { DEFAULTS, LOG_PREFIX, bitratesForSampleRate } from "./constants";
import { describeRateControl } from "./encoder-config";
import { loadLameJs, type LameJsModule, type LameMp3Encoder } from "./load-lamejs";
import type { EncoderConfiguration } from "./types";

/** Encoded bytes as produced by a codec. lamejs hands out Int8Array views. */
export type EncodedChunk = Uint8Array | Int8Array;

/**
 * One open encoder. Owned by exactly one session; not reentrant.
 */
export interface Mp3CodecHandle {
  /** Compress one frame (or a shorter final run) of planar samples. */
  encodeFrame(channels: readonly Int16Array[]): EncodedChunk;
  /** Drain internal buffers and return the trailing bytes. */
  finalize(): EncodedChunk;
  /** Release the encoder. Safe to call more than once. */
  destroy(): void;
}

/**
 * Factory for codec handles plus pass-through introspection.
 */
export interface Mp3Codec {
  readonly version: string;
  readonly url: string;
  initialize(config: EncoderConfiguration): Mp3CodecHandle;
}

const LAMEJS_URL = "https://github.com/zhuker/lamejs";

/**
 * Constant bitrates standing in for VBR qualities 0..9, since lamejs only
 * encodes at a fixed rate.
 */
const VBR_QUALITY_BITRATES = [320, 256, 224, 192, 160, 128, 112, 96, 80, 64] as const;

let lameVersion: string | null = null;

/** Version string of the bundled lamejs package. */
export function getCodecVersion(): string {
  if (lameVersion === null) {
    const require = createRequire(import.meta.url);
    const manifest: unknown = require("lamejs/package.json");
    const version =
      typeof manifest === "object" && manifest !== null && "version" in manifest
        ? manifest.version
        : undefined;
    lameVersion = typeof version === "string" ? `lamejs ${version}` : "lamejs";
  }
  return lameVersion;
}

/** Project URL of the lamejs encoder. */
export function getCodecUrl(): string {
  return LAMEJS_URL;
}

/**
 * Bitrate handed to lamejs for `config`.
 *
 * CBR and ABR use the configured bitrate. VBR maps `vbrQuality` to the highest
 * valid bitrate not above the stand-in for that quality.
 */
export function lameBitrateFor(config: EncoderConfiguration): number {
  if (config.rateControl === "bitrate" || config.vbrMode === "abr") {
    return config.bitrate;
  }
  const ceiling = VBR_QUALITY_BITRATES[config.vbrQuality] ?? config.bitrate;
  const allowed = bitratesForSampleRate(config.sampleRate).filter((kbps) => kbps <= ceiling);
  return allowed[allowed.length - 1] ?? config.bitrate;
}

class LameCodecHandle implements Mp3CodecHandle {
  private encoder: LameMp3Encoder | null;

  constructor(encoder: LameMp3Encoder) {
    this.encoder = encoder;
  }

  encodeFrame(channels: readonly Int16Array[]): EncodedChunk {
    const [left, right] = channels;
    if (!left) {
      throw new Error("encodeFrame() needs at least one channel.");
    }
    return this.requireEncoder().encodeBuffer(left, right);
  }

  finalize(): EncodedChunk {
    return this.requireEncoder().flush();
  }

  destroy(): void {
    this.encoder = null;
  }

  private requireEncoder(): LameMp3Encoder {
    if (!this.encoder) {
      throw new Error("MP3 encoder has been released.");
    }
    return this.encoder;
  }
}

/**
 * `Mp3Codec` backed by lamejs.
 *
 * lamejs exposes sample rate, channel count and bitrate only: `quality` is
 * accepted and ignored, and VBR is approximated by a constant bitrate. Both
 * are reported with `console.warn` when a session is opened.
 */
export class LameCodec implements Mp3Codec {
  readonly url = LAMEJS_URL;

  constructor(private readonly lamejs: LameJsModule) {}

  get version(): string {
    return getCodecVersion();
  }

  initialize(config: EncoderConfiguration): Mp3CodecHandle {
    const kbps = lameBitrateFor(config);
    if (config.rateControl === "vbr" && config.vbrMode === "vbr") {
      console.warn(
        `${LOG_PREFIX} lamejs has no VBR mode; encoding ${describeRateControl(config)} at a constant ${kbps} kbps`
      );
    }
    if (config.quality !== DEFAULTS.QUALITY) {
      console.warn(
        `${LOG_PREFIX} lamejs has no quality setting; ignoring quality ${config.quality}`
      );
    }
    const encoder = new this.lamejs.Mp3Encoder(config.channels, config.sampleRate, kbps);
    return new LameCodecHandle(encoder);
  }
}

/**
 * Load lamejs and wrap it as an `Mp3Codec`.
 */
export async function loadLameCodec(): Promise<Mp3Codec> {
  const lamejs = await loadLameJs();
  return new LameCodec(lamejs);
}
