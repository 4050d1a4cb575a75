/**
 * In-process codec for session tests.
 *
 * Emits four bytes per frame (sync word, frame length, checksum) and a
 * two-byte trailer on finalize, so tests can tell exactly which samples
 * reached the codec. Every call is recorded.
 *
 * @module streaming-mp3-encoder/test-codec
 */

import type { EncodedChunk, Mp3Codec, Mp3CodecHandle } from "./lame-codec";
import type { EncoderConfiguration } from "./types";

export type FakeCodecStage = "initialize" | "encodeFrame" | "finalize";

export interface FakeCodecOptions {
  /** Stage that throws. */
  failOn?: FakeCodecStage;
  /** For `encodeFrame`, the zero-based call that throws. */
  failAt?: number;
}

export const FAKE_TRAILER = Uint8Array.of(0xee, 0xee);

/** Bytes the fake codec emits for one frame. */
export function fakeFrameBytes(channels: readonly Int16Array[]): Uint8Array {
  const length = channels[0]?.length ?? 0;
  let sum = 0;
  for (const plane of channels) {
    for (const sample of plane) {
      sum += sample;
    }
  }
  return Uint8Array.of(0xff, 0xfb, length & 0xff, ((sum % 256) + 256) % 256);
}

export class FakeMp3Codec implements Mp3Codec {
  readonly version = "fake-codec 0.0.0";
  readonly url = "https://example.invalid/fake-codec";

  readonly configs: EncoderConfiguration[] = [];
  /** Copies of every frame handed to `encodeFrame`, in order. */
  readonly frames: Int16Array[][] = [];
  finalizeCount = 0;
  destroyCount = 0;

  constructor(private readonly options: FakeCodecOptions = {}) {}

  initialize(config: EncoderConfiguration): Mp3CodecHandle {
    if (this.options.failOn === "initialize") {
      throw new Error("fake initialize failure");
    }
    this.configs.push(config);
    return {
      encodeFrame: (channels) => this.encodeFrame(channels),
      finalize: () => this.finalize(),
      destroy: () => {
        this.destroyCount++;
      },
    };
  }

  private encodeFrame(channels: readonly Int16Array[]): EncodedChunk {
    if (this.options.failOn === "encodeFrame" && this.frames.length === (this.options.failAt ?? 0)) {
      throw new Error("fake encode failure");
    }
    this.frames.push(channels.map((plane) => plane.slice()));
    return fakeFrameBytes(channels);
  }

  private finalize(): EncodedChunk {
    if (this.options.failOn === "finalize") {
      throw new Error("fake finalize failure");
    }
    this.finalizeCount++;
    return FAKE_TRAILER;
  }
}
