/**
 * PCM input normalization.
 *
 * Every accepted input shape is converted into canonical planar PCM: one
 * Int16Array per channel. The converters are pure; they validate before they
 * allocate, so a rejected chunk never reaches the session's buffers.
 *
 * Called by:
 * - `EncoderSession.encode()` in `./encoder-session.ts`
 *
 * @module streaming-mp3-encoder/pcm-input
 */

import { SAMPLE_MAX, SAMPLE_MIN } from "./constants";
import { InputError } from "./errors";
import type { CanonicalPcm, ChannelCount, PcmInput, SampleSequence } from "./types";

/** Bytes per signed 16-bit sample. */
const BYTES_PER_SAMPLE = 2;

const HOST_IS_LITTLE_ENDIAN = new Uint8Array(new Uint16Array([1]).buffer)[0] === 1;

/**
 * Convert any accepted input shape to canonical planar PCM.
 *
 * @throws {InputError}
 */
export function toCanonicalPcm(input: PcmInput, channels: ChannelCount): CanonicalPcm {
  switch (input.shape) {
    case "bytes":
      return fromBytes(input.data, channels);
    case "mono":
      return fromMono(input.samples, channels);
    case "planar":
      return fromPlanar(input.left, input.right, channels);
    case "interleaved":
      return fromInterleaved(input.samples, channels);
  }
}

/**
 * Interleaved little-endian signed 16-bit bytes.
 *
 * Mono input on a little-endian host with an aligned offset is viewed in place.
 */
export function fromBytes(data: Uint8Array, channels: ChannelCount): CanonicalPcm {
  const stride = BYTES_PER_SAMPLE * channels;
  if (data.byteLength % stride !== 0) {
    throw InputError.misaligned("bytes", data.byteLength, stride);
  }

  const length = data.byteLength / stride;

  if (channels === 1 && HOST_IS_LITTLE_ENDIAN && data.byteOffset % BYTES_PER_SAMPLE === 0) {
    return { channels: [new Int16Array(data.buffer, data.byteOffset, length)], length };
  }

  const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  const planes = allocatePlanes(channels, length);
  for (let i = 0; i < length; i++) {
    for (let ch = 0; ch < channels; ch++) {
      planes[ch][i] = view.getInt16((i * channels + ch) * BYTES_PER_SAMPLE, true);
    }
  }
  return { channels: planes, length };
}

/** One channel of samples. Requires a mono session. */
export function fromMono(samples: SampleSequence, channels: ChannelCount): CanonicalPcm {
  if (channels !== 1) {
    throw InputError.channelMismatch("mono", 1, channels);
  }
  return { channels: [toInt16(samples, 0, 1)], length: samples.length };
}

/** Separate left and right channels. Requires a stereo session. */
export function fromPlanar(
  left: SampleSequence,
  right: SampleSequence,
  channels: ChannelCount
): CanonicalPcm {
  if (channels !== 2) {
    throw InputError.channelMismatch("planar", 2, channels);
  }
  if (left.length !== right.length) {
    throw InputError.lengthMismatch(left.length, right.length);
  }
  const leftPlane = toInt16(left, 0, 1);
  const rightPlane = toInt16(right, 0, 1);
  return { channels: [leftPlane, rightPlane], length: left.length };
}

/** L, R, L, R, … for stereo; a plain sample run for mono. */
export function fromInterleaved(samples: SampleSequence, channels: ChannelCount): CanonicalPcm {
  if (samples.length % channels !== 0) {
    throw InputError.misaligned("samples", samples.length, channels);
  }
  if (channels === 1) {
    return { channels: [toInt16(samples, 0, 1)], length: samples.length };
  }

  const length = samples.length / channels;
  const planes: Int16Array[] = [];
  for (let ch = 0; ch < channels; ch++) {
    planes.push(toInt16(samples, ch, channels));
  }
  return { channels: planes, length };
}

/**
 * Take every `stride`-th sample starting at `offset` as an Int16Array.
 *
 * A contiguous Int16Array is returned as-is. Plain numbers are range checked;
 * the reported index is the position in `samples`.
 */
function toInt16(samples: SampleSequence, offset: number, stride: number): Int16Array {
  if (samples instanceof Int16Array) {
    if (stride === 1) return samples;
  } else if (offset === 0) {
    // The first channel's pass checks every interleaved channel.
    assertSampleRange(samples);
  }

  const plane = new Int16Array(samples.length / stride);
  for (let i = 0; i < plane.length; i++) {
    plane[i] = samples[i * stride + offset];
  }
  return plane;
}

function assertSampleRange(samples: readonly number[]): void {
  for (let i = 0; i < samples.length; i++) {
    const value = samples[i];
    if (!Number.isInteger(value) || value < SAMPLE_MIN || value > SAMPLE_MAX) {
      throw InputError.sampleOutOfRange(i, value);
    }
  }
}

function allocatePlanes(channels: number, length: number): Int16Array[] {
  const planes: Int16Array[] = [];
  for (let ch = 0; ch < channels; ch++) {
    planes.push(new Int16Array(length));
  }
  return planes;
}
