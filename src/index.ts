/**
 * streaming-mp3-encoder
 *
 * Encode 16-bit PCM to MP3 incrementally, with validated settings and an
 * optional ID3v2 tag in front of the audio.
 *
 * Pipeline: PCM chunk -> canonical planar Int16 -> frame-sized blocks -> lamejs -> Uint8Array
 *
 * @example
 * ```ts
 * import { EncoderConfigBuilder, createEncoderSession } from "streaming-mp3-encoder";
 *
 * const config = new EncoderConfigBuilder().sampleRate(48000).channels(2).bitrate(192).build();
 * const session = await createEncoderSession(config);
 * session.tag().title("Take 3").track(1).apply();
 *
 * const head = session.encodeStereo(left, right);
 * const tail = session.flush();
 * ```
 *
 * @module streaming-mp3-encoder
 */

export { DEFAULTS, QUALITY, SUPPORTED_SAMPLE_RATES, bitratesForSampleRate } from "./constants";
export { EncoderConfigBuilder, buildEncoderConfig, describeRateControl } from "./encoder-config";
export {
  Mp3EncoderError,
  ConfigurationError,
  TagError,
  InputError,
  SessionError,
  isConfigurationError,
  isTagError,
  isInputError,
  isSessionError,
} from "./errors";
export { Id3TagBuilder, renderId3v2Tag } from "./id3-tag";
export { toCanonicalPcm, fromBytes, fromMono, fromPlanar, fromInterleaved } from "./pcm-input";
export { EncoderSession, createEncoderSession } from "./encoder-session";
export { LameCodec, loadLameCodec, getCodecVersion, getCodecUrl } from "./lame-codec";
export { encodeToMp3, withEncoderSession } from "./encode-mp3";
export { concatBytes } from "./audio-utils";

export type {
  ConfigurationErrorCode,
  TagErrorCode,
  InputErrorCode,
  SessionErrorCode,
} from "./errors";
export type { TagTarget } from "./id3-tag";
export type { EncoderSessionOptions } from "./encoder-session";
export type { EncodedChunk, Mp3Codec, Mp3CodecHandle } from "./lame-codec";
export type {
  ChannelCount,
  VbrMode,
  RateControl,
  EncoderOptions,
  EncoderConfiguration,
  TagFields,
  SampleSequence,
  PcmInput,
  CanonicalPcm,
  EncoderSessionState,
  EncoderSessionSnapshot,
} from "./types";
