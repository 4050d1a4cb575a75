/**
 * Session helpers for callers that do not need the streaming API.
 *
 * Called by:
 * - Library consumers (re-exported from `./index.ts`)
 *
 * Calls:
 * - `buildEncoderConfig()` from `./encoder-config.ts` for plain options
 * - `createEncoderSession()` from `./encoder-session.ts`
 *
 * @module streaming-mp3-encoder/encode-mp3
 */

import { concatBytes } from "./audio-utils";
import { buildEncoderConfig } from "./encoder-config";
import {
  createEncoderSession,
  type EncoderSession,
  type EncoderSessionOptions,
} from "./encoder-session";
import type { EncoderConfiguration, EncoderOptions, PcmInput, TagFields } from "./types";

function isEncoderConfiguration(
  config: EncoderConfiguration | EncoderOptions
): config is EncoderConfiguration {
  return "frameSize" in config;
}

function isInputList(input: PcmInput | readonly PcmInput[]): input is readonly PcmInput[] {
  return Array.isArray(input);
}

/**
 * Run `fn` with a fresh session and close it afterwards, whether `fn`
 * returns or throws.
 *
 * @example
 * ```ts
 * const mp3 = await withEncoderSession(config, (session) => {
 *   const head = session.encodeMono(samples);
 *   return concatBytes([head, session.flush()]);
 * });
 * ```
 */
export async function withEncoderSession<T>(
  config: EncoderConfiguration,
  fn: (session: EncoderSession) => T | Promise<T>,
  options?: EncoderSessionOptions
): Promise<T> {
  const session = await createEncoderSession(config, options);
  try {
    return await fn(session);
  } finally {
    session.close();
  }
}

/**
 * One-shot PCM -> MP3 encoding.
 *
 * Accepts either a built configuration or plain options, which are validated
 * first. Chunks are encoded in order, then the stream is flushed.
 *
 * @param input - one chunk, or several to be encoded back to back
 * @param tag - ID3 fields to prepend
 * @throws {ConfigurationError} for invalid plain options
 * @throws {InputError} for a malformed chunk
 * @throws {SessionError} `CodecFailure`
 */
export async function encodeToMp3(
  input: PcmInput | readonly PcmInput[],
  config: EncoderConfiguration | EncoderOptions = {},
  tag?: Readonly<TagFields>,
  options?: EncoderSessionOptions
): Promise<Uint8Array> {
  const resolved = isEncoderConfiguration(config) ? config : buildEncoderConfig(config);
  const chunks = isInputList(input) ? input : [input];

  return withEncoderSession(
    resolved,
    (session) => {
      if (tag) {
        session.applyTag(tag);
      }
      const output: Uint8Array[] = [];
      for (const chunk of chunks) {
        output.push(session.encode(chunk));
      }
      output.push(session.flush());
      return concatBytes(output);
    },
    options
  );
}
