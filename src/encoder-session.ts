/**
 * Streaming MP3 encoder session.
 *
 * Owns one codec handle and the residual buffer between calls. Input of any
 * accepted shape is canonicalized, joined to the residual, and handed to the
 * codec one complete frame at a time; whatever is shorter than a frame waits
 * for the next call or for `flush()`. Because frames are cut the same way no
 * matter how the input was split, the concatenated output does not depend on
 * chunk boundaries.
 *
 * Lifecycle:
 * ```
 * configured --encode()--> encoding --flush()--> flushed
 *      \_____________________flush()__________/
 * ```
 *
 * Called by:
 * - `withEncoderSession()` / `encodeToMp3()` in `./encode-mp3.ts`
 * - Library consumers directly
 *
 * Calls:
 * - `toCanonicalPcm()` from `./pcm-input.ts`
 * - `renderId3v2Tag()` from `./id3-tag.ts`
 * - `loadLameCodec()` from `./lame-codec.ts` unless a codec is supplied
 *
 * @module streaming-mp3-encoder/encoder-session
 */

import { concatBytes, concatSamples } from "./audio-utils";
import { LOG_PREFIX } from "./constants";
import { SessionError } from "./errors";
import { Id3TagBuilder, renderId3v2Tag, type TagTarget } from "./id3-tag";
import {
  loadLameCodec,
  type EncodedChunk,
  type Mp3Codec,
  type Mp3CodecHandle,
} from "./lame-codec";
import { toCanonicalPcm } from "./pcm-input";
import type {
  EncoderConfiguration,
  EncoderSessionSnapshot,
  EncoderSessionState,
  PcmInput,
  SampleSequence,
  TagFields,
} from "./types";

export interface EncoderSessionOptions {
  /**
   * Codec to encode with.
   * @default lamejs, loaded on first use
   */
  codec?: Mp3Codec;
}

/**
 * Open a session for `config`. Loads lamejs unless `options.codec` is given.
 *
 * @throws {SessionError} `CodecFailure` if the codec cannot be initialized
 */
export async function createEncoderSession(
  config: EncoderConfiguration,
  options: EncoderSessionOptions = {}
): Promise<EncoderSession> {
  const codec = options.codec ?? (await loadLameCodec());

  let handle: Mp3CodecHandle;
  try {
    handle = codec.initialize(config);
  } catch (error) {
    throw SessionError.codecFailure("initialize", error);
  }

  return new EncoderSession(config, codec, handle);
}

/**
 * Stateful encoder. Not safe to share: every call runs synchronously to
 * completion and the wrapped codec is not reentrant.
 */
export class EncoderSession implements TagTarget {
  private currentState: EncoderSessionState = "configured";
  private handle: Mp3CodecHandle | null;
  private residual: Int16Array[];
  private stagedTag: Uint8Array | null = null;
  private poisoned: SessionError | null = null;
  private closed = false;
  private encodedSamples = 0;
  private emittedBytes = 0;
  private readonly listeners = new Set<(snapshot: EncoderSessionSnapshot) => void>();

  /** Use `createEncoderSession()`. */
  constructor(
    readonly config: EncoderConfiguration,
    private readonly codec: Mp3Codec,
    handle: Mp3CodecHandle
  ) {
    this.handle = handle;
    this.residual = Array.from({ length: config.channels }, () => new Int16Array(0));
  }

  get state(): EncoderSessionState {
    return this.currentState;
  }

  /** Samples per channel handed to the codec so far. */
  get samplesEncoded(): number {
    return this.encodedSamples;
  }

  /** Samples per channel held back until a frame is complete. */
  get bufferedSamples(): number {
    return this.residual[0]?.length ?? 0;
  }

  get codecVersion(): string {
    return this.codec.version;
  }

  get codecUrl(): string {
    return this.codec.url;
  }

  getState(): EncoderSessionSnapshot {
    return {
      state: this.currentState,
      samplesEncoded: this.encodedSamples,
      bufferedSamples: this.bufferedSamples,
      bytesEmitted: this.emittedBytes,
      hasTag: (this.stagedTag?.length ?? 0) > 0,
      released: this.handle === null,
    };
  }

  /**
   * Subscribe to state changes (state transitions, tag commits, release).
   *
   * @returns Unsubscribe function
   */
  subscribe(listener: (snapshot: EncoderSessionSnapshot) => void): () => void {
    this.listeners.add(listener);
    listener(this.getState());

    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Tag builder bound to this session. */
  tag(): Id3TagBuilder {
    return new Id3TagBuilder(this);
  }

  /**
   * Stage a tag snapshot, replacing any earlier one. The tag is rendered now,
   * so later edits to the builder do not reach it.
   *
   * @throws {SessionError} `TooLateForTag` outside the `configured` state
   * @throws {TagError} if the rendered tag would exceed the ID3v2 size limit
   */
  applyTag(fields: Readonly<TagFields>): void {
    this.assertOpen("apply a tag");
    if (this.currentState !== "configured") {
      throw SessionError.tooLateForTag(this.currentState);
    }
    this.stagedTag = renderId3v2Tag(fields);
    this.notify();
  }

  /**
   * Encode one chunk of PCM.
   *
   * @returns Bytes produced by this call; possibly empty
   * @throws {InputError} for malformed input; the session is unchanged
   * @throws {SessionError} `AlreadyFlushed`, `Closed`, or `CodecFailure`
   */
  encode(input: PcmInput): Uint8Array {
    this.assertWritable("encode");

    const pcm = toCanonicalPcm(input, this.config.channels);
    const frameSize = this.config.frameSize;
    const planes = pcm.channels.map((plane, ch) => concatSamples(this.residual[ch], plane));
    const available = planes[0]?.length ?? 0;

    const chunks: EncodedChunk[] = [];
    let consumed = 0;
    while (available - consumed >= frameSize) {
      const frame = planes.map((plane) => plane.subarray(consumed, consumed + frameSize));
      chunks.push(this.callCodec("encode", (handle) => handle.encodeFrame(frame)));
      consumed += frameSize;
    }

    // Copy the tail: it may alias caller-owned memory.
    this.residual = planes.map((plane) => plane.slice(consumed));
    this.encodedSamples += consumed;

    const wasConfigured = this.currentState === "configured";
    this.currentState = "encoding";
    const output = this.emit(wasConfigured, chunks);
    this.notify();
    return output;
  }

  /** Shortcut for `{ shape: "bytes" }` input. */
  encodeBytes(data: Uint8Array): Uint8Array {
    return this.encode({ shape: "bytes", data });
  }

  /** Shortcut for `{ shape: "mono" }` input. */
  encodeMono(samples: SampleSequence): Uint8Array {
    return this.encode({ shape: "mono", samples });
  }

  /** Shortcut for `{ shape: "planar" }` input. */
  encodeStereo(left: SampleSequence, right: SampleSequence): Uint8Array {
    return this.encode({ shape: "planar", left, right });
  }

  /** Shortcut for `{ shape: "interleaved" }` input. */
  encodeInterleaved(samples: SampleSequence): Uint8Array {
    return this.encode({ shape: "interleaved", samples });
  }

  /**
   * Drain the residual, finalize the stream and release the codec.
   *
   * The residual goes to the codec as a short final frame; the codec pads its
   * last frame with silence while finalizing.
   *
   * @returns The final bytes (the tag too, if nothing was encoded before)
   * @throws {SessionError} `AlreadyFlushed` on a second call, `Closed`, or `CodecFailure`
   */
  flush(): Uint8Array {
    this.assertWritable("flush");

    const chunks: EncodedChunk[] = [];
    const remaining = this.bufferedSamples;
    if (remaining > 0) {
      const tail = this.residual;
      chunks.push(this.callCodec("flush", (handle) => handle.encodeFrame(tail)));
      this.encodedSamples += remaining;
      this.residual = this.residual.map(() => new Int16Array(0));
    }
    chunks.push(this.callCodec("flush", (handle) => handle.finalize()));

    const wasConfigured = this.currentState === "configured";
    this.currentState = "flushed";
    this.release();
    const output = this.emit(wasConfigured, chunks);
    this.notify();
    return output;
  }

  /**
   * Release the codec without finalizing. No trailing bytes are produced.
   * Safe to call multiple times, and after `flush()`.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.release();
    this.residual = this.residual.map(() => new Int16Array(0));
    this.notify();
    this.listeners.clear();
  }

  private assertOpen(operation: string): void {
    if (this.closed) throw SessionError.closed(operation);
    if (this.poisoned) throw this.poisoned;
  }

  private assertWritable(operation: "encode" | "flush"): void {
    if (this.currentState === "flushed") {
      throw SessionError.alreadyFlushed(operation);
    }
    this.assertOpen(operation);
  }

  /**
   * Run one codec call. Any failure poisons the session and releases the codec.
   */
  private callCodec(
    operation: string,
    call: (handle: Mp3CodecHandle) => EncodedChunk
  ): EncodedChunk {
    const handle = this.handle;
    if (!handle) {
      throw SessionError.closed(operation);
    }
    try {
      return call(handle);
    } catch (error) {
      this.poisoned = SessionError.codecFailure(operation, error);
      this.release();
      this.notify();
      throw this.poisoned;
    }
  }

  /** Join output, prepending the staged tag on the first encode/flush call. */
  private emit(firstCall: boolean, chunks: EncodedChunk[]): Uint8Array {
    if (firstCall && this.stagedTag) {
      chunks.unshift(this.stagedTag);
    }
    const output = concatBytes(chunks);
    this.emittedBytes += output.length;
    return output;
  }

  private release(): void {
    const handle = this.handle;
    if (!handle) return;
    this.handle = null;
    try {
      handle.destroy();
    } catch (error) {
      console.error(`${LOG_PREFIX} Failed to release MP3 encoder:`, error);
    }
  }

  private notify(): void {
    if (this.listeners.size === 0) return;
    const snapshot = this.getState();
    for (const listener of this.listeners) {
      listener(snapshot);
    }
  }
}
