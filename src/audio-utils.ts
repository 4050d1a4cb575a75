/**
 * Buffer helpers for sample planes and encoded chunks.
 *
 * Stateless functions. No side effects, no imports from other project files.
 *
 * Called by:
 * - `EncoderSession` in `./encoder-session.ts`: residual buffering and output assembly
 * - `encodeToMp3()` in `./encode-mp3.ts`: joining per-call output
 *
 * @module streaming-mp3-encoder/audio-utils
 */

/**
 * Join two sample runs. Returns `tail` itself when `head` is empty.
 */
export function concatSamples(head: Int16Array, tail: Int16Array): Int16Array {
  if (head.length === 0) return tail;
  const joined = new Int16Array(head.length + tail.length);
  joined.set(head, 0);
  joined.set(tail, head.length);
  return joined;
}

/**
 * Join encoded chunks into one contiguous byte array.
 *
 * Accepts Int8Array chunks as returned by lamejs; their bytes are copied
 * unchanged.
 */
export function concatBytes(chunks: readonly (Uint8Array | Int8Array)[]): Uint8Array {
  const totalSize = chunks.reduce((sum, chunk) => sum + chunk.byteLength, 0);
  const joined = new Uint8Array(totalSize);

  let offset = 0;
  for (const chunk of chunks) {
    joined.set(new Uint8Array(chunk.buffer, chunk.byteOffset, chunk.byteLength), offset);
    offset += chunk.byteLength;
  }

  return joined;
}
