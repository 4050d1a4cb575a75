/**
 * ID3 tag builder and ID3v2.3 serialization.
 *
 * Tags are prepended to the MP3 stream, so a tag can only be committed while
 * the target session has not produced audio yet.
 *
 * Called by:
 * - `EncoderSession.tag()` in `./encoder-session.ts`: creates a bound builder
 * - `EncoderSession.applyTag()`: renders the committed fields
 *
 * @module streaming-mp3-encoder/id3-tag
 */

import { TagError } from "./errors";
import type { EncoderSessionState, TagFields } from "./types";

/** Highest track number and ID3v1 genre index a tag can carry. */
const MAX_TAG_ORDINAL = 255;

/** ID3v2 sizes are 28-bit synchsafe integers. */
const MAX_TAG_SIZE = 0x0fffffff;

const ID3V2_HEADER_SIZE = 10;
const FRAME_HEADER_SIZE = 10;

const ENCODING_LATIN1 = 0x00;
const ENCODING_UTF16 = 0x01;

/** Frame written for each field, in output order. */
const FRAME_IDS: ReadonlyArray<readonly [keyof TagFields, string]> = [
  ["title", "TIT2"],
  ["artist", "TPE1"],
  ["album", "TALB"],
  ["albumArtist", "TPE2"],
  ["year", "TYER"],
  ["track", "TRCK"],
  ["genre", "TCON"],
  ["comment", "COMM"],
];

/**
 * Anything a tag can be committed to. Implemented by `EncoderSession`.
 */
export interface TagTarget {
  readonly state: EncoderSessionState;
  applyTag(fields: Readonly<TagFields>): void;
}

/**
 * Chained tag builder bound to one session.
 *
 * @example
 * ```ts
 * session.tag().title("Field Recording").artist("Nobody").track(1).apply();
 * ```
 */
export class Id3TagBuilder {
  private readonly fields: TagFields = {};

  constructor(private readonly target: TagTarget) {}

  title(title: string): this {
    this.fields.title = title;
    return this;
  }

  artist(artist: string): this {
    this.fields.artist = artist;
    return this;
  }

  album(album: string): this {
    this.fields.album = album;
    return this;
  }

  albumArtist(albumArtist: string): this {
    this.fields.albumArtist = albumArtist;
    return this;
  }

  year(year: string | number): this {
    this.fields.year = String(year);
    return this;
  }

  comment(comment: string): this {
    this.fields.comment = comment;
    return this;
  }

  /**
   * @param track - integer in [0, 255], or its decimal string
   * @throws {TagError} `InvalidValue` when not coercible
   */
  track(track: number | string): this {
    this.fields.track = coerceOrdinal("track", track);
    return this;
  }

  /**
   * @param genre - a genre name, or an ID3v1 genre index in [0, 255]
   * @throws {TagError} `InvalidValue` for an index out of range
   */
  genre(genre: string | number): this {
    this.fields.genre = typeof genre === "number" ? `(${coerceOrdinal("genre", genre)})` : genre;
    return this;
  }

  /** Frozen copy of the fields set so far. */
  snapshot(): Readonly<TagFields> {
    return Object.freeze({ ...this.fields });
  }

  /**
   * Commit the current fields to the session, replacing any tag applied earlier.
   * The builder stays usable; later edits need another `apply()`.
   *
   * @throws {TagError} `AlreadyFinalized` once the session has started encoding
   */
  apply(): void {
    if (this.target.state !== "configured") {
      throw TagError.alreadyFinalized(this.target.state);
    }
    this.target.applyTag(this.snapshot());
  }
}

function coerceOrdinal(field: string, value: number | string): number {
  const numeric =
    typeof value === "number" ? value : /^\s*\d+\s*$/.test(value) ? Number(value) : Number.NaN;
  if (!Number.isInteger(numeric) || numeric < 0 || numeric > MAX_TAG_ORDINAL) {
    throw TagError.invalidValue(field, value, `must be an integer in [0, ${MAX_TAG_ORDINAL}]`);
  }
  return numeric;
}

/**
 * Serialize fields as an ID3v2.3 tag. Returns an empty array when no field is set.
 *
 * Text is ISO-8859-1 when every character fits, UTF-16 with a byte order mark
 * otherwise. No padding is written.
 */
export function renderId3v2Tag(fields: Readonly<TagFields>): Uint8Array {
  const frames: Uint8Array[] = [];
  for (const [field, frameId] of FRAME_IDS) {
    const value = fields[field];
    if (value === undefined) continue;
    const text = String(value);
    frames.push(frameId === "COMM" ? commentFrame(text) : textFrame(frameId, text));
  }
  if (frames.length === 0) return new Uint8Array(0);

  const bodySize = frames.reduce((sum, frame) => sum + frame.length, 0);
  if (bodySize > MAX_TAG_SIZE) {
    throw TagError.invalidValue("tag", bodySize, `must not exceed ${MAX_TAG_SIZE} bytes`);
  }

  const output = new Uint8Array(ID3V2_HEADER_SIZE + bodySize);
  output.set([0x49, 0x44, 0x33, 0x03, 0x00, 0x00], 0); // "ID3", v2.3.0, no flags
  output[6] = (bodySize >> 21) & 0x7f;
  output[7] = (bodySize >> 14) & 0x7f;
  output[8] = (bodySize >> 7) & 0x7f;
  output[9] = bodySize & 0x7f;

  let offset = ID3V2_HEADER_SIZE;
  for (const frame of frames) {
    output.set(frame, offset);
    offset += frame.length;
  }
  return output;
}

function textFrame(frameId: string, text: string): Uint8Array {
  const { encoding, bytes } = encodeText(text);
  return frame(frameId, [Uint8Array.of(encoding), bytes]);
}

/** COMM: encoding, language, empty description, text. */
function commentFrame(text: string): Uint8Array {
  const { encoding, bytes } = encodeText(text);
  const language = Uint8Array.of(0x65, 0x6e, 0x67); // "eng"
  const description =
    encoding === ENCODING_UTF16 ? Uint8Array.of(0xff, 0xfe, 0x00, 0x00) : Uint8Array.of(0x00);
  return frame("COMM", [Uint8Array.of(encoding), language, description, bytes]);
}

function frame(frameId: string, parts: readonly Uint8Array[]): Uint8Array {
  const size = parts.reduce((sum, part) => sum + part.length, 0);
  const output = new Uint8Array(FRAME_HEADER_SIZE + size);
  for (let i = 0; i < 4; i++) {
    output[i] = frameId.charCodeAt(i);
  }
  // Frame size is a plain big-endian integer in v2.3; flags stay zero.
  output[4] = (size >>> 24) & 0xff;
  output[5] = (size >>> 16) & 0xff;
  output[6] = (size >>> 8) & 0xff;
  output[7] = size & 0xff;

  let offset = FRAME_HEADER_SIZE;
  for (const part of parts) {
    output.set(part, offset);
    offset += part.length;
  }
  return output;
}

function encodeText(text: string): { encoding: number; bytes: Uint8Array } {
  let latin1 = true;
  for (let i = 0; i < text.length; i++) {
    if (text.charCodeAt(i) > 0xff) {
      latin1 = false;
      break;
    }
  }

  if (latin1) {
    const bytes = new Uint8Array(text.length);
    for (let i = 0; i < text.length; i++) {
      bytes[i] = text.charCodeAt(i);
    }
    return { encoding: ENCODING_LATIN1, bytes };
  }

  // UTF-16 little-endian behind a byte order mark.
  const bytes = new Uint8Array(2 + text.length * 2);
  bytes[0] = 0xff;
  bytes[1] = 0xfe;
  for (let i = 0; i < text.length; i++) {
    const unit = text.charCodeAt(i);
    bytes[2 + i * 2] = unit & 0xff;
    bytes[3 + i * 2] = unit >> 8;
  }
  return { encoding: ENCODING_UTF16, bytes };
}
