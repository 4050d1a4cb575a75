/**
 * ID3 tag builder and serializer tests.
 */

import { describe, it, expect, vi } from "vitest";
import { TagError } from "./errors";
import { Id3TagBuilder, renderId3v2Tag, type TagTarget } from "./id3-tag";
import type { EncoderSessionState, TagFields } from "./types";

function target(state: EncoderSessionState = "configured") {
  const applyTag = vi.fn<[Readonly<TagFields>], void>();
  const stub: TagTarget = { state, applyTag };
  return { stub, applyTag };
}

function tagError(fn: () => unknown): TagError {
  try {
    fn();
  } catch (error) {
    if (error instanceof TagError) return error;
    throw error;
  }
  throw new Error("expected a TagError");
}

describe("renderId3v2Tag", () => {
  it("renders a lone track number", () => {
    expect(Array.from(renderId3v2Tag({ track: 1 }))).toEqual([
      0x49, 0x44, 0x33, 0x03, 0x00, 0x00, 0x00, 0x00, 0x00, 0x0c,
      0x54, 0x52, 0x43, 0x4b, 0x00, 0x00, 0x00, 0x02, 0x00, 0x00,
      0x00, 0x31,
    ]);
  });

  it("renders nothing when no field is set", () => {
    expect(renderId3v2Tag({}).length).toBe(0);
  });

  it("writes frames in a fixed order", () => {
    const tag = renderId3v2Tag({ track: 2, title: "A" });
    const frameId = (offset: number) => String.fromCharCode(...tag.subarray(offset, offset + 4));

    expect(frameId(10)).toBe("TIT2");
    expect(frameId(22)).toBe("TRCK");
  });

  it("falls back to UTF-16 with a byte order mark", () => {
    const tag = renderId3v2Tag({ title: "日" });

    expect(Array.from(tag.subarray(10))).toEqual([
      0x54, 0x49, 0x54, 0x32, 0x00, 0x00, 0x00, 0x05, 0x00, 0x00,
      0x01, 0xff, 0xfe, 0xe5, 0x65,
    ]);
  });

  it("keeps Latin-1 text single byte", () => {
    const tag = renderId3v2Tag({ artist: "Ü" });

    expect(Array.from(tag.subarray(20))).toEqual([0x00, 0xdc]);
  });

  it("writes comments with a language and an empty description", () => {
    const tag = renderId3v2Tag({ comment: "hi" });

    expect(Array.from(tag.subarray(10))).toEqual([
      0x43, 0x4f, 0x4d, 0x4d, 0x00, 0x00, 0x00, 0x07, 0x00, 0x00,
      0x00, 0x65, 0x6e, 0x67, 0x00, 0x68, 0x69,
    ]);
  });

  it("stores the tag size as a synchsafe integer", () => {
    // 10-byte frame header + encoding byte + 189 characters = 200 bytes.
    const tag = renderId3v2Tag({ title: "x".repeat(189) });

    expect(Array.from(tag.subarray(6, 10))).toEqual([0x00, 0x00, 0x01, 0x48]);
    expect(tag.length).toBe(210);
  });
});

describe("Id3TagBuilder", () => {
  it("keeps the last value written to a field", () => {
    const { stub } = target();
    const builder = new Id3TagBuilder(stub).title("First").title("Second");

    expect(builder.snapshot()).toEqual({ title: "Second" });
  });

  it("coerces year, track and genre", () => {
    const { stub } = target();
    const builder = new Id3TagBuilder(stub).year(2024).track("7").genre(17);

    expect(builder.snapshot()).toEqual({ year: "2024", track: 7, genre: "(17)" });
  });

  it("keeps genre names as given", () => {
    const { stub } = target();

    expect(new Id3TagBuilder(stub).genre("Field Recording").snapshot().genre).toBe(
      "Field Recording"
    );
  });

  it.each([256, -1, 1.5, "abc", ""])("rejects track %j", (track) => {
    const { stub } = target();
    const error = tagError(() => new Id3TagBuilder(stub).track(track));

    expect(error.code).toBe("InvalidValue");
    expect(error.field).toBe("track");
    expect(error.received).toBe(track);
  });

  it("names the limit when a track number is out of range", () => {
    const { stub } = target();

    expect(tagError(() => new Id3TagBuilder(stub).track(256)).message).toBe(
      "Invalid tag track: must be an integer in [0, 255] (received 256)"
    );
  });

  it("rejects a genre index above 255", () => {
    const { stub } = target();

    expect(tagError(() => new Id3TagBuilder(stub).genre(300)).field).toBe("genre");
  });

  it("returns a frozen snapshot", () => {
    const { stub } = target();

    expect(Object.isFrozen(new Id3TagBuilder(stub).title("A").snapshot())).toBe(true);
  });

  it("commits a snapshot to a configured target", () => {
    const { stub, applyTag } = target();
    new Id3TagBuilder(stub).artist("Nobody").track(3).apply();

    expect(applyTag).toHaveBeenCalledTimes(1);
    expect(applyTag).toHaveBeenCalledWith({ artist: "Nobody", track: 3 });
  });

  it.each(["encoding", "flushed"] as const)(
    "refuses to commit once the target is %s",
    (state) => {
      const { stub, applyTag } = target(state);
      const error = tagError(() => new Id3TagBuilder(stub).title("Late").apply());

      expect(error.code).toBe("AlreadyFinalized");
      expect(applyTag).not.toHaveBeenCalled();
    }
  );
});
