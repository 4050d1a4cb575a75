/**
 * lamejs codec tests.
 *
 * The `LameCodec` unit tests run against a stub module; the integration tests
 * at the bottom load the real lamejs package and encode actual frames.
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { concatBytes } from "./audio-utils";
import { encodeToMp3 } from "./encode-mp3";
import { buildEncoderConfig } from "./encoder-config";
import { createEncoderSession } from "./encoder-session";
import { InputError } from "./errors";
import { renderId3v2Tag } from "./id3-tag";
import { LameCodec, getCodecUrl, getCodecVersion, lameBitrateFor } from "./lame-codec";
import { loadLameJs, type LameMp3Encoder } from "./load-lamejs";
import type { EncoderOptions, PcmInput } from "./types";

class StubEncoder implements LameMp3Encoder {
  static created: number[][] = [];
  readonly buffers: Array<[Int16Array, Int16Array | undefined]> = [];

  constructor(channels: number, sampleRate: number, kbps: number) {
    StubEncoder.created.push([channels, sampleRate, kbps]);
  }

  encodeBuffer(left: Int16Array, right?: Int16Array): Int8Array {
    this.buffers.push([left, right]);
    return Int8Array.of(1, 2);
  }

  flush(): Int8Array {
    return Int8Array.of(-1);
  }
}

function ramp(length: number, step: number): Int16Array {
  return Int16Array.from({ length }, (_, i) => ((i * step) % 4000) - 2000);
}

afterEach(() => {
  StubEncoder.created = [];
  vi.restoreAllMocks();
});

describe("lameBitrateFor", () => {
  it("uses the configured bitrate for CBR and ABR", () => {
    expect(lameBitrateFor(buildEncoderConfig({ bitrate: 192 }))).toBe(192);
    expect(lameBitrateFor(buildEncoderConfig({ vbrMode: "abr", bitrate: 96 }))).toBe(96);
  });

  it("maps VBR quality to a constant bitrate valid at the sample rate", () => {
    expect(lameBitrateFor(buildEncoderConfig({ vbrMode: "vbr" }))).toBe(160);
    expect(lameBitrateFor(buildEncoderConfig({ vbrMode: "vbr", vbrQuality: 0 }))).toBe(320);
    expect(
      lameBitrateFor(buildEncoderConfig({ sampleRate: 16000, vbrMode: "vbr", vbrQuality: 0 }))
    ).toBe(160);
    expect(
      lameBitrateFor(buildEncoderConfig({ sampleRate: 8000, vbrMode: "vbr", vbrQuality: 9 }))
    ).toBe(64);
  });
});

describe("LameCodec", () => {
  const codec = new LameCodec({ Mp3Encoder: StubEncoder });

  it("creates the encoder from the configuration", () => {
    codec.initialize(buildEncoderConfig({ sampleRate: 48000, channels: 2, bitrate: 256 }));

    expect(StubEncoder.created).toEqual([[2, 48000, 256]]);
  });

  it("warns that VBR is encoded at a constant bitrate", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    codec.initialize(buildEncoderConfig({ vbrMode: "vbr", vbrQuality: 4 }));

    expect(warn).toHaveBeenCalledWith(
      "[streaming-mp3-encoder] lamejs has no VBR mode; encoding VBR q4 at a constant 160 kbps"
    );
    expect(StubEncoder.created).toEqual([[1, 44100, 160]]);
  });

  it("does not warn for CBR", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    codec.initialize(buildEncoderConfig());

    expect(warn).not.toHaveBeenCalled();
  });

  it("passes both planes to the encoder", () => {
    const handle = codec.initialize(buildEncoderConfig({ channels: 2 }));
    const left = Int16Array.of(1);
    const right = Int16Array.of(2);

    expect(Array.from(handle.encodeFrame([left, right]))).toEqual([1, 2]);
    expect(Array.from(handle.finalize())).toEqual([-1]);
  });

  it("refuses to encode after destroy", () => {
    const handle = codec.initialize(buildEncoderConfig());
    handle.destroy();
    handle.destroy();

    expect(() => handle.encodeFrame([new Int16Array(1152)])).toThrow(
      "MP3 encoder has been released."
    );
  });

  it("warns that quality is ignored when it differs from the default", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    codec.initialize(buildEncoderConfig({ quality: 2 }));

    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith(
      "[streaming-mp3-encoder] lamejs has no quality setting; ignoring quality 2"
    );
  });

  it("reports the lamejs project", () => {
    expect(codec.url).toBe("https://github.com/zhuker/lamejs");
    expect(codec.version).toBe(getCodecVersion());
  });
});

describe("codec identity", () => {
  it("reports a lamejs version", () => {
    expect(getCodecVersion()).toMatch(/^lamejs \d+\.\d+\.\d+/);
  });

  it("reports the project URL", () => {
    expect(getCodecUrl()).toBe("https://github.com/zhuker/lamejs");
  });
});

describe("lamejs integration", () => {
  async function encodeAll(options: EncoderOptions, chunks: readonly PcmInput[]) {
    const session = await createEncoderSession(buildEncoderConfig(options));
    try {
      const output = chunks.map((chunk) => session.encode(chunk));
      output.push(session.flush());
      return concatBytes(output);
    } finally {
      session.close();
    }
  }

  it("encodes one frame of mono silence", async () => {
    const output = await encodeAll(
      { sampleRate: 44100, channels: 1, bitrate: 128, quality: 5 },
      [{ shape: "mono", samples: new Int16Array(1152) }]
    );

    expect(output.length).toBeGreaterThan(0);
    expect(output[0]).toBe(0xff);
  });

  it("constructs the real lamejs encoder", async () => {
    const lamejs = await loadLameJs();
    const encoder = new lamejs.Mp3Encoder(1, 44100, 128);

    expect(encoder.encodeBuffer(new Int16Array(1152))).toBeInstanceOf(Int8Array);
    expect(encoder.flush().length).toBeGreaterThan(0);
  });

  it("encodes at an MPEG-2 sample rate with 576-sample frames", async () => {
    const config = buildEncoderConfig({ sampleRate: 16000, channels: 2, bitrate: 64 });
    expect(config.frameSize).toBe(576);

    const session = await createEncoderSession(config);
    const head = session.encodeStereo(ramp(1500, 7), ramp(1500, 13));
    expect(session.bufferedSamples).toBe(348);
    const output = concatBytes([head, session.flush()]);

    expect(output.length).toBeGreaterThan(0);
    expect(output[0]).toBe(0xff);
  });

  it("flushes a session with no input", async () => {
    const session = await createEncoderSession(buildEncoderConfig());

    expect(() => session.flush()).not.toThrow();
    expect(session.state).toBe("flushed");
  });

  it("produces identical bytes from every stereo shape", async () => {
    const left = ramp(2500, 7);
    const right = ramp(2500, 13);
    const interleaved = new Int16Array(5000);
    const bytes = new Uint8Array(10000);
    const view = new DataView(bytes.buffer);
    for (let i = 0; i < 2500; i++) {
      interleaved[i * 2] = left[i];
      interleaved[i * 2 + 1] = right[i];
      view.setInt16(i * 4, left[i], true);
      view.setInt16(i * 4 + 2, right[i], true);
    }
    const options = { sampleRate: 48000, channels: 2, bitrate: 192 };

    const planar = await encodeAll(options, [{ shape: "planar", left, right }]);
    const plainNumbers = await encodeAll(options, [
      { shape: "planar", left: Array.from(left), right: Array.from(right) },
    ]);
    const mixed = await encodeAll(options, [{ shape: "interleaved", samples: interleaved }]);
    const raw = await encodeAll(options, [{ shape: "bytes", data: bytes }]);

    expect(planar.length).toBeGreaterThan(0);
    expect(plainNumbers).toEqual(planar);
    expect(mixed).toEqual(planar);
    expect(raw).toEqual(planar);
  });

  it("does not depend on chunk boundaries", async () => {
    const samples = ramp(4000, 11);
    const options = { sampleRate: 22050, bitrate: 64 };

    const whole = await encodeAll(options, [{ shape: "mono", samples }]);
    const split = await encodeAll(options, [
      { shape: "mono", samples: samples.subarray(0, 333) },
      { shape: "mono", samples: samples.subarray(333, 1500) },
      { shape: "mono", samples: samples.subarray(1500, 1501) },
      { shape: "mono", samples: samples.subarray(1501) },
    ]);

    expect(split).toEqual(whole);
  });

  it("writes the ID3 tag ahead of the first frame", async () => {
    const output = await encodeToMp3(
      { shape: "mono", samples: new Int16Array(1152) },
      { bitrate: 128 },
      { track: 1 }
    );
    const tag = renderId3v2Tag({ track: 1 });

    expect(String.fromCharCode(...output.subarray(0, 3))).toBe("ID3");
    expect(Array.from(output.subarray(0, tag.length))).toEqual(Array.from(tag));
    expect(output[tag.length]).toBe(0xff);
  });

  it("rejects stereo channels of different lengths", async () => {
    const session = await createEncoderSession(buildEncoderConfig({ channels: 2 }));
    try {
      expect(() => session.encodeStereo(new Int16Array(1152), new Int16Array(1000))).toThrow(
        InputError
      );
      expect(session.state).toBe("configured");
    } finally {
      session.close();
    }
  });

  it("exposes the codec identity on the session", async () => {
    const session = await createEncoderSession(buildEncoderConfig());
    session.close();

    expect(session.codecVersion).toBe(getCodecVersion());
    expect(session.codecUrl).toBe("https://github.com/zhuker/lamejs");
  });
});
