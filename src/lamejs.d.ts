/**
 * Type declarations for the `lamejs` package.
 *
 * lamejs ships without TypeScript types. This ambient module declaration
 * covers the subset of the API the codec backend uses (Mp3Encoder).
 *
 * The runtime loading logic lives in `./load-lamejs.ts`, which also defines a
 * `LameMp3Encoder` interface mirroring these types for the normalized module
 * shape.
 */
declare module "lamejs" {
  class Mp3Encoder {
    constructor(channels: number, sampleRate: number, kbps: number);
    encodeBuffer(left: Int16Array, right?: Int16Array): Int8Array;
    flush(): Int8Array;
  }
  export { Mp3Encoder };
}
