/**
 * LameJS loader.
 *
 * The `lamejs` package ships CommonJS source that reads and writes several
 * module-level names as undeclared globals (e.g. `gfp.mode = MPEGMode.NOT_SET`
 * inside `Lame.js`). Without them, constructing an `Mp3Encoder` throws.
 *
 * We bind `MPEGMode`, `Lame` and `BitStream` to their real modules on
 * `globalThis` and pre-create the remaining assignment targets before
 * importing, then resolve the exported module shape (`named`, `default`, or
 * `module.exports`) into a stable encoder API.
 *
 * Called by:
 * - `loadLameCodec()` in `./lame-codec.ts`
 *
 * @module streaming-mp3-encoder/load-lamejs
 */

import { createRequire } from "node:module";

/**
 * Shape of a lamejs Mp3Encoder instance.
 *
 * For mono encoders lamejs ignores `right` and encodes `left` alone.
 */
export interface LameMp3Encoder {
  encodeBuffer(left: Int16Array, right?: Int16Array): Int8Array;
  flush(): Int8Array;
}

/**
 * Normalized module shape for the lamejs library.
 */
export interface LameJsModule {
  Mp3Encoder: new (
    channels: number,
    sampleRate: number,
    kbps: number
  ) => LameMp3Encoder;
}

/**
 * Globals lamejs reads at run time, bound to the modules that define them.
 */
const LAMEJS_GLOBAL_MODULES = [
  ["MPEGMode", "lamejs/src/js/MPEGMode.js"],
  ["Lame", "lamejs/src/js/Lame.js"],
  ["BitStream", "lamejs/src/js/BitStream.js"],
] as const;

/**
 * Undeclared assignment targets used internally by lamejs's CJS source.
 */
const LAMEJS_GLOBAL_SHIMS = [
  "Presets",
  "GainAnalysis",
  "QuantizePVT",
  "Quantize",
  "Takehiro",
  "Reservoir",
] as const;

/**
 * Bind the globals lamejs's CJS source uses without declaring.
 * Must be called before `import("lamejs")`.
 */
function installLameJsGlobals(): void {
  const require = createRequire(import.meta.url);
  for (const [key, specifier] of LAMEJS_GLOBAL_MODULES) {
    if (Reflect.get(globalThis, key) === undefined) {
      const loaded: unknown = require(specifier);
      Reflect.set(globalThis, key, loaded);
    }
  }
  for (const key of LAMEJS_GLOBAL_SHIMS) {
    if (!(key in globalThis)) {
      Reflect.set(globalThis, key, undefined);
    }
  }
}

function readProperty(value: unknown, key: string): unknown {
  if (typeof value === "object" && value !== null && key in value) {
    return Reflect.get(value, key);
  }
  return undefined;
}

function isLameJsModule(candidate: unknown): candidate is LameJsModule {
  return typeof readProperty(candidate, "Mp3Encoder") === "function";
}

let loading: Promise<LameJsModule> | null = null;

/**
 * Dynamically import lamejs and normalize its export shape.
 *
 * Tries three export shapes in order: named exports, default export, and
 * CJS `module.exports`. Returns the first one that contains `Mp3Encoder`.
 * The module is resolved once per process; a failed load is retried on the
 * next call.
 *
 * @throws {Error} If no valid export shape is found ("Failed to load MP3 encoder.")
 */
export function loadLameJs(): Promise<LameJsModule> {
  if (!loading) {
    loading = importLameJs().catch((error: unknown) => {
      loading = null;
      throw error;
    });
  }
  return loading;
}

async function importLameJs(): Promise<LameJsModule> {
  installLameJsGlobals();

  const imported: unknown = await import("lamejs");
  const candidates = [
    imported,
    readProperty(imported, "default"),
    readProperty(imported, "module.exports"),
  ];

  for (const candidate of candidates) {
    if (isLameJsModule(candidate)) {
      return candidate;
    }
  }

  throw new Error("Failed to load MP3 encoder.");
}
