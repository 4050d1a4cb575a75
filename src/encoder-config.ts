/**
 * Encoder configuration: an options struct, one validating constructor, and a
 * chained builder over it.
 *
 * Validation is deferred to `build()` because some rules span fields (a VBR
 * quality is only checked under a VBR mode; the valid bitrates depend on the
 * sample rate).
 *
 * Called by:
 * - `createEncoderSession()` callers, which pass the resulting configuration
 * - `encodeToMp3()` in `./encode-mp3.ts` when given plain options
 *
 * @module streaming-mp3-encoder/encoder-config
 */

import { z } from "zod";
import {
  DEFAULTS,
  MAX_QUALITY,
  MIN_QUALITY,
  SUPPORTED_SAMPLE_RATES,
  bitratesForSampleRate,
  frameSizeForSampleRate,
} from "./constants";
import { ConfigurationError } from "./errors";
import type { EncoderConfiguration, EncoderOptions, VbrMode } from "./types";

const ordinal = z
  .number({ invalid_type_error: "must be a number" })
  .int("must be an integer")
  .min(MIN_QUALITY, `must be in [${MIN_QUALITY}, ${MAX_QUALITY}]`)
  .max(MAX_QUALITY, `must be in [${MIN_QUALITY}, ${MAX_QUALITY}]`);

const encoderOptionsSchema = z
  .object({
    sampleRate: z
      .number({ invalid_type_error: "must be a number" })
      .refine((rate) => SUPPORTED_SAMPLE_RATES.includes(rate), {
        message: `must be one of ${SUPPORTED_SAMPLE_RATES.join(", ")} Hz`,
      }),
    channels: z.union([z.literal(1), z.literal(2)], {
      errorMap: () => ({ message: "must be 1 (mono) or 2 (stereo)" }),
    }),
    bitrate: z.number({ invalid_type_error: "must be a number" }),
    quality: ordinal,
    vbrMode: z.enum(["off", "vbr", "abr"], {
      errorMap: () => ({ message: 'must be "off", "vbr" or "abr"' }),
    }),
    vbrQuality: z.number({ invalid_type_error: "must be a number" }),
    rateControl: z.enum(["bitrate", "vbr"], {
      errorMap: () => ({ message: 'must be "bitrate" or "vbr"' }),
    }),
  })
  .superRefine((options, ctx) => {
    const bitrateMatters = options.rateControl === "bitrate" || options.vbrMode === "abr";
    if (bitrateMatters) {
      const allowed = bitratesForSampleRate(options.sampleRate);
      if (!allowed.includes(options.bitrate)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["bitrate"],
          message: `must be one of ${allowed.join(", ")} kbps at ${options.sampleRate} Hz`,
        });
      }
    }

    // vbrQuality is kept but unused while VBR is off.
    if (options.vbrMode === "off") {
      if (options.rateControl === "vbr") {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["rateControl"],
          message: 'cannot be "vbr" while vbrMode is "off"',
        });
      }
    } else {
      const result = ordinal.safeParse(options.vbrQuality);
      if (!result.success) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["vbrQuality"],
          message: result.error.issues[0]?.message ?? "is invalid",
        });
      }
    }
  });

/**
 * Validate `options` and produce a frozen configuration.
 *
 * @throws {ConfigurationError} naming the first offending field and its value
 */
export function buildEncoderConfig(options: EncoderOptions = {}): EncoderConfiguration {
  const vbrMode = options.vbrMode ?? DEFAULTS.VBR_MODE;
  const candidate = {
    sampleRate: options.sampleRate ?? DEFAULTS.SAMPLE_RATE,
    channels: options.channels ?? DEFAULTS.CHANNELS,
    bitrate: options.bitrate ?? DEFAULTS.BITRATE,
    quality: options.quality ?? DEFAULTS.QUALITY,
    vbrMode,
    vbrQuality: options.vbrQuality ?? DEFAULTS.VBR_QUALITY,
    rateControl: options.rateControl ?? (vbrMode === "off" ? "bitrate" : "vbr"),
  };

  const result = encoderOptionsSchema.safeParse(candidate);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = typeof issue?.path[0] === "string" ? issue.path[0] : "options";
    const received: unknown = new Map<string, unknown>(Object.entries(candidate)).get(field);
    throw new ConfigurationError(field, received, issue?.message ?? "is invalid");
  }

  const valid = result.data;
  const config: EncoderConfiguration = {
    sampleRate: valid.sampleRate,
    channels: valid.channels,
    bitrate: valid.bitrate,
    quality: valid.quality,
    vbrMode: valid.vbrMode,
    vbrQuality: valid.vbrQuality,
    rateControl: valid.rateControl,
    frameSize: frameSizeForSampleRate(valid.sampleRate),
  };
  return Object.freeze(config);
}

/**
 * Chained configuration builder.
 *
 * Setters only record values. The most recent of `bitrate()` / `vbrMode()`
 * decides `rateControl`; the other value is kept for inspection.
 *
 * @example
 * ```ts
 * const config = new EncoderConfigBuilder()
 *   .sampleRate(48000)
 *   .channels(2)
 *   .bitrate(192)
 *   .quality(QUALITY.HIGH)
 *   .build();
 * ```
 */
export class EncoderConfigBuilder {
  private readonly options: EncoderOptions = {};

  sampleRate(rate: number): this {
    this.options.sampleRate = rate;
    return this;
  }

  channels(count: number): this {
    this.options.channels = count;
    return this;
  }

  bitrate(kbps: number): this {
    this.options.bitrate = kbps;
    this.options.rateControl = "bitrate";
    return this;
  }

  quality(level: number): this {
    this.options.quality = level;
    return this;
  }

  vbrMode(mode: VbrMode): this {
    this.options.vbrMode = mode;
    this.options.rateControl = mode === "off" ? "bitrate" : "vbr";
    return this;
  }

  vbrQuality(level: number): this {
    this.options.vbrQuality = level;
    return this;
  }

  /** Copy of the values recorded so far. */
  peek(): Readonly<EncoderOptions> {
    return { ...this.options };
  }

  /**
   * Validate and produce the configuration. Leaves the builder untouched, so a
   * failed build can be corrected and retried.
   *
   * @throws {ConfigurationError}
   */
  build(): EncoderConfiguration {
    return buildEncoderConfig({ ...this.options });
  }
}

/** Rate control in effect, accounting for `"abr"` targeting the bitrate. */
export function describeRateControl(config: EncoderConfiguration): string {
  if (config.rateControl === "bitrate") return `CBR ${config.bitrate} kbps`;
  if (config.vbrMode === "abr") return `ABR ~${config.bitrate} kbps`;
  return `VBR q${config.vbrQuality}`;
}
