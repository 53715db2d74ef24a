import os from "node:os";
import { z } from "zod";
import { ENCODER_CONFIG } from "./encoderConfig.js";
import { ConfigError } from "./errors.js";
import type { ConversionConfig } from "./types.js";

// Blank strings count as unset so they never reach the metadata arguments
const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const configSchema = z.object({
  outputDir: z.string().trim().min(1, "output directory is required"),
  cover: optionalText,
  inputDir: optionalText,
  albumTitle: optionalText,
  albumArtist: optionalText,
  date: optionalText,
  concurrency: z.number().int().nonnegative().default(0),
  failurePolicy: z.enum(["fail-fast", "continue"]).default(ENCODER_CONFIG.DEFAULT_FAILURE_POLICY),
  timeoutMs: z.number().int().positive().optional(),
  dryRun: z.boolean().default(false),
  verbose: z.boolean().default(false),
});

export type ConversionConfigInput = z.input<typeof configSchema>;

/**
 * Validate raw settings and freeze them for the duration of a run.
 */
export function createConversionConfig(input: ConversionConfigInput): Readonly<ConversionConfig> {
  const result = configSchema.safeParse(input);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${details}`);
  }
  return Object.freeze(result.data);
}

/**
 * Worker count for a batch: the requested width, or every available CPU when it is 0,
 * never more than there are jobs (and never less than one).
 */
export function resolveConcurrency(requested: number, jobCount: number): number {
  const width = requested > 0 ? requested : os.availableParallelism();
  return Math.max(1, Math.min(width, jobCount));
}

// ─── Command-line values ────────────────────────────────────────────────

export function parseJobCount(input: string): number {
  const text = input.trim();
  if (!/^\d+$/.test(text)) {
    throw new Error(`expected a whole number of jobs, got "${input}"`);
  }
  return Number(text);
}

/** Seconds on the command line, milliseconds in the config. */
export function parseTimeoutSeconds(input: string): number {
  const seconds = Number(input);
  if (!input.trim() || !Number.isFinite(seconds) || seconds <= 0) {
    throw new Error(`expected a positive number of seconds, got "${input}"`);
  }
  return Math.round(seconds * 1000);
}
