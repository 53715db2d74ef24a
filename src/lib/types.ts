import type { BuildError, EncodeError, SpawnError } from "./errors.js";

export type FailurePolicy = "fail-fast" | "continue";

export interface ConversionConfig {
  outputDir: string;
  cover?: string;
  inputDir?: string;
  albumTitle?: string;
  albumArtist?: string;
  date?: string;
  /** Worker count; 0 means one worker per available CPU. */
  concurrency: number;
  failurePolicy: FailurePolicy;
  /** Per-job limit in milliseconds. Unset means no limit. */
  timeoutMs?: number;
  dryRun: boolean;
  verbose: boolean;
}

export interface TrackRecord {
  file: string;
  disc?: number;
  track?: number;
  title: string;
  artist?: string;
}

export interface Job {
  /** Position of the source row in the manifest (0-based). */
  readonly index: number;
  readonly sourceFile: string;
  readonly inputPath: string;
  readonly outputPath: string;
  readonly args: readonly string[];
}

export type BuildResult =
  | { ok: true; job: Job }
  | { ok: false; failure: BuildFailure };

export interface BuildFailure {
  readonly index: number;
  readonly record: TrackRecord;
  readonly error: BuildError;
}

export interface ConversionSuccess {
  readonly status: "success";
  readonly job: Job;
}

export interface ConversionFailure {
  readonly status: "failure";
  readonly job: Job;
  readonly error: SpawnError | EncodeError;
}

export type Outcome = ConversionSuccess | ConversionFailure;

export type BatchResult =
  | { ok: true; outcomes: ConversionSuccess[] }
  | {
      ok: false;
      /** Failures to report, ordered by manifest index. Fail-fast keeps only the first. */
      failures: ConversionFailure[];
      outcomes: Outcome[];
      skipped: Job[];
    };

/** What the reporter receives for every failed record. */
export interface FailureReport {
  sourceFile: string;
  outputPath: string | null;
  command: readonly string[];
  stdout: string;
  stderr: string;
  message: string;
}

export interface ConversionSummary {
  total: number;
  converted: string[];
  failures: FailureReport[];
  skipped: number;
}
