import fs from "node:fs";
import { inspectCover } from "./coverArt.js";
import { createProcessEncoder, type Encoder } from "./encoder.js";
import { ENCODER_CONFIG } from "./encoderConfig.js";
import { ConversionFailedError, DuplicateOutputError } from "./errors.js";
import { runJob } from "./invoker.js";
import { buildJob } from "./jobBuilder.js";
import { readManifest } from "./manifest.js";
import { runAll } from "./orchestrator.js";
import { reportBuildFailure, reportConversionFailure, type Reporter } from "./report.js";
import type {
  BuildFailure,
  ConversionConfig,
  ConversionSummary,
  FailureReport,
  Job,
  TrackRecord,
} from "./types.js";

export interface ConvertDeps {
  encoder?: Encoder;
  reporter?: Reporter;
}

// ─── Job collection ─────────────────────────────────────────────────────

export function collectJobs(
  config: ConversionConfig,
  records: readonly TrackRecord[],
): { jobs: Job[]; buildFailures: BuildFailure[] } {
  const jobs: Job[] = [];
  const buildFailures: BuildFailure[] = [];

  records.forEach((record, index) => {
    const result = buildJob(config, record, index);
    if (result.ok) jobs.push(result.job);
    else buildFailures.push(result.failure);
  });

  return { jobs, buildFailures };
}

/**
 * Two rows mapping to the same file would silently overwrite each other, so refuse to start.
 */
export function assertUniqueOutputs(jobs: readonly Job[]): void {
  const byOutput = new Map<string, string[]>();
  for (const job of jobs) {
    const sources = byOutput.get(job.outputPath);
    if (sources) sources.push(job.sourceFile);
    else byOutput.set(job.outputPath, [job.sourceFile]);
  }

  for (const [outputPath, sources] of byOutput) {
    if (sources.length > 1) throw new DuplicateOutputError(outputPath, sources);
  }
}

// ─── Conversion ─────────────────────────────────────────────────────────

/**
 * Convert every record. Problems with the run as a whole (cover, duplicate outputs,
 * output directory) throw; per-track problems are returned in the summary.
 */
export async function convertTracks(
  config: ConversionConfig,
  records: readonly TrackRecord[],
  deps: ConvertDeps = {},
): Promise<ConversionSummary> {
  const { reporter } = deps;

  if (config.cover) {
    const cover = await inspectCover(config.cover);
    if (config.verbose) {
      reporter?.info(`Cover: ${cover.path} (${cover.format} ${cover.width}x${cover.height})`);
    }
  }

  const { jobs, buildFailures } = collectJobs(config, records);
  assertUniqueOutputs(jobs);

  const summary: ConversionSummary = {
    total: records.length,
    converted: [],
    failures: [],
    skipped: 0,
  };

  // Fail-fast never spawns anything once a row is known to be unusable
  const [firstBuildFailure] = buildFailures;
  if (firstBuildFailure && config.failurePolicy === "fail-fast") {
    return finish(summary, [reportBuildFailure(firstBuildFailure)], jobs.length, reporter);
  }

  if (config.dryRun) {
    const program = deps.encoder?.program ?? ENCODER_CONFIG.PROGRAM;
    for (const job of jobs) reporter?.command([program, ...job.args]);
    const failures = buildFailures.map(reportBuildFailure);
    return finish(summary, failures, jobs.length, reporter);
  }

  await fs.promises.mkdir(config.outputDir, { recursive: true });

  const encoder = deps.encoder ?? createProcessEncoder({ timeoutMs: config.timeoutMs });
  const batch = await runAll(jobs, {
    concurrency: config.concurrency,
    policy: config.failurePolicy,
    invoke: (job) => runJob(job, { encoder, reporter, verbose: config.verbose }),
    onOutcome: (outcome) => {
      if (outcome.status === "success") {
        summary.converted.push(outcome.job.outputPath);
        reporter?.success(outcome.job.outputPath);
      }
    },
  });

  if (batch.ok) {
    return finish(summary, buildFailures.map(reportBuildFailure), 0, reporter);
  }

  // Build and run failures interleaved by manifest position
  const ordered = [
    ...buildFailures.map((f) => ({ index: f.index, report: reportBuildFailure(f) })),
    ...batch.failures.map((f) => ({
      index: f.job.index,
      report: reportConversionFailure(f, encoder.program),
    })),
  ].sort((a, b) => a.index - b.index);

  return finish(
    summary,
    ordered.map((entry) => entry.report),
    batch.skipped.length,
    reporter,
  );
}

function finish(
  summary: ConversionSummary,
  failures: FailureReport[],
  skipped: number,
  reporter: Reporter | undefined,
): ConversionSummary {
  summary.failures.push(...failures);
  summary.skipped = skipped;
  for (const failure of failures) reporter?.failure(failure);
  reporter?.summary(summary);
  return summary;
}

/**
 * Read the manifest and convert it. Resolves only when every track was converted.
 */
export async function convertManifest(
  manifestPath: string,
  config: ConversionConfig,
  deps: ConvertDeps = {},
): Promise<ConversionSummary> {
  const records = await readManifest(manifestPath);
  deps.reporter?.info(`Found ${records.length} tracks in ${manifestPath}.`);

  const summary = await convertTracks(config, records, deps);
  if (summary.failures.length > 0) {
    throw new ConversionFailedError(summary.failures);
  }
  return summary;
}
