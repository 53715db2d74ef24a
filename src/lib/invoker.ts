import type { Encoder, EncoderRun } from "./encoder.js";
import { EncodeError, SpawnError } from "./errors.js";
import type { Reporter } from "./report.js";
import type { Job, Outcome } from "./types.js";

export interface InvokeOptions {
  encoder: Encoder;
  reporter?: Reporter;
  verbose?: boolean;
}

/**
 * Run the encoder for one job. Never rejects: every problem becomes a failure outcome.
 */
export async function runJob(job: Job, options: InvokeOptions): Promise<Outcome> {
  const { encoder, reporter } = options;

  if (options.verbose) {
    reporter?.command([encoder.program, ...job.args]);
  }

  let result: EncoderRun;
  try {
    result = await encoder.run(job.args);
  } catch (err) {
    return { status: "failure", job, error: new SpawnError(encoder.program, job.args, err) };
  }

  if (result.exitCode === 0 && result.signal === null) {
    return { status: "success", job };
  }

  return {
    status: "failure",
    job,
    error: new EncodeError(
      encoder.program,
      job.args,
      result.exitCode,
      result.signal,
      result.stdout,
      result.stderr,
    ),
  };
}
