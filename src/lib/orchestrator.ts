import { resolveConcurrency } from "./conversionConfig.js";
import type {
  BatchResult,
  ConversionFailure,
  ConversionSuccess,
  FailurePolicy,
  Job,
  Outcome,
} from "./types.js";

export interface RunAllOptions {
  /** Worker count; 0 uses every available CPU. */
  concurrency: number;
  policy: FailurePolicy;
  invoke: (job: Job) => Promise<Outcome>;
  /** Called once per outcome, in completion order. */
  onOutcome?: (outcome: Outcome) => void;
}

/**
 * Run every job on a fixed set of workers, each taking the next undispatched job in
 * manifest order. Under "fail-fast" the first failure stops dispatch; jobs already
 * running are left to finish and the failure with the lowest manifest index is reported.
 */
export async function runAll(jobs: readonly Job[], options: RunAllOptions): Promise<BatchResult> {
  const outcomes: (Outcome | undefined)[] = new Array(jobs.length);
  let next = 0;
  let stopped = false;

  async function worker(): Promise<void> {
    while (!stopped && next < jobs.length) {
      const slot = next++;
      try {
        const outcome = await options.invoke(jobs[slot]);
        outcomes[slot] = outcome;
        options.onOutcome?.(outcome);
        if (outcome.status === "failure" && options.policy === "fail-fast") {
          stopped = true;
        }
      } catch (err) {
        // No other worker may dispatch once the batch is going to reject
        stopped = true;
        throw err;
      }
    }
  }

  if (jobs.length > 0) {
    const width = resolveConcurrency(options.concurrency, jobs.length);
    const settled = await Promise.allSettled(Array.from({ length: width }, () => worker()));
    for (const result of settled) {
      if (result.status === "rejected") throw result.reason;
    }
  }

  const finished: Outcome[] = [];
  const skipped: Job[] = [];
  jobs.forEach((job, slot) => {
    const outcome = outcomes[slot];
    if (outcome) finished.push(outcome);
    else skipped.push(job);
  });

  const failures = finished.filter((o): o is ConversionFailure => o.status === "failure");
  if (failures.length === 0 && skipped.length === 0) {
    return {
      ok: true,
      outcomes: finished.filter((o): o is ConversionSuccess => o.status === "success"),
    };
  }

  return {
    ok: false,
    failures: options.policy === "fail-fast" ? failures.slice(0, 1) : failures,
    outcomes: finished,
    skipped,
  };
}
