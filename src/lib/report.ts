import { EncodeError } from "./errors.js";
import type { BuildFailure, ConversionFailure, ConversionSummary, FailureReport } from "./types.js";

/**
 * Receives everything a run has to say. The core only hands over structured values;
 * how they are rendered is up to the implementation.
 */
export interface Reporter {
  info(message: string): void;
  command(command: readonly string[]): void;
  success(outputPath: string): void;
  failure(report: FailureReport): void;
  summary(summary: ConversionSummary): void;
}

// Characters that need quoting before a command line can be pasted into a POSIX shell
const SHELL_SPECIAL = /[^\w@%+=:,./-]/;

export function quoteArg(arg: string): string {
  if (arg === "") return "''";
  if (!SHELL_SPECIAL.test(arg)) return arg;
  return `'${arg.replaceAll("'", `'\\''`)}'`;
}

export function formatCommand(command: readonly string[]): string {
  return command.map(quoteArg).join(" ");
}

export function reportConversionFailure(failure: ConversionFailure, program: string): FailureReport {
  const { job, error } = failure;
  const encoded = error instanceof EncodeError;
  return {
    sourceFile: job.sourceFile,
    outputPath: job.outputPath,
    command: [program, ...job.args],
    stdout: encoded ? error.stdout.toString("utf-8") : "",
    stderr: encoded ? error.stderr.toString("utf-8") : "",
    message: error.message,
  };
}

export function reportBuildFailure(failure: BuildFailure): FailureReport {
  return {
    sourceFile: failure.record.file,
    outputPath: null,
    command: [],
    stdout: "",
    stderr: "",
    message: failure.error.message,
  };
}

/**
 * Terminal rendering of a run: one line per converted track, a full diagnostic block per failure.
 */
export function createConsoleReporter(): Reporter {
  return {
    info(message) {
      console.log(message);
    },
    command(command) {
      console.log(`+ ${formatCommand(command)}`);
    },
    success(outputPath) {
      console.log(`OK: ${outputPath}`);
    },
    failure(report) {
      console.log(formatFailure(report));
    },
    summary(summary) {
      console.log(formatSummary(summary));
    },
  };
}

export function formatFailure(report: FailureReport): string {
  const lines = [`\nFAILED: ${report.sourceFile}`, report.message];
  if (report.outputPath) lines.push(`output: ${report.outputPath}`);
  if (report.command.length > 0) lines.push(`command: ${formatCommand(report.command)}`);
  if (report.stdout) lines.push("\nstandard output:", report.stdout.trimEnd());
  if (report.stderr) lines.push("\nstandard error:", report.stderr.trimEnd());
  return lines.join("\n");
}

export function formatSummary(summary: ConversionSummary): string {
  const lines = [`\nConverted ${summary.converted.length}/${summary.total} tracks`];
  if (summary.failures.length > 0) lines.push(`Failed: ${summary.failures.length}`);
  if (summary.skipped > 0) lines.push(`Not started: ${summary.skipped}`);
  return lines.join("\n");
}
