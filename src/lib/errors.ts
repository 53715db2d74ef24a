import type { FailureReport } from "./types.js";

export class ManifestError extends Error {
  override readonly name = "ManifestError";

  constructor(
    message: string,
    /** 1-based data row, when the problem is tied to one. */
    readonly row?: number,
    options?: ErrorOptions,
  ) {
    super(row === undefined ? message : `row ${row}: ${message}`, options);
  }
}

export class ConfigError extends Error {
  override readonly name = "ConfigError";
}

export class CoverArtError extends Error {
  override readonly name = "CoverArtError";

  constructor(
    readonly coverPath: string,
    reason: string,
    options?: ErrorOptions,
  ) {
    super(`Unusable cover image ${coverPath}: ${reason}`, options);
  }
}

export class BuildError extends Error {
  override name = "BuildError";

  constructor(
    readonly file: string,
    message: string,
  ) {
    super(message);
  }
}

export class MissingArtistError extends BuildError {
  override name = "MissingArtistError";

  constructor(file: string) {
    super(file, `No artist for ${file}: the row has none and no album artist is set`);
  }
}

export class DuplicateOutputError extends Error {
  override readonly name = "DuplicateOutputError";

  constructor(
    readonly outputPath: string,
    readonly sourceFiles: readonly string[],
  ) {
    super(`${sourceFiles.join(", ")} would all be written to ${outputPath}`);
  }
}

export class SpawnError extends Error {
  override readonly name = "SpawnError";

  constructor(
    readonly program: string,
    readonly args: readonly string[],
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to execute ${program}: ${reason}`, { cause });
  }
}

export class EncodeError extends Error {
  override readonly name = "EncodeError";

  constructor(
    readonly program: string,
    readonly args: readonly string[],
    readonly exitCode: number | null,
    readonly signal: NodeJS.Signals | null,
    readonly stdout: Buffer,
    readonly stderr: Buffer,
  ) {
    super(
      signal
        ? `${program} was terminated by ${signal}`
        : `${program} exited with status ${exitCode ?? "unknown"}`,
    );
  }
}

export class ConversionFailedError extends Error {
  override readonly name = "ConversionFailedError";

  constructor(readonly failures: readonly FailureReport[]) {
    super(describeFailures(failures));
  }
}

function describeFailures(failures: readonly FailureReport[]): string {
  const [first] = failures;
  if (!first) return "Conversion failed";

  const target = first.outputPath ?? "an output file";
  const head = `Failed to convert ${first.sourceFile} into ${target}`;
  return failures.length > 1 ? `${head} (and ${failures.length - 1} more)` : head;
}
