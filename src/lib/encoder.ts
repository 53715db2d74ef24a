import { spawn } from "node:child_process";
import { ENCODER_CONFIG } from "./encoderConfig.js";

export interface EncoderRun {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: Buffer;
  stderr: Buffer;
}

/**
 * The external codec. `run` resolves once the process has exited and both output
 * streams are drained, and rejects only when the process could not be started.
 */
export interface Encoder {
  readonly program: string;
  run(args: readonly string[]): Promise<EncoderRun>;
}

export interface ProcessEncoderOptions {
  program?: string;
  /** Kill the process with SIGTERM after this many milliseconds. */
  timeoutMs?: number;
}

export function createProcessEncoder(options: ProcessEncoderOptions = {}): Encoder {
  const program = options.program ?? ENCODER_CONFIG.PROGRAM;

  return {
    program,
    run(args) {
      return new Promise<EncoderRun>((resolve, reject) => {
        const child = spawn(program, args, {
          stdio: ["ignore", "pipe", "pipe"],
          timeout: options.timeoutMs,
        });

        const stdout: Buffer[] = [];
        const stderr: Buffer[] = [];
        child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
        child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));

        let settled = false;
        child.once("error", (err) => {
          if (settled) return;
          settled = true;
          reject(err);
        });
        // "close" fires after the streams end, so the buffers are complete here
        child.once("close", (exitCode, signal) => {
          if (settled) return;
          settled = true;
          resolve({
            exitCode,
            signal,
            stdout: Buffer.concat(stdout),
            stderr: Buffer.concat(stderr),
          });
        });
      });
    },
  };
}
