#!/usr/bin/env node
import { buildApplication, buildCommand, run } from "@stricli/core";
import type { CommandContext } from "@stricli/core";
import {
  createConversionConfig,
  parseJobCount,
  parseTimeoutSeconds,
} from "../src/lib/conversionConfig.js";
import { convertManifest } from "../src/lib/convertTracks.js";
import { createConsoleReporter } from "../src/lib/report.js";

// ─── Flags ──────────────────────────────────────────────────────────────

interface ConvertFlags {
  cover?: string;
  "input-dir"?: string;
  "album-title"?: string;
  "album-artist"?: string;
  date?: string;
  jobs?: number;
  timeout?: number;
  "continue-on-error": boolean;
  "dry-run": boolean;
  verbose: boolean;
}

// Set by the command; stricli's own exit code only covers argument errors
let conversionFailed = false;

// ─── Command ────────────────────────────────────────────────────────────

const convertCommand = buildCommand({
  docs: {
    brief: "Convert the tracks listed in a CSV manifest into tagged FLAC files with ffmpeg",
  },
  parameters: {
    positional: {
      kind: "tuple",
      parameters: [
        {
          brief: "CSV file with columns: file, disc, track, title, artist",
          parse: String,
          placeholder: "manifest",
        },
        {
          brief: "Directory to write output files",
          parse: String,
          placeholder: "output-dir",
        },
      ],
    },
    flags: {
      cover: {
        kind: "parsed",
        brief: "Cover art file (jpg or png image)",
        parse: String,
        optional: true,
      },
      "input-dir": {
        kind: "parsed",
        brief: "Directory that input files are located in",
        parse: String,
        optional: true,
      },
      "album-title": {
        kind: "parsed",
        brief: "Album title tag",
        parse: String,
        optional: true,
      },
      "album-artist": {
        kind: "parsed",
        brief: "Album artist tag, also used for rows without an artist",
        parse: String,
        optional: true,
      },
      date: {
        kind: "parsed",
        brief: "Release date tag",
        parse: String,
        optional: true,
      },
      jobs: {
        kind: "parsed",
        brief: "Tracks to convert in parallel (0 = one per CPU)",
        parse: parseJobCount,
        optional: true,
      },
      timeout: {
        kind: "parsed",
        brief: "Stop a single conversion after this many seconds",
        parse: parseTimeoutSeconds,
        optional: true,
      },
      "continue-on-error": {
        kind: "boolean",
        brief: "Keep converting after a track fails and report every failure at the end",
        default: false,
      },
      "dry-run": {
        kind: "boolean",
        brief: "Print the ffmpeg commands without running them",
        default: false,
      },
      verbose: {
        kind: "boolean",
        brief: "Print each ffmpeg command before running it",
        default: false,
      },
    },
    aliases: {
      c: "cover",
      d: "input-dir",
      t: "album-title",
      a: "album-artist",
      y: "date",
      j: "jobs",
      v: "verbose",
    },
  },
  async func(
    this: CommandContext,
    flags: ConvertFlags,
    manifestPath: string,
    outputDir: string,
  ): Promise<void> {
    const reporter = createConsoleReporter();

    try {
      const config = createConversionConfig({
        outputDir,
        cover: flags.cover,
        inputDir: flags["input-dir"],
        albumTitle: flags["album-title"],
        albumArtist: flags["album-artist"],
        date: flags.date,
        concurrency: flags.jobs ?? 0,
        failurePolicy: flags["continue-on-error"] ? "continue" : "fail-fast",
        timeoutMs: flags.timeout,
        dryRun: flags["dry-run"],
        verbose: flags.verbose,
      });

      if (config.verbose) {
        reporter.info(`Manifest: ${manifestPath}`);
        reporter.info(`Output:   ${config.outputDir}`);
        reporter.info(`Policy:   ${config.failurePolicy}`);
      }

      await convertManifest(manifestPath, config, { reporter });
      reporter.info("\nDone!");
    } catch (e) {
      console.error(`\nError: ${e instanceof Error ? e.message : String(e)}`);
      conversionFailed = true;
    }
  },
});

const app = buildApplication(convertCommand, {
  name: "album-transcoder",
});

await run(app, process.argv.slice(2), { process });
if (conversionFailed) process.exitCode = 1;
