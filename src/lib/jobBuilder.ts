import path from "node:path";
import { ENCODER_CONFIG } from "./encoderConfig.js";
import { MissingArtistError } from "./errors.js";
import { outputFilename } from "./filename.js";
import type { BuildResult, ConversionConfig, Job, TrackRecord } from "./types.js";

type MetadataField = [key: string, value: string | number | undefined];

/**
 * Artist used for tags and the file name: the row's own, else the album artist.
 */
export function effectiveArtist(config: ConversionConfig, record: TrackRecord): string | null {
  if (record.artist) return record.artist;
  if (config.albumArtist) return config.albumArtist;
  return null;
}

export function resolveInputPath(config: ConversionConfig, record: TrackRecord): string {
  return config.inputDir ? path.join(config.inputDir, record.file) : record.file;
}

/**
 * Turn one manifest row into an immutable conversion job.
 * Only the artist is validated here; missing input files surface when the encoder runs.
 */
export function buildJob(config: ConversionConfig, record: TrackRecord, index: number): BuildResult {
  const artist = effectiveArtist(config, record);
  if (artist === null) {
    return { ok: false, failure: { index, record, error: new MissingArtistError(record.file) } };
  }

  const inputPath = resolveInputPath(config, record);
  const outputPath = path.join(
    config.outputDir,
    outputFilename(artist, record.title, record.disc, record.track),
  );

  const job: Job = {
    index,
    sourceFile: record.file,
    inputPath,
    outputPath,
    args: Object.freeze(encoderArgs(config, record, artist, inputPath, outputPath)),
  };
  return { ok: true, job: Object.freeze(job) };
}

/**
 * Build the ffmpeg argument list for one track.
 */
export function encoderArgs(
  config: ConversionConfig,
  record: TrackRecord,
  artist: string,
  inputPath: string,
  outputPath: string,
): string[] {
  const args = ["-hide_banner", "-nostdin", "-i", inputPath];

  if (config.cover) {
    args.push("-i", config.cover, "-map", "0:a", "-map", "1:v");
  } else {
    args.push("-map", "0:a");
  }

  const metadata: MetadataField[] = [
    ["title", record.title],
    ["artist", artist],
    ["album", config.albumTitle],
    ["album_artist", config.albumArtist],
    ["date", config.date],
    ["disc", record.disc],
    ["track", record.track],
  ];
  for (const [key, value] of metadata) {
    if (value === undefined || value === "") continue;
    args.push("-metadata", `${key}=${value}`);
  }

  if (config.cover) {
    args.push(
      "-c:v",
      "copy",
      "-disposition:v",
      "attached_pic",
      "-metadata:s:v",
      `comment=${ENCODER_CONFIG.COVER_COMMENT}`,
    );
  }

  args.push("-c:a", ENCODER_CONFIG.AUDIO_CODEC, "-y", outputPath);
  return args;
}
