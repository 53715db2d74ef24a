import path from "node:path";
import { describe, expect, it } from "vitest";
import { MissingArtistError } from "./errors.js";
import { buildJob, effectiveArtist, resolveInputPath } from "./jobBuilder.js";
import type { ConversionConfig, Job, TrackRecord } from "./types.js";

const baseConfig: ConversionConfig = {
  outputDir: "out",
  concurrency: 0,
  failurePolicy: "fail-fast",
  dryRun: false,
  verbose: false,
};

function build(config: ConversionConfig, record: TrackRecord, index = 0): Job {
  const result = buildJob(config, record, index);
  if (!result.ok) throw result.failure.error;
  return result.job;
}

describe("buildJob", () => {
  it("builds the output path and encoder arguments for a plain track", () => {
    const job = build(baseConfig, {
      file: "a.wav",
      disc: 1,
      track: 1,
      title: "Song One",
      artist: "Artist",
    });

    expect(job.inputPath).toBe("a.wav");
    expect(job.outputPath).toBe(path.join("out", "1.01-Artist-Song One.flac"));
    expect(job.args).toEqual([
      "-hide_banner",
      "-nostdin",
      "-i",
      "a.wav",
      "-map",
      "0:a",
      "-metadata",
      "title=Song One",
      "-metadata",
      "artist=Artist",
      "-metadata",
      "disc=1",
      "-metadata",
      "track=1",
      "-c:a",
      "flac",
      "-y",
      path.join("out", "1.01-Artist-Song One.flac"),
    ]);
  });

  it("attaches the cover and album tags, keeping the original text in metadata", () => {
    const config: ConversionConfig = {
      ...baseConfig,
      inputDir: "src",
      cover: "cover.jpg",
      albumTitle: "Album",
      albumArtist: "Various",
      date: "2001",
    };
    const job = build(config, { file: "b.wav", title: "Jóga", artist: "Björk" }, 4);

    expect(job.index).toBe(4);
    expect(job.sourceFile).toBe("b.wav");
    expect(job.inputPath).toBe(path.join("src", "b.wav"));
    expect(job.outputPath).toBe(path.join("out", "Bjork-Joga.flac"));
    expect(job.args).toEqual([
      "-hide_banner",
      "-nostdin",
      "-i",
      path.join("src", "b.wav"),
      "-i",
      "cover.jpg",
      "-map",
      "0:a",
      "-map",
      "1:v",
      "-metadata",
      "title=Jóga",
      "-metadata",
      "artist=Björk",
      "-metadata",
      "album=Album",
      "-metadata",
      "album_artist=Various",
      "-metadata",
      "date=2001",
      "-c:v",
      "copy",
      "-disposition:v",
      "attached_pic",
      "-metadata:s:v",
      "comment=Cover (front)",
      "-c:a",
      "flac",
      "-y",
      path.join("out", "Bjork-Joga.flac"),
    ]);
  });

  it("falls back to the album artist", () => {
    const config = { ...baseConfig, albumArtist: "Various" };
    const job = build(config, { file: "c.wav", track: 3, title: "Intro" });

    expect(job.outputPath).toBe(path.join("out", "03-Various-Intro.flac"));
    expect(job.args).toContain("artist=Various");
    expect(job.args).toContain("album_artist=Various");
  });

  it("fails with MissingArtistError when no artist can be resolved", () => {
    const record = { file: "c.wav", title: "Intro" };
    const result = buildJob(baseConfig, record, 2);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.failure.index).toBe(2);
    expect(result.failure.record).toBe(record);
    expect(result.failure.error).toBeInstanceOf(MissingArtistError);
    expect(result.failure.error.file).toBe("c.wav");
  });

  it("never emits an empty metadata value", () => {
    const config = { ...baseConfig, albumTitle: "", date: "" };
    const job = build(config, { file: "d.wav", title: "Outro", artist: "Band" });

    expect(job.args.filter((arg) => /^[a-z_]+=$/.test(arg))).toEqual([]);
    expect(job.args.filter((arg) => arg === "-metadata")).toHaveLength(2);
  });

  it("keeps a track number of zero", () => {
    const job = build(baseConfig, { file: "e.wav", track: 0, title: "Hidden", artist: "Band" });

    expect(job.outputPath).toBe(path.join("out", "00-Band-Hidden.flac"));
    expect(job.args).toContain("track=0");
  });

  it("returns a frozen job", () => {
    const job = build(baseConfig, { file: "a.wav", title: "Song", artist: "Artist" });

    expect(Object.isFrozen(job)).toBe(true);
    expect(Object.isFrozen(job.args)).toBe(true);
  });
});

describe("effectiveArtist", () => {
  it("prefers the row artist over the album artist", () => {
    const config = { ...baseConfig, albumArtist: "Various" };
    expect(effectiveArtist(config, { file: "a.wav", title: "T", artist: "Solo" })).toBe("Solo");
  });

  it("treats an empty row artist as missing", () => {
    const config = { ...baseConfig, albumArtist: "Various" };
    expect(effectiveArtist(config, { file: "a.wav", title: "T", artist: "" })).toBe("Various");
    expect(effectiveArtist(baseConfig, { file: "a.wav", title: "T", artist: "" })).toBeNull();
  });
});

describe("resolveInputPath", () => {
  it("uses the file verbatim without an input directory", () => {
    expect(resolveInputPath(baseConfig, { file: "/abs/a.wav", title: "T" })).toBe("/abs/a.wav");
  });

  it("joins the file onto the input directory", () => {
    const config = { ...baseConfig, inputDir: "/music/raw" };
    expect(resolveInputPath(config, { file: "cd1/a.wav", title: "T" })).toBe("/music/raw/cd1/a.wav");
  });
});
