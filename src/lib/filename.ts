import { transliterate } from "transliteration";
import { ENCODER_CONFIG } from "./encoderConfig.js";

// Reserved on at least one common filesystem, plus ASCII control characters
const UNSAFE_FILENAME_CHARS = /[/\\:*?"<>|\u0000-\u001f\u007f]/g;

/**
 * Reduce a tag value to something safe inside a file name: closest ASCII spelling
 * (diacritics stripped, other scripts romanized), reserved characters replaced by "_".
 */
export function toFilenameSafe(text: string): string {
  const safe = transliterate(text).replace(UNSAFE_FILENAME_CHARS, "_");
  // Nothing survived transliteration
  return safe.trim() === "" ? "_" : safe;
}

/**
 * "1.03-" for disc 1 track 3, "1-" for a disc alone, "03-" for a track alone.
 */
export function trackPrefix(disc: number | undefined, track: number | undefined): string {
  if (disc !== undefined && track !== undefined) return `${disc}.${pad2(track)}-`;
  if (disc !== undefined) return `${disc}-`;
  if (track !== undefined) return `${pad2(track)}-`;
  return "";
}

export function outputFilename(
  artist: string,
  title: string,
  disc?: number,
  track?: number,
): string {
  const prefix = trackPrefix(disc, track);
  return `${prefix}${toFilenameSafe(artist)}-${toFilenameSafe(title)}${ENCODER_CONFIG.OUTPUT_EXTENSION}`;
}

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}
