import sharp from "sharp";
import { ENCODER_CONFIG } from "./encoderConfig.js";
import { CoverArtError } from "./errors.js";

export interface CoverInfo {
  path: string;
  format: string;
  width: number;
  height: number;
}

const SUPPORTED_FORMATS: readonly string[] = ENCODER_CONFIG.COVER_FORMATS;

/**
 * Check once, before any track is converted, that the cover can be attached:
 * a readable JPEG or PNG within the size limit.
 */
export async function inspectCover(coverPath: string): Promise<CoverInfo> {
  let metadata: sharp.Metadata;
  try {
    metadata = await sharp(coverPath).metadata();
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new CoverArtError(coverPath, reason, { cause: err });
  }

  const { format, width, height } = metadata;
  if (!format || !SUPPORTED_FORMATS.includes(format)) {
    throw new CoverArtError(
      coverPath,
      `${format ?? "unknown"} images are not supported (use ${SUPPORTED_FORMATS.join(" or ")})`,
    );
  }
  if (!width || !height) {
    throw new CoverArtError(coverPath, "image has no dimensions");
  }
  if (width > ENCODER_CONFIG.MAX_COVER_DIMENSION || height > ENCODER_CONFIG.MAX_COVER_DIMENSION) {
    throw new CoverArtError(coverPath, `image is too large (${width}x${height})`);
  }

  return { path: coverPath, format, width, height };
}
