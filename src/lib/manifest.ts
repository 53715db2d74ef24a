import fs from "node:fs";
import { parse } from "csv-parse/sync";
import { z } from "zod";
import { ManifestError } from "./errors.js";
import type { TrackRecord } from "./types.js";

const REQUIRED_COLUMNS = ["file", "title"] as const;
const MAX_UNSIGNED_32 = 4_294_967_295;

const unsignedInteger = (name: string) =>
  z
    .string()
    .optional()
    .refine(
      (value) => !value || (/^\d+$/.test(value) && Number(value) <= MAX_UNSIGNED_32),
      `${name} must be a whole number`,
    )
    .transform((value) => (value ? Number(value) : undefined));

const optionalText = z
  .string()
  .optional()
  .transform((value) => (value ? value : undefined));

const rowSchema = z.object({
  file: z.string({ required_error: "file is required" }).min(1, "file is required"),
  disc: unsignedInteger("disc"),
  track: unsignedInteger("track"),
  title: z.string({ required_error: "title is required" }).min(1, "title is required"),
  artist: optionalText,
});

function checkHeader(header: string[]): string[] {
  const columns = header.map((column) => column.trim().toLowerCase());
  const missing = REQUIRED_COLUMNS.filter((column) => !columns.includes(column));
  if (missing.length > 0) {
    throw new ManifestError(`header is missing column(s): ${missing.join(", ")}`);
  }
  return columns;
}

/**
 * Parse a whole manifest up front. Any bad row rejects the entire manifest, so
 * nothing is converted from a file that is only partly valid.
 */
export function parseManifest(content: string): TrackRecord[] {
  let rows: unknown[];
  try {
    rows = parse(content, {
      bom: true,
      columns: checkHeader,
      skip_empty_lines: true,
      trim: true,
    });
  } catch (err) {
    if (err instanceof ManifestError) throw err;
    const reason = err instanceof Error ? err.message : String(err);
    throw new ManifestError(`invalid CSV: ${reason}`, undefined, { cause: err });
  }

  if (rows.length === 0) {
    throw new ManifestError("manifest lists no tracks");
  }

  return rows.map((row, i) => {
    const result = rowSchema.safeParse(row);
    if (!result.success) {
      const reason = result.error.issues.map((issue) => issue.message).join("; ");
      throw new ManifestError(reason, i + 1);
    }
    return result.data;
  });
}

export async function readManifest(manifestPath: string): Promise<TrackRecord[]> {
  let content: string;
  try {
    content = await fs.promises.readFile(manifestPath, "utf-8");
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ManifestError(`cannot read ${manifestPath}: ${reason}`, undefined, { cause: err });
  }
  return parseManifest(content);
}
