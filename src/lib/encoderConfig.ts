export const ENCODER_CONFIG = {
  // Encoder executable, resolved through PATH
  PROGRAM: "ffmpeg",

  // Target codec and file extension
  AUDIO_CODEC: "flac",
  OUTPUT_EXTENSION: ".flac",

  // Comment tag stored on the attached cover stream
  COVER_COMMENT: "Cover (front)",

  // Cover formats ffmpeg can attach to a FLAC file as a front-cover picture
  COVER_FORMATS: ["jpeg", "png"],

  // Max cover dimension to accept (skip corrupt/enormous files)
  MAX_COVER_DIMENSION: 10000,

  DEFAULT_FAILURE_POLICY: "fail-fast",
} as const;
