import { z } from "zod";
import { ConfigError } from "./errors";

export const CROP_MODES = ["center", "split-left", "split-right"] as const;
export type CropMode = (typeof CROP_MODES)[number];

export const WHISPER_MODELS = ["tiny", "base", "small", "medium", "large"] as const;
export type WhisperModel = (typeof WHISPER_MODELS)[number];

export const OUTPUT_WIDTH = 720;
export const OUTPUT_HEIGHT = 1280;
export const MIN_CLIP_SECONDS = 3;

const envBoolean = z.preprocess((value) => {
  if (typeof value !== "string") {
    return value;
  }
  const v = value.trim().toLowerCase();
  if (["1", "true", "yes", "y", "on"].includes(v)) return true;
  if (["0", "false", "no", "n", "off"].includes(v)) return false;
  return value;
}, z.boolean());

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v && v.length > 0 ? v : undefined));

const baseSchema = z.object({
  OUTPUT_DIR: z.string().min(1).default("clips"),
  MAX_DURATION: z.coerce.number().int().positive().default(60),
  MIN_SCORE: z.coerce.number().min(0).max(1).default(0.4),
  MAX_CLIPS: z.coerce.number().int().positive().default(10),
  PADDING: z.coerce.number().int().min(0).default(10),
  TOP_HEIGHT: z.coerce.number().int().positive().default(960),
  BOTTOM_HEIGHT: z.coerce.number().int().positive().default(320),
  WHISPER_MODEL: z.enum(WHISPER_MODELS).default("tiny"),
  TRANSCRIBE_PROVIDER: z.enum(["local", "openai"]).default("local"),
  OPENAI_API_KEY: optionalString,
  CROP_MODE: z.enum(CROP_MODES).default("center"),
  USE_SUBTITLE: envBoolean.default(false),
  SUBTITLE_FALLBACK: envBoolean.default(true),
  AI_FALLBACK: envBoolean.default(true),
  AI_MIN_SCORE: z.coerce.number().min(0).max(1).default(0.5),
  FETCH_RETRIES: z.coerce.number().int().min(0).max(10).default(2),
  DOWNLOAD_RETRIES: z.coerce.number().int().min(0).max(10).default(1),
  TOOL_TIMEOUT_SECONDS: z.coerce.number().int().positive().default(1800),
  YT_DLP_PATH: optionalString,
  FFMPEG_PATH: optionalString,
  PYTHON_BIN: z.string().min(1).default("python3"),
  YT_COOKIES_FILE: optionalString,
});

const configSchema = baseSchema
  .refine((c) => c.TOP_HEIGHT + c.BOTTOM_HEIGHT === OUTPUT_HEIGHT, {
    message: `TOP_HEIGHT + BOTTOM_HEIGHT must equal ${OUTPUT_HEIGHT}`,
    path: ["TOP_HEIGHT"],
  })
  .refine((c) => c.TRANSCRIBE_PROVIDER !== "openai" || c.OPENAI_API_KEY !== undefined, {
    message: "OPENAI_API_KEY is required when TRANSCRIBE_PROVIDER=openai",
    path: ["OPENAI_API_KEY"],
  });

export type ConfigKey = keyof z.input<typeof baseSchema>;
export type ConfigOverrides = Partial<Record<ConfigKey, string | number | boolean>>;

export interface ClipperConfig {
  outputDir: string;
  maxDurationSeconds: number;
  minScore: number;
  maxClips: number;
  paddingSeconds: number;
  topHeight: number;
  bottomHeight: number;
  cropMode: CropMode;
  subtitles: boolean;
  subtitleFallback: boolean;
  whisperModel: WhisperModel;
  transcribeProvider: "local" | "openai";
  openaiApiKey?: string;
  aiFallback: boolean;
  aiMinScore: number;
  fetchRetries: number;
  downloadRetries: number;
  toolTimeoutMs: number;
  ytDlpPath?: string;
  ffmpegPath?: string;
  pythonBin: string;
  cookiesFile?: string;
}

/**
 * Validates the environment (plus CLI overrides, which win) into a frozen
 * configuration value. Throws ConfigError listing every invalid key.
 */
export function loadConfig(
  env: Record<string, string | undefined>,
  overrides: ConfigOverrides = {},
): Readonly<ClipperConfig> {
  const input: Record<string, unknown> = {};
  for (const key of Object.keys(baseSchema.shape)) {
    const raw = env[key];
    if (raw !== undefined && raw !== "") {
      input[key] = raw;
    }
  }
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      input[key] = value;
    }
  }

  const parsed = configSchema.safeParse(input);
  if (!parsed.success) {
    const messages = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${messages}`);
  }

  const c = parsed.data;
  return Object.freeze({
    outputDir: c.OUTPUT_DIR,
    maxDurationSeconds: c.MAX_DURATION,
    minScore: c.MIN_SCORE,
    maxClips: c.MAX_CLIPS,
    paddingSeconds: c.PADDING,
    topHeight: c.TOP_HEIGHT,
    bottomHeight: c.BOTTOM_HEIGHT,
    cropMode: c.CROP_MODE,
    subtitles: c.USE_SUBTITLE,
    subtitleFallback: c.SUBTITLE_FALLBACK,
    whisperModel: c.WHISPER_MODEL,
    transcribeProvider: c.TRANSCRIBE_PROVIDER,
    openaiApiKey: c.OPENAI_API_KEY,
    aiFallback: c.AI_FALLBACK,
    aiMinScore: c.AI_MIN_SCORE,
    fetchRetries: c.FETCH_RETRIES,
    downloadRetries: c.DOWNLOAD_RETRIES,
    toolTimeoutMs: c.TOOL_TIMEOUT_SECONDS * 1000,
    ytDlpPath: c.YT_DLP_PATH,
    ffmpegPath: c.FFMPEG_PATH,
    pythonBin: c.PYTHON_BIN,
    cookiesFile: c.YT_COOKIES_FILE,
  });
}

export function describeCropMode(mode: CropMode): string {
  switch (mode) {
    case "center":
      return "Default center crop";
    case "split-left":
      return "Split crop (bottom-left facecam)";
    case "split-right":
      return "Split crop (bottom-right facecam)";
  }
}
