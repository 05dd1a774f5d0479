import OpenAI from "openai";
import { createReadStream } from "fs";
import { join, resolve } from "path";
import { z } from "zod";
import type { ClipperConfig, WhisperModel } from "../lib/config";
import { TranscriptionFailure, getErrorMessage } from "../lib/errors";
import { type Logger, silentLogger } from "../lib/logger";
import { run } from "../lib/process";
import { extractAudioForTranscription } from "./ffmpeg";
import type { SubtitleCue } from "./subtitles";

export interface Transcript {
  language: string;
  segments: SubtitleCue[];
}

export interface Transcriber {
  readonly name: string;
  /** `workDir` receives any intermediate files and is cleaned by the caller. */
  transcribe(mediaPath: string, workDir: string): Promise<Transcript>;
}

const MODEL_SIZES: Record<WhisperModel, string> = {
  tiny: "75 MB",
  base: "142 MB",
  small: "466 MB",
  medium: "1.5 GB",
  large: "2.9 GB",
};

// seconds of CPU work per minute of audio
const MODEL_SPEEDS: Record<WhisperModel, number> = {
  tiny: 5,
  base: 8,
  small: 15,
  medium: 40,
  large: 90,
};

export function getModelSize(model: WhisperModel): string {
  return MODEL_SIZES[model];
}

export function estimateTranscribeSeconds(durationSec: number, model: WhisperModel): number {
  return Math.floor((durationSec / 60) * MODEL_SPEEDS[model]);
}

export function formatDuration(seconds: number): string {
  const s = Math.max(0, Math.floor(seconds));
  if (s < 60) {
    return `${s}s`;
  }
  if (s < 3600) {
    return `${Math.floor(s / 60)}m ${s % 60}s`;
  }
  return `${Math.floor(s / 3600)}h ${Math.floor((s % 3600) / 60)}m`;
}

const segmentSchema = z.object({
  start: z.number(),
  end: z.number(),
  text: z.string(),
});

const transcriptSchema = z.object({
  language: z.string().nullish(),
  segments: z.array(segmentSchema).default([]),
});

export function parseTranscriptJson(stdout: string): Transcript {
  let raw: unknown;
  try {
    raw = JSON.parse(stdout);
  } catch (err) {
    throw new TranscriptionFailure(`Could not parse transcriber output: ${getErrorMessage(err)}`, { cause: err });
  }
  const parsed = transcriptSchema.safeParse(raw);
  if (!parsed.success) {
    throw new TranscriptionFailure(`Unexpected transcriber output: ${parsed.error.issues[0]?.message ?? "invalid"}`);
  }
  return {
    language: parsed.data.language ?? "unknown",
    segments: parsed.data.segments.map((s) => ({ start: s.start, end: s.end, text: s.text.trim() })),
  };
}

/** Runs faster-whisper through the bundled helper script. */
export class LocalWhisperTranscriber implements Transcriber {
  readonly name = "faster-whisper";
  private readonly scriptPath = resolve(__dirname, "..", "..", "scripts", "whisper_transcribe.py");

  constructor(
    private readonly pythonBin: string,
    private readonly model: WhisperModel,
    private readonly timeoutMs: number,
    private readonly logger: Logger = silentLogger,
  ) {}

  async transcribe(mediaPath: string): Promise<Transcript> {
    this.logger.info(`Loading Faster-Whisper model '${this.model}' (~${getModelSize(this.model)} on first use)...`);
    const startedAt = Date.now();
    let stdout: string;
    try {
      const res = await run(
        this.pythonBin,
        [this.scriptPath, "--input", mediaPath, "--model", this.model],
        { timeoutMs: this.timeoutMs },
      );
      stdout = res.stdout;
    } catch (err) {
      throw new TranscriptionFailure(`faster-whisper failed: ${getErrorMessage(err)}`, { cause: err });
    }
    const transcript = parseTranscriptJson(stdout);
    this.logger.info(
      `Transcribed in ${formatDuration((Date.now() - startedAt) / 1000)} (${transcript.segments.length} segments)`,
    );
    return transcript;
  }
}

/** Hosted whisper-1 through the OpenAI API; uploads a compressed mono track. */
export class OpenAITranscriber implements Transcriber {
  readonly name = "openai whisper-1";
  private readonly client: OpenAI;

  constructor(
    apiKey: string,
    private readonly ffmpegPath: string,
    private readonly logger: Logger = silentLogger,
  ) {
    this.client = new OpenAI({ apiKey, timeout: 600000, maxRetries: 3 });
  }

  async transcribe(mediaPath: string, workDir: string): Promise<Transcript> {
    const audioPath = join(workDir, "transcription.mp3");
    try {
      await extractAudioForTranscription(this.ffmpegPath, mediaPath, audioPath);
      const response = await this.client.audio.transcriptions.create({
        file: createReadStream(audioPath),
        model: "whisper-1",
        response_format: "verbose_json",
        timestamp_granularities: ["segment"],
      });
      const parsed = transcriptSchema.safeParse(response);
      if (!parsed.success) {
        throw new Error("response has no segments");
      }
      this.logger.debug(`Detected language: ${parsed.data.language ?? "unknown"}`);
      return {
        language: parsed.data.language ?? "unknown",
        segments: parsed.data.segments.map((s) => ({ start: s.start, end: s.end, text: s.text.trim() })),
      };
    } catch (err) {
      throw new TranscriptionFailure(`OpenAI transcription failed: ${getErrorMessage(err)}`, { cause: err });
    }
  }
}

export function createTranscriber(
  config: Readonly<ClipperConfig>,
  ffmpegPath: string,
  logger?: Logger,
): Transcriber {
  if (config.transcribeProvider === "openai") {
    if (!config.openaiApiKey) {
      throw new TranscriptionFailure("OPENAI_API_KEY is not set");
    }
    return new OpenAITranscriber(config.openaiApiKey, ffmpegPath, logger);
  }
  return new LocalWhisperTranscriber(config.pythonBin, config.whisperModel, config.toolTimeoutMs, logger);
}
