import { copyFile, mkdtemp, rename, rm, unlink } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import type { ClipperConfig } from "../lib/config";
import {
  type ClipFailure,
  DownloadFailure,
  EncodeFailure,
  TranscriptionFailure,
  getErrorMessage,
} from "../lib/errors";
import { type Logger, silentLogger } from "../lib/logger";
import { withRetries } from "../lib/retry";
import { burnSubtitles, renderVerticalClip } from "./ffmpeg";
import type { PaddedClipPlan } from "./selection/types";
import { writeSrtFile } from "./subtitles";
import type { Transcriber } from "./transcription";
import { type YtDlpOptions, downloadSection } from "./youtube";

export type ClipOutcome =
  | {
      status: "rendered";
      plan: PaddedClipPlan;
      outputPath: string;
      warning?: TranscriptionFailure;
    }
  | {
      status: "failed";
      plan: PaddedClipPlan;
      error: ClipFailure;
    };

export interface MediaPipeline {
  produce(videoId: string, plan: PaddedClipPlan): Promise<ClipOutcome>;
}

/** The external tools a clip goes through; swapped out in tests. */
export interface MediaTools {
  download(videoId: string, startSec: number, endSec: number, outFile: string): Promise<void>;
  render(inputPath: string, outputPath: string, plan: PaddedClipPlan): Promise<void>;
  burn(inputPath: string, srtPath: string, outputPath: string): Promise<void>;
}

export function createMediaTools(
  config: Readonly<ClipperConfig>,
  ytDlp: YtDlpOptions,
  ffmpegPath: string,
): MediaTools {
  return {
    download: (videoId, startSec, endSec, outFile) =>
      downloadSection(videoId, startSec, endSec, outFile, ytDlp),
    render: (inputPath, outputPath, plan) =>
      renderVerticalClip({
        ffmpegPath,
        inputPath,
        outputPath,
        cropMode: plan.cropMode,
        heights: { topHeight: config.topHeight, bottomHeight: config.bottomHeight },
        timeoutMs: config.toolTimeoutMs,
      }),
    burn: (inputPath, srtPath, outputPath) =>
      burnSubtitles({ ffmpegPath, inputPath, srtPath, outputPath, timeoutMs: config.toolTimeoutMs }),
  };
}

export function clipFileName(rank: number): string {
  return `clip_${rank}.mp4`;
}

function isClipFailure(err: unknown): err is ClipFailure {
  return (
    err instanceof DownloadFailure ||
    err instanceof EncodeFailure ||
    err instanceof TranscriptionFailure
  );
}

async function moveFile(from: string, to: string): Promise<void> {
  try {
    await rename(from, to);
  } catch (err) {
    if (typeof err === "object" && err !== null && "code" in err && err.code === "EXDEV") {
      await copyFile(from, to);
      await unlink(from);
      return;
    }
    throw err;
  }
}

export interface PipelineOptions {
  config: Readonly<ClipperConfig>;
  tools: MediaTools;
  transcriber: Transcriber | null;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
}

export function createMediaPipeline(options: PipelineOptions): MediaPipeline {
  const { config, tools, transcriber } = options;
  const baseLogger = options.logger ?? silentLogger;

  async function addSubtitles(
    croppedPath: string,
    workDir: string,
    logger: Logger,
  ): Promise<{ path: string; warning?: TranscriptionFailure }> {
    if (!config.subtitles || !transcriber) {
      return { path: croppedPath };
    }
    try {
      logger.info(`Generating subtitle (${transcriber.name})...`);
      const transcript = await transcriber.transcribe(croppedPath, workDir);
      const srtPath = join(workDir, "subtitles.srt");
      const cues = await writeSrtFile(transcript.segments, srtPath);
      if (cues === 0) {
        logger.info("No speech detected, skipping subtitle burn.");
        return { path: croppedPath };
      }
      logger.info(`Burning ${cues} subtitle cues...`);
      const subtitled = join(workDir, "subtitled.mp4");
      await tools.burn(croppedPath, srtPath, subtitled);
      return { path: subtitled };
    } catch (err) {
      if (!(err instanceof TranscriptionFailure) || !config.subtitleFallback) {
        throw err;
      }
      logger.warn(`Subtitle generation failed, continuing without subtitle: ${err.message}`);
      return { path: croppedPath, warning: err };
    }
  }

  return {
    async produce(videoId, plan) {
      const logger = baseLogger.child(`[Clip ${plan.rank}]`);
      const outputPath = join(config.outputDir, clipFileName(plan.rank));
      const start = Math.floor(plan.downloadStart);
      const end = Math.ceil(plan.downloadEnd);
      let workDir: string | null = null;

      logger.info(
        `Processing segment (${start}s - ${end}s, padding ${config.paddingSeconds}s, score ${plan.score.toFixed(2)})`,
      );

      try {
        workDir = await mkdtemp(join(tmpdir(), `clip_${videoId}_${plan.rank}_`));
        const sourcePath = join(workDir, "source.mp4");
        const croppedPath = join(workDir, "cropped.mp4");

        logger.info("Downloading segment...");
        await withRetries(() => tools.download(videoId, plan.downloadStart, plan.downloadEnd, sourcePath), {
          retries: config.downloadRetries,
          shouldRetry: (err) => err instanceof DownloadFailure,
          sleep: options.sleep,
          onRetry: (err, attempt, delay) => {
            logger.warn(`Download attempt ${attempt} failed (${getErrorMessage(err)}). Retrying in ${delay}ms...`);
          },
        });

        logger.info("Cropping video...");
        await tools.render(sourcePath, croppedPath, plan);

        const result = await addSubtitles(croppedPath, workDir, logger);
        await moveFile(result.path, outputPath);

        logger.success(`Clip saved to ${outputPath}`);
        return { status: "rendered", plan, outputPath, warning: result.warning };
      } catch (err) {
        const error = isClipFailure(err)
          ? err
          : new EncodeFailure(`Unexpected error: ${getErrorMessage(err)}`, { cause: err });
        logger.error(`Failed to generate this clip (${error.kind}): ${error.message}`, err);
        return { status: "failed", plan, error };
      } finally {
        if (workDir) {
          await rm(workDir, { recursive: true, force: true });
        }
      }
    },
  };
}
