import { mkdir, mkdtemp, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import type { ClipperConfig } from "./lib/config";
import { NoHeatmapData } from "./lib/errors";
import { type Logger, silentLogger } from "./lib/logger";
import { findFfmpeg } from "./services/ffmpeg";
import { type HeatmapSource, curveEndSeconds, fetchHeatmap } from "./services/heatmap";
import {
  type ClipOutcome,
  type MediaPipeline,
  createMediaPipeline,
  createMediaTools,
} from "./services/mediaPipeline";
import {
  type EngagementKeywords,
  detectEngagementFromTranscript,
  loadEngagementKeywords,
} from "./services/scoring/transcriptEngagement";
import { planClips } from "./services/selection/clipPlanner";
import { selectSegments } from "./services/selection/segmentSelector";
import type { CandidateSegment, PaddedClipPlan } from "./services/selection/types";
import {
  type Transcript,
  createTranscriber,
  estimateTranscribeSeconds,
  formatDuration,
} from "./services/transcription";
import { type YtDlpOptions, downloadAudio, findYtDlp, getVideoDuration } from "./services/youtube";

export type CandidateSource = "heatmap" | "transcript";

export interface RunSummary {
  videoId: string;
  source: CandidateSource;
  videoDurationSeconds: number;
  candidates: CandidateSegment[];
  plans: PaddedClipPlan[];
  outcomes: ClipOutcome[];
  rendered: number;
  failed: number;
}

export interface RunnerDeps {
  heatmapSource: HeatmapSource;
  probeDuration: (videoId: string) => Promise<number | null>;
  pipeline: MediaPipeline;
  /** Full-video transcript for the no-heatmap fallback. */
  transcriptSource?: (videoId: string, durationHint: number | null) => Promise<Transcript>;
  confirmFallback?: () => Promise<boolean>;
  keywords?: EngagementKeywords;
  logger?: Logger;
}

async function findCandidates(
  config: Readonly<ClipperConfig>,
  videoId: string,
  deps: RunnerDeps,
  durationHint: number | null,
  logger: Logger,
): Promise<{ source: CandidateSource; candidates: CandidateSegment[]; coveredSeconds: number }> {
  try {
    const curve = await deps.heatmapSource(videoId);
    logger.info(`Heatmap has ${curve.samples.length} samples of ${curve.bucketSeconds.toFixed(1)}s.`);
    const candidates = selectSegments(
      curve.samples,
      {
        minScore: config.minScore,
        maxClips: config.maxClips,
        maxDurationSeconds: config.maxDurationSeconds,
      },
      curve.bucketSeconds,
    );
    return { source: "heatmap", candidates, coveredSeconds: curveEndSeconds(curve) };
  } catch (err) {
    if (!(err instanceof NoHeatmapData) || !config.aiFallback || !deps.transcriptSource) {
      throw err;
    }
    logger.warn("Heatmap data not available. Falling back to transcript-based engagement detection.");
    if (deps.confirmFallback && !(await deps.confirmFallback())) {
      throw err;
    }

    const transcript = await deps.transcriptSource(videoId, durationHint);
    const keywords = deps.keywords ?? loadEngagementKeywords();
    const candidates = detectEngagementFromTranscript(
      transcript.segments,
      {
        minScore: config.aiMinScore,
        maxClips: config.maxClips,
        maxDurationSeconds: config.maxDurationSeconds,
      },
      keywords,
    );
    const lastCue = transcript.segments[transcript.segments.length - 1];
    return { source: "transcript", candidates, coveredSeconds: lastCue ? lastCue.end : 0 };
  }
}

/**
 * One clipping run: find candidates, plan them and render each plan in turn.
 * Fetch-stage failures reject; a failed clip is recorded and the run goes on.
 */
export async function runClipper(
  config: Readonly<ClipperConfig>,
  videoId: string,
  deps: RunnerDeps,
): Promise<RunSummary> {
  const logger = deps.logger ?? silentLogger;

  const probed = await deps.probeDuration(videoId);
  const { source, candidates, coveredSeconds } = await findCandidates(config, videoId, deps, probed, logger);

  const videoDurationSeconds = probed ?? coveredSeconds;
  if (probed === null) {
    logger.warn(`Could not read video duration, using ${Math.round(coveredSeconds)}s from the ${source}.`);
  }

  const plans = planClips(candidates, {
    paddingSeconds: config.paddingSeconds,
    videoDurationSeconds,
    cropMode: config.cropMode,
  });

  const summary: RunSummary = {
    videoId,
    source,
    videoDurationSeconds,
    candidates,
    plans,
    outcomes: [],
    rendered: 0,
    failed: 0,
  };

  if (plans.length === 0) {
    logger.warn("No high-engagement segments found.");
    return summary;
  }

  logger.success(`Found ${plans.length} high-engagement segment(s) via ${source}.`);
  logger.info(`Processing clips with ${config.paddingSeconds}s pre-padding and ${config.paddingSeconds}s post-padding.`);
  await mkdir(config.outputDir, { recursive: true });

  for (const plan of plans) {
    const outcome = await deps.pipeline.produce(videoId, plan);
    summary.outcomes.push(outcome);
    if (outcome.status === "rendered") {
      summary.rendered = summary.rendered + 1;
    } else {
      summary.failed = summary.failed + 1;
    }
  }

  return summary;
}

/** Wires the real tools: yt-dlp, ffmpeg, the watch page and the transcriber. */
export async function buildRunnerDeps(
  config: Readonly<ClipperConfig>,
  logger: Logger,
): Promise<RunnerDeps> {
  const ytDlpBin = await findYtDlp(config.ytDlpPath);
  const ffmpegPath = await findFfmpeg(config.ffmpegPath);
  const ytDlp: YtDlpOptions = {
    ytDlp: ytDlpBin,
    cookiesFile: config.cookiesFile,
    ffmpegPath: config.ffmpegPath,
    timeoutMs: config.toolTimeoutMs,
  };
  const transcriber =
    config.subtitles || config.aiFallback ? createTranscriber(config, ffmpegPath, logger.child("[Whisper]")) : null;

  return {
    heatmapSource: (videoId) =>
      fetchHeatmap(videoId, { retries: config.fetchRetries, logger }),
    probeDuration: (videoId) => getVideoDuration(videoId, ytDlp),
    pipeline: createMediaPipeline({
      config,
      tools: createMediaTools(config, ytDlp, ffmpegPath),
      transcriber: config.subtitles ? transcriber : null,
      logger,
    }),
    transcriptSource: transcriber
      ? async (videoId, durationHint) => {
          const workDir = await mkdtemp(join(tmpdir(), `clip_${videoId}_audio_`));
          try {
            const audioPath = join(workDir, "audio.m4a");
            logger.info("Downloading audio track...");
            await downloadAudio(videoId, audioPath, ytDlp);
            if (durationHint !== null) {
              const eta = estimateTranscribeSeconds(durationHint, config.whisperModel);
              logger.info(`Transcribing full video, estimated ~${formatDuration(eta)}...`);
            }
            return await transcriber.transcribe(audioPath, workDir);
          } finally {
            await rm(workDir, { recursive: true, force: true });
          }
        }
      : undefined,
  };
}
