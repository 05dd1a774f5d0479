import { z } from "zod";
import { FetchFailure, NoHeatmapData, getErrorMessage } from "../lib/errors";
import { withRetries } from "../lib/retry";
import { type Logger, silentLogger } from "../lib/logger";
import { inferBucketSeconds } from "./selection/segmentSelector";
import type { EngagementSample, HeatmapCurve } from "./selection/types";

const WATCH_URL = "https://www.youtube.com/watch?v=";
const USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36";
const FETCH_TIMEOUT_MS = 20000;
const MARKERS_PATTERN = /"markers":\s*(\[.*?\])\s*,\s*"?markersMetadata"?/s;

const markerSchema = z.object({
  startMillis: z.coerce.number().min(0),
  durationMillis: z.coerce.number().positive(),
  intensityScoreNormalized: z.coerce.number().default(0),
});

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export type HeatmapSource = (videoId: string) => Promise<HeatmapCurve>;

export interface FetchHeatmapOptions {
  retries?: number;
  fetchImpl?: FetchLike;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
}

function unwrapMarker(marker: unknown): unknown {
  if (typeof marker === "object" && marker !== null && "heatMarkerRenderer" in marker) {
    return marker.heatMarkerRenderer;
  }
  return marker;
}

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

/**
 * Pulls the "Most Replayed" markers out of a watch page. Markers that do not
 * carry a start, a positive duration and a numeric score are skipped.
 */
export function parseHeatmapMarkers(html: string, videoId: string): HeatmapCurve {
  const match = MARKERS_PATTERN.exec(html);
  if (!match) {
    throw new NoHeatmapData(videoId);
  }

  let markers: unknown;
  try {
    markers = JSON.parse(match[1].replace(/\\"/g, '"'));
  } catch (err) {
    throw new FetchFailure(`Unparseable heatmap payload for video ${videoId}`, { cause: err });
  }
  if (!Array.isArray(markers)) {
    throw new FetchFailure(`Unexpected heatmap payload for video ${videoId}`);
  }

  const samples: EngagementSample[] = [];
  for (const raw of markers) {
    const parsed = markerSchema.safeParse(unwrapMarker(raw));
    if (!parsed.success || !Number.isFinite(parsed.data.intensityScoreNormalized)) {
      continue;
    }
    samples.push({
      offsetSeconds: parsed.data.startMillis / 1000,
      durationSeconds: parsed.data.durationMillis / 1000,
      score: clamp01(parsed.data.intensityScoreNormalized),
    });
  }

  if (samples.length === 0) {
    throw new NoHeatmapData(videoId);
  }

  samples.sort((a, b) => a.offsetSeconds - b.offsetSeconds);
  return { videoId, samples, bucketSeconds: inferBucketSeconds(samples) };
}

/** End of the last bucket, i.e. the span of video the curve covers. */
export function curveEndSeconds(curve: HeatmapCurve): number {
  const last = curve.samples[curve.samples.length - 1];
  if (!last) {
    return 0;
  }
  return last.offsetSeconds + Math.max(last.durationSeconds, curve.bucketSeconds);
}

function isTransient(err: unknown): boolean {
  if (!(err instanceof FetchFailure)) {
    return false;
  }
  if (err.status === undefined) {
    return true;
  }
  return err.status === 429 || err.status >= 500;
}

export async function fetchWatchPage(
  videoId: string,
  options: FetchHeatmapOptions = {},
): Promise<string> {
  const fetchImpl = options.fetchImpl ?? fetch;
  const logger = options.logger ?? silentLogger;
  const url = WATCH_URL + encodeURIComponent(videoId);

  return withRetries(
    async () => {
      let response: Response;
      try {
        response = await fetchImpl(url, {
          headers: { "User-Agent": USER_AGENT, "Accept-Language": "en-US,en;q=0.9" },
          signal: AbortSignal.timeout(FETCH_TIMEOUT_MS),
        });
      } catch (err) {
        throw new FetchFailure(`Could not reach ${url}: ${getErrorMessage(err)}`, { cause: err });
      }
      if (!response.ok) {
        throw new FetchFailure(`Watch page returned HTTP ${response.status}`, {
          status: response.status,
        });
      }
      try {
        return await response.text();
      } catch (err) {
        throw new FetchFailure(`Could not read watch page body: ${getErrorMessage(err)}`, { cause: err });
      }
    },
    {
      retries: options.retries ?? 2,
      shouldRetry: isTransient,
      sleep: options.sleep,
      onRetry: (err, attempt, delay) => {
        logger.warn(`Heatmap fetch attempt ${attempt} failed (${getErrorMessage(err)}). Retrying in ${delay}ms...`);
      },
    },
  );
}

export async function fetchHeatmap(
  videoId: string,
  options: FetchHeatmapOptions = {},
): Promise<HeatmapCurve> {
  const html = await fetchWatchPage(videoId, options);
  return parseHeatmapMarkers(html, videoId);
}
