import ffmpeg from "fluent-ffmpeg";
import ffprobeStatic from "ffprobe-static";
import * as fs from "fs/promises";
import { type CropMode, OUTPUT_HEIGHT, OUTPUT_WIDTH } from "../lib/config";
import { EncodeFailure, ToolNotFound, getErrorMessage } from "../lib/errors";
import { isExecutable, run } from "../lib/process";
import { subtitlesFilter } from "./subtitles";

ffmpeg.setFfprobePath(ffprobeStatic.path);

export interface Probe {
  width: number;
  height: number;
}

export interface SplitHeights {
  topHeight: number;
  bottomHeight: number;
}

export type CropFilter =
  | { kind: "simple"; graph: string }
  | { kind: "complex"; graph: string; outputLabel: string };

const ENCODE_ARGS = [
  "-c:v",
  "libx264",
  "-preset",
  "ultrafast",
  "-crf",
  "26",
  "-pix_fmt",
  "yuv420p",
];

export async function findFfmpeg(configured?: string): Promise<string> {
  const bin = configured ?? "ffmpeg";
  if (await isExecutable(bin, "-version")) {
    return bin;
  }
  throw new ToolNotFound("FFmpeg", "Install FFmpeg and make sure it is in PATH, or set FFMPEG_PATH.");
}

// scale so the frame covers 720x1280 whatever the source aspect
function coverScale(): string {
  const ratio = `${OUTPUT_WIDTH}/${OUTPUT_HEIGHT}`;
  return (
    `scale='if(gt(iw/ih,${ratio}),-2,${OUTPUT_WIDTH})'` +
    `:'if(gt(iw/ih,${ratio}),${OUTPUT_HEIGHT},-2)'`
  );
}

export function buildCropFilter(mode: CropMode, heights: SplitHeights): CropFilter {
  const centerX = `(iw-${OUTPUT_WIDTH})/2`;
  const centerY = `(ih-${OUTPUT_HEIGHT})/2`;

  if (mode === "center") {
    return {
      kind: "simple",
      graph: `${coverScale()},crop=${OUTPUT_WIDTH}:${OUTPUT_HEIGHT}:${centerX}:${centerY},setsar=1`,
    };
  }

  const { topHeight, bottomHeight } = heights;
  const facecamX = mode === "split-left" ? "0" : `iw-${OUTPUT_WIDTH}`;
  const graph = [
    `[0:v]${coverScale()}[scaled]`,
    `[scaled]split=2[s1][s2]`,
    `[s1]crop=${OUTPUT_WIDTH}:${topHeight}:${centerX}:${centerY}[top]`,
    `[s2]crop=${OUTPUT_WIDTH}:${bottomHeight}:${facecamX}:ih-${bottomHeight}[bottom]`,
    `[top][bottom]vstack=inputs=2,setsar=1[out]`,
  ].join(";");
  return { kind: "complex", graph, outputLabel: "[out]" };
}

export function buildRenderArgs(
  inputPath: string,
  outputPath: string,
  filter: CropFilter,
): string[] {
  const filterArgs =
    filter.kind === "simple"
      ? ["-vf", filter.graph, "-map", "0:v:0", "-map", "0:a?"]
      : ["-filter_complex", filter.graph, "-map", filter.outputLabel, "-map", "0:a?"];
  return [
    "-y",
    "-hide_banner",
    "-loglevel",
    "error",
    "-i",
    inputPath,
    ...filterArgs,
    ...ENCODE_ARGS,
    "-c:a",
    "aac",
    "-b:a",
    "128k",
    "-movflags",
    "+faststart",
    outputPath,
  ];
}

interface RenderVerticalClipOptions {
  ffmpegPath: string;
  inputPath: string;
  outputPath: string;
  cropMode: CropMode;
  heights: SplitHeights;
  timeoutMs?: number;
}

export async function renderVerticalClip(options: RenderVerticalClipOptions): Promise<void> {
  const filter = buildCropFilter(options.cropMode, options.heights);
  const args = buildRenderArgs(options.inputPath, options.outputPath, filter);
  let probe: Probe;
  try {
    await run(options.ffmpegPath, args, { timeoutMs: options.timeoutMs });
    probe = await probeVideo(options.outputPath);
  } catch (err) {
    throw new EncodeFailure(`Cropping failed: ${getErrorMessage(err)}`, { cause: err });
  }
  if (probe.width !== OUTPUT_WIDTH || probe.height !== OUTPUT_HEIGHT) {
    throw new EncodeFailure(
      `Cropping produced ${probe.width}x${probe.height}, expected ${OUTPUT_WIDTH}x${OUTPUT_HEIGHT}`,
    );
  }
}

interface BurnSubtitlesOptions {
  ffmpegPath: string;
  inputPath: string;
  srtPath: string;
  outputPath: string;
  timeoutMs?: number;
}

export async function burnSubtitles(options: BurnSubtitlesOptions): Promise<void> {
  const args = [
    "-y",
    "-hide_banner",
    "-loglevel",
    "error",
    "-i",
    options.inputPath,
    "-vf",
    subtitlesFilter(options.srtPath),
    ...ENCODE_ARGS,
    "-c:a",
    "copy",
    "-movflags",
    "+faststart",
    options.outputPath,
  ];
  try {
    await run(options.ffmpegPath, args, { timeoutMs: options.timeoutMs });
    await fs.stat(options.outputPath);
  } catch (err) {
    throw new EncodeFailure(`Burning subtitles failed: ${getErrorMessage(err)}`, { cause: err });
  }
}

export function probeVideo(file: string): Promise<Probe> {
  return new Promise((resolve, reject) => {
    ffmpeg.ffprobe(file, (err, data) => {
      if (err) {
        reject(err);
        return;
      }
      const stream = data.streams.find((s) => s.codec_type === "video");
      resolve({
        width: Number(stream?.width ?? 0),
        height: Number(stream?.height ?? 0),
      });
    });
  });
}

/** 16 kHz mono MP3, small enough for hosted speech-to-text upload limits. */
export function extractAudioForTranscription(
  ffmpegPath: string,
  inputPath: string,
  outputPath: string,
): Promise<void> {
  return new Promise((resolve, reject) => {
    ffmpeg(inputPath)
      .setFfmpegPath(ffmpegPath)
      .noVideo()
      .audioFrequency(16000)
      .audioChannels(1)
      .audioCodec("libmp3lame")
      .audioBitrate("64k")
      .output(outputPath)
      .on("end", () => resolve())
      .on("error", reject)
      .run();
  });
}
