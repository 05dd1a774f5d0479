import { existsSync } from "fs";
import { DownloadFailure, ToolNotFound, getErrorMessage } from "../lib/errors";
import { isExecutable, run } from "../lib/process";

const VIDEO_ID_PATTERN = /^[A-Za-z0-9_-]{11}$/;
const SECTION_FORMAT =
  "bestvideo[height<=1080][ext=mp4]+bestaudio[ext=m4a]/best[ext=mp4]/best";
const AUDIO_FORMAT = "bestaudio[ext=m4a]/bestaudio";

export interface YtDlpOptions {
  ytDlp: string;
  cookiesFile?: string;
  ffmpegPath?: string;
  timeoutMs?: number;
}

export function watchUrl(videoId: string): string {
  return `https://youtu.be/${videoId}`;
}

/**
 * Accepts youtu.be links, watch?v= links, /shorts/ and /live/ links, or a
 * bare 11 character id.
 */
export function extractVideoId(input: string): string | null {
  const trimmed = input.trim();
  if (VIDEO_ID_PATTERN.test(trimmed)) {
    return trimmed;
  }

  let url: URL;
  try {
    url = new URL(trimmed);
  } catch {
    return null;
  }

  const host = url.hostname.replace(/^(www\.|m\.|music\.)/, "");
  let candidate: string | null = null;

  if (host === "youtu.be") {
    candidate = url.pathname.split("/")[1] ?? null;
  } else if (host === "youtube.com") {
    if (url.pathname === "/watch") {
      candidate = url.searchParams.get("v");
    } else {
      const parts = url.pathname.split("/");
      if (parts[1] === "shorts" || parts[1] === "live" || parts[1] === "embed") {
        candidate = parts[2] ?? null;
      }
    }
  }

  if (candidate && VIDEO_ID_PATTERN.test(candidate)) {
    return candidate;
  }
  return null;
}

/** Parses "SS", "MM:SS" or "H:MM:SS" into seconds. */
export function parseDurationString(value: string): number | null {
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    return null;
  }
  const parts = trimmed.split(":");
  if (parts.length > 3) {
    return null;
  }
  let total = 0;
  for (const part of parts) {
    if (!/^\d+(\.\d+)?$/.test(part)) {
      return null;
    }
    total = total * 60 + Number(part);
  }
  return total;
}

export async function findYtDlp(configured?: string): Promise<string> {
  const candidates = configured ? [configured] : ["yt-dlp", "youtube-dl"];
  for (const bin of candidates) {
    if (await isExecutable(bin)) {
      return bin;
    }
  }
  throw new ToolNotFound("yt-dlp", "Install yt-dlp or set YT_DLP_PATH.");
}

function baseArgs(options: YtDlpOptions): string[] {
  const args = ["--force-ipv4", "--no-warnings", "--no-playlist"];
  if (options.cookiesFile && existsSync(options.cookiesFile)) {
    args.push("--cookies", options.cookiesFile);
  }
  if (options.ffmpegPath) {
    args.push("--ffmpeg-location", options.ffmpegPath);
  }
  return args;
}

/** Returns null when yt-dlp cannot report a duration. */
export async function getVideoDuration(
  videoId: string,
  options: YtDlpOptions,
): Promise<number | null> {
  try {
    const { stdout } = await run(
      options.ytDlp,
      [...baseArgs(options), "--skip-download", "--print", "duration_string", watchUrl(videoId)],
      { timeoutMs: options.timeoutMs },
    );
    const line = stdout.trim().split("\n").pop() ?? "";
    const seconds = parseDurationString(line);
    return seconds !== null && seconds > 0 ? seconds : null;
  } catch {
    return null;
  }
}

export async function downloadSection(
  videoId: string,
  startSec: number,
  endSec: number,
  outFile: string,
  options: YtDlpOptions,
): Promise<void> {
  const args = [
    ...baseArgs(options),
    "--quiet",
    "--downloader",
    "ffmpeg",
    "--downloader-args",
    `ffmpeg_i:-ss ${startSec} -to ${endSec} -hide_banner -loglevel error`,
    "-f",
    SECTION_FORMAT,
    "--merge-output-format",
    "mp4",
    "-o",
    outFile,
    watchUrl(videoId),
  ];
  try {
    await run(options.ytDlp, args, { timeoutMs: options.timeoutMs });
  } catch (err) {
    throw new DownloadFailure(`yt-dlp failed for ${startSec}s-${endSec}s: ${getErrorMessage(err)}`, {
      cause: err,
    });
  }
  if (!existsSync(outFile)) {
    throw new DownloadFailure(`yt-dlp finished but ${outFile} was not written`);
  }
}

export async function downloadAudio(
  videoId: string,
  outFile: string,
  options: YtDlpOptions,
): Promise<void> {
  try {
    await run(
      options.ytDlp,
      [...baseArgs(options), "--quiet", "-f", AUDIO_FORMAT, "-o", outFile, watchUrl(videoId)],
      { timeoutMs: options.timeoutMs },
    );
  } catch (err) {
    throw new DownloadFailure(`yt-dlp audio download failed: ${getErrorMessage(err)}`, { cause: err });
  }
  if (!existsSync(outFile)) {
    throw new DownloadFailure(`yt-dlp finished but ${outFile} was not written`);
  }
}
