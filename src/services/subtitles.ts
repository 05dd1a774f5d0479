import { writeFile } from "fs/promises";

export interface SubtitleCue {
  start: number;
  end: number;
  text: string;
}

const FORCE_STYLE =
  "FontName=Arial,FontSize=12,Bold=1,PrimaryColour=&HFFFFFF,OutlineColour=&H000000," +
  "BorderStyle=1,Outline=2,Shadow=1,MarginV=100";

function pad(num: number, size: number): string {
  let s = num.toString();
  while (s.length < size) {
    s = "0" + s;
  }
  return s;
}

export function formatSrtTime(seconds: number): string {
  const totalMs = Math.max(0, Math.round(seconds * 1000));
  const hours = Math.floor(totalMs / 3600000);
  const minutes = Math.floor((totalMs % 3600000) / 60000);
  const secs = Math.floor((totalMs % 60000) / 1000);
  const ms = totalMs % 1000;
  return `${pad(hours, 2)}:${pad(minutes, 2)}:${pad(secs, 2)},${pad(ms, 3)}`;
}

export function buildSrt(cues: readonly SubtitleCue[]): string {
  const blocks: string[] = [];
  for (const cue of cues) {
    const text = cue.text.replace(/\s+/g, " ").trim();
    if (text.length === 0 || cue.end <= cue.start) {
      continue;
    }
    blocks.push(
      [String(blocks.length + 1), `${formatSrtTime(cue.start)} --> ${formatSrtTime(cue.end)}`, text].join("\n"),
    );
  }
  if (blocks.length === 0) {
    return "";
  }
  return blocks.join("\n\n") + "\n";
}

/** Writes the SRT and returns the number of cues written. */
export async function writeSrtFile(cues: readonly SubtitleCue[], outputPath: string): Promise<number> {
  const content = buildSrt(cues);
  await writeFile(outputPath, content, "utf8");
  return content.length === 0 ? 0 : content.trimEnd().split("\n\n").length;
}

export function escapeSubtitlesPath(p: string): string {
  return p
    .replace(/\\/g, "/")
    .replace(/'/g, "\\'")
    .replace(/:/g, "\\:")
    .replace(/\[/g, "\\[")
    .replace(/\]/g, "\\]");
}

export function subtitlesFilter(srtPath: string): string {
  return `subtitles='${escapeSubtitlesPath(srtPath)}':force_style='${FORCE_STYLE}'`;
}
