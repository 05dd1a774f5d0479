import { readFileSync } from "fs";
import { resolve } from "path";
import { z } from "zod";
import type { CandidateSegment, SelectionOptions } from "../selection/types";
import type { SubtitleCue } from "../subtitles";

export interface EngagementKeywords {
  excitement: string[];
  questions: string[];
}

const keywordsSchema = z.object({
  excitement: z.array(z.string().min(1)),
  questions: z.array(z.string().min(1)),
});

const DEFAULT_KEYWORDS_PATH = resolve(__dirname, "..", "..", "..", "data", "engagement-keywords.json");

export function loadEngagementKeywords(path = DEFAULT_KEYWORDS_PATH): EngagementKeywords {
  const raw: unknown = JSON.parse(readFileSync(path, "utf8"));
  const parsed = keywordsSchema.parse(raw);
  return {
    excitement: parsed.excitement.map((k) => k.toLowerCase()),
    questions: parsed.questions.map((k) => k.toLowerCase()),
  };
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function keywordScore(text: string, keywords: EngagementKeywords): number {
  const hits = keywords.excitement.filter((k) => text.includes(k)).length;
  return hits > 0 ? Math.min(0.4, hits * 0.1) : 0;
}

function questionScore(text: string, keywords: EngagementKeywords): number {
  return keywords.questions.some((q) => text.includes(q)) ? 0.2 : 0;
}

function repetitionScore(words: string[]): number {
  if (words.length <= 3) {
    return 0;
  }
  const freq = new Map<string, number>();
  for (const w of words) {
    if (w.length > 3) {
      freq.set(w, (freq.get(w) ?? 0) + 1);
    }
  }
  const maxRepeat = freq.size > 0 ? Math.max(...freq.values()) : 1;
  return maxRepeat >= 2 ? Math.min(0.15, (maxRepeat - 1) * 0.05) : 0;
}

function durationScore(duration: number): number {
  if (duration >= 5 && duration <= 30) return 0.15;
  if (duration >= 3 && duration <= 45) return 0.1;
  return 0.05;
}

function paceScore(wordCount: number, duration: number): number {
  const wps = wordCount / duration;
  if (wps >= 2 && wps <= 5) return 0.1;
  if (wps >= 1 && wps <= 6) return 0.05;
  return 0;
}

/**
 * Heuristic engagement score in [0, 1] for one transcript segment, or null
 * when the segment is shorter than a second or longer than the clip cap.
 */
export function scoreTranscriptSegment(
  cue: SubtitleCue,
  keywords: EngagementKeywords,
  maxDurationSeconds: number,
): number | null {
  const duration = cue.end - cue.start;
  if (duration < 1 || duration > maxDurationSeconds) {
    return null;
  }
  const text = cue.text.toLowerCase().trim();
  const words = text.split(/\s+/).filter(Boolean);

  const score =
    keywordScore(text, keywords) +
    questionScore(text, keywords) +
    repetitionScore(words) +
    durationScore(duration) +
    paceScore(words.length, duration);

  return round2(Math.min(1, score));
}

/** Fallback candidate source for videos without a heatmap. */
export function detectEngagementFromTranscript(
  cues: readonly SubtitleCue[],
  options: SelectionOptions,
  keywords: EngagementKeywords,
): CandidateSegment[] {
  const candidates: CandidateSegment[] = [];
  for (const cue of cues) {
    const score = scoreTranscriptSegment(cue, keywords, options.maxDurationSeconds);
    if (score === null || score < options.minScore) {
      continue;
    }
    candidates.push({ startSeconds: cue.start, endSeconds: cue.end, score });
  }
  candidates.sort((a, b) => (b.score !== a.score ? b.score - a.score : a.startSeconds - b.startSeconds));
  return candidates.slice(0, Math.max(0, options.maxClips));
}
