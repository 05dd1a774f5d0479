import { MIN_CLIP_SECONDS } from "../../lib/config";
import type { CandidateSegment, PaddedClipPlan, PlanOptions } from "./types";

/**
 * Widens each ranked candidate by the padding, clamped to the video.
 * Rank is the candidate's 1-based position; plans that clamp down to less
 * than `minClipSeconds` are dropped without renumbering the others.
 */
export function planClips(
  candidates: readonly CandidateSegment[],
  options: PlanOptions,
): PaddedClipPlan[] {
  const minLength = Math.max(options.minClipSeconds ?? MIN_CLIP_SECONDS, Number.EPSILON);
  const plans: PaddedClipPlan[] = [];

  candidates.forEach((c, i) => {
    const downloadStart = Math.max(0, c.startSeconds - options.paddingSeconds);
    const downloadEnd = Math.min(options.videoDurationSeconds, c.endSeconds + options.paddingSeconds);
    if (downloadEnd - downloadStart < minLength) {
      return;
    }
    plans.push({
      downloadStart,
      downloadEnd,
      score: c.score,
      rank: i + 1,
      cropMode: options.cropMode,
    });
  });

  return plans;
}
