import type { CandidateSegment, EngagementSample, SelectionOptions } from "./types";

function roundMillis(seconds: number): number {
  return Math.round(seconds * 1000) / 1000;
}

/**
 * Bucket width of a uniformly spaced curve. Falls back to the sample's own
 * duration when there is only one.
 */
export function inferBucketSeconds(samples: readonly EngagementSample[]): number {
  if (samples.length >= 2) {
    const spacing = samples[1].offsetSeconds - samples[0].offsetSeconds;
    if (spacing > 0) {
      return spacing;
    }
  }
  if (samples.length >= 1) {
    return samples[0].durationSeconds;
  }
  return 0;
}

function splitIntoRuns(
  samples: readonly EngagementSample[],
  minScore: number,
): EngagementSample[][] {
  const runs: EngagementSample[][] = [];
  let current: EngagementSample[] = [];
  for (const s of samples) {
    if (s.score >= minScore) {
      current.push(s);
      continue;
    }
    if (current.length > 0) {
      runs.push(current);
      current = [];
    }
  }
  if (current.length > 0) {
    runs.push(current);
  }
  return runs;
}

function peakOf(run: EngagementSample[]): EngagementSample {
  let peak = run[0];
  for (const s of run) {
    // strict so the earliest peak wins ties
    if (s.score > peak.score) {
      peak = s;
    }
  }
  return peak;
}

function runToCandidate(
  run: EngagementSample[],
  bucketSeconds: number,
  maxDurationSeconds: number,
): CandidateSegment {
  const start = run[0].offsetSeconds;
  const end = run[run.length - 1].offsetSeconds + bucketSeconds;
  const peak = peakOf(run);

  if (end - start <= maxDurationSeconds) {
    return { startSeconds: start, endSeconds: end, score: peak.score };
  }

  const peakCenter = peak.offsetSeconds + bucketSeconds / 2;
  const wanted = peakCenter - maxDurationSeconds / 2;
  const windowStart = Math.max(start, roundMillis(Math.min(wanted, end - maxDurationSeconds)));
  let windowEnd = Math.min(end, roundMillis(windowStart + maxDurationSeconds));
  // float addition can land one ulp past the cap
  if (windowEnd - windowStart > maxDurationSeconds) {
    windowEnd = roundMillis(windowEnd - 0.001);
  }
  return {
    startSeconds: windowStart,
    endSeconds: windowEnd,
    score: peak.score,
  };
}

function byScoreThenStart(a: CandidateSegment, b: CandidateSegment): number {
  if (b.score !== a.score) {
    return b.score - a.score;
  }
  return a.startSeconds - b.startSeconds;
}

/**
 * Groups contiguous above-threshold samples into candidate segments, caps
 * each at `maxDurationSeconds` around its peak and returns the `maxClips`
 * best, highest score first.
 */
export function selectSegments(
  samples: readonly EngagementSample[],
  options: SelectionOptions,
  bucketSeconds?: number,
): CandidateSegment[] {
  if (samples.length === 0 || options.maxClips <= 0 || options.maxDurationSeconds <= 0) {
    return [];
  }

  const ordered = [...samples].sort((a, b) => a.offsetSeconds - b.offsetSeconds);
  const bucket = bucketSeconds ?? inferBucketSeconds(ordered);
  if (bucket <= 0) {
    return [];
  }

  const candidates = splitIntoRuns(ordered, options.minScore)
    .map((run) => runToCandidate(run, bucket, options.maxDurationSeconds))
    .filter((c) => c.endSeconds - c.startSeconds > 0)
    .sort(byScoreThenStart);

  const unique: CandidateSegment[] = [];
  for (const c of candidates) {
    const dup = unique.some(
      (u) => u.startSeconds === c.startSeconds && u.endSeconds === c.endSeconds,
    );
    if (!dup) {
      unique.push(c);
    }
  }

  return unique.slice(0, options.maxClips);
}
