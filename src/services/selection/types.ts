import type { CropMode } from "../../lib/config";

export interface EngagementSample {
  readonly offsetSeconds: number;
  readonly durationSeconds: number;
  readonly score: number;
}

export interface HeatmapCurve {
  readonly videoId: string;
  readonly samples: readonly EngagementSample[];
  readonly bucketSeconds: number;
}

export interface CandidateSegment {
  readonly startSeconds: number;
  readonly endSeconds: number;
  readonly score: number;
}

export interface PaddedClipPlan {
  readonly downloadStart: number;
  readonly downloadEnd: number;
  readonly score: number;
  readonly rank: number;
  readonly cropMode: CropMode;
}

export type SelectionOptions = {
  minScore: number;
  maxClips: number;
  maxDurationSeconds: number;
};

export type PlanOptions = {
  paddingSeconds: number;
  videoDurationSeconds: number;
  cropMode: CropMode;
  minClipSeconds?: number;
};
