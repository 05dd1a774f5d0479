export type FailureKind =
  | "FetchFailure"
  | "NoHeatmapData"
  | "DownloadFailure"
  | "EncodeFailure"
  | "TranscriptionFailure"
  | "ConfigError"
  | "ToolNotFound";

export class ClipperError extends Error {
  readonly kind: FailureKind;

  constructor(kind: FailureKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.kind = kind;
    this.name = kind;
  }
}

/** Watch page unreachable, non-2xx, or the embedded marker payload is unparseable. */
export class FetchFailure extends ClipperError {
  readonly status?: number;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super("FetchFailure", message, options);
    this.status = options?.status;
  }
}

/** The page has no "Most Replayed" markers (new or low-view videos). */
export class NoHeatmapData extends ClipperError {
  constructor(videoId: string) {
    super("NoHeatmapData", `No heatmap data available for video ${videoId}`);
  }
}

export class DownloadFailure extends ClipperError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("DownloadFailure", message, options);
  }
}

export class EncodeFailure extends ClipperError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("EncodeFailure", message, options);
  }
}

export class TranscriptionFailure extends ClipperError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("TranscriptionFailure", message, options);
  }
}

export class ConfigError extends ClipperError {
  constructor(message: string) {
    super("ConfigError", message);
  }
}

export class ToolNotFound extends ClipperError {
  constructor(tool: string, hint: string) {
    super("ToolNotFound", `${tool} not found. ${hint}`);
  }
}

export type ClipFailure = DownloadFailure | EncodeFailure | TranscriptionFailure;

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export function isClipperError(error: unknown): error is ClipperError {
  return error instanceof ClipperError;
}
