export {
  DEFAULT_MIN_MERGE_LENGTH,
  DEFAULT_UI_MIN_MERGE_LENGTH,
  HARD_BREAK_CHARS,
  MIN_MERGE_LENGTH_RANGE,
  SOFT_BREAK_CHARS,
  assertMinMergeLength,
  clampMinMergeLength,
  classifyUnit,
  normalizeTimestamps,
  segment
} from "./segmenter";

export { parseRecognitionResult, segmentResult } from "./recognition";

export {
  SRT_MIME_TYPE,
  exportDocument,
  formatTimestamp,
  renderSrt,
  srt,
  writeSrtFile
} from "./subtitles";

export { SubtitleSession } from "./session";

export { MIN_MERGE_LENGTH_ENV, resolveMinMergeLength } from "./config";

export { SegmentationError } from "./errors";
export type { SegmentationErrorKind } from "./errors";

export type {
  Cue,
  ExportDocument,
  ExportFormat,
  Recognition,
  RecognitionResult,
  SegmentOptions,
  TimestampPair,
  UnitKind
} from "./types";
