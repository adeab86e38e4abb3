import { SegmentationError } from "./errors";
import { DEFAULT_MIN_MERGE_LENGTH, normalizeTimestamps, segment } from "./segmenter";
import { Cue, Recognition, RecognitionResult, SegmentOptions, TimestampPair } from "./types";

function isRecord(value: unknown): value is RecognitionResult {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseTimestamps(value: unknown): TimestampPair[] {
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new SegmentationError(
      "MalformedInput",
      `Recognition result "timestamp" must be a list, got ${typeof value}`
    );
  }
  return normalizeTimestamps(value);
}

/**
 * Validates a raw recognition result. Lists are unwrapped to their first item.
 * Missing text or timing degrades to empty values; present but ill-typed fields
 * raise `MalformedInput`.
 */
export function parseRecognitionResult(raw: unknown): Recognition {
  let data: unknown = raw;
  if (Array.isArray(raw)) {
    if (raw.length === 0) {
      throw new SegmentationError("MalformedInput", "Recognition result list is empty.");
    }
    data = raw[0];
  }

  if (!isRecord(data)) {
    throw new SegmentationError(
      "MalformedInput",
      `Recognition result must be an object, got ${data === null ? "null" : typeof data}`
    );
  }

  const text = data.text ?? "";
  if (typeof text !== "string") {
    throw new SegmentationError(
      "MalformedInput",
      `Recognition result "text" must be a string, got ${typeof text}`
    );
  }

  return { text, timestamps: parseTimestamps(data.timestamp) };
}

export function segmentResult(raw: unknown, options: SegmentOptions = {}): Cue[] {
  const { text, timestamps } = parseRecognitionResult(raw);
  return segment(text, timestamps, options.minMergeLength ?? DEFAULT_MIN_MERGE_LENGTH);
}
