import { SegmentationError } from "./errors";
import { Cue, TimestampPair, UnitKind } from "./types";

export const HARD_BREAK_CHARS: ReadonlySet<string> = new Set([
  "。", "？", "！", "；", "：", "?", "!", ";", ":", "\n"
]);
export const SOFT_BREAK_CHARS: ReadonlySet<string> = new Set(["，", "、", ",", " "]);

export const DEFAULT_MIN_MERGE_LENGTH = 10;
export const DEFAULT_UI_MIN_MERGE_LENGTH = 15;
export const MIN_MERGE_LENGTH_RANGE = { min: 8, max: 80 } as const;

const WHITESPACE = /^\s$/u;

/**
 * Timing of the cue being accumulated. A cue stays `pending` until its first
 * content unit that still has a timestamp available.
 */
type CueTiming = { state: "pending" } | { state: "started"; startMs: number };

interface CueBuffer {
  units: string[];
  hasContent: boolean;
  timing: CueTiming;
}

function emptyBuffer(): CueBuffer {
  return { units: [], hasContent: false, timing: { state: "pending" } };
}

export function classifyUnit(char: string): UnitKind {
  if (HARD_BREAK_CHARS.has(char)) {
    return "hard-break";
  }
  if (SOFT_BREAK_CHARS.has(char)) {
    return "soft-break";
  }
  if (WHITESPACE.test(char)) {
    return "whitespace";
  }
  return "content";
}

export function assertMinMergeLength(value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new SegmentationError(
      "InvalidArgument",
      `minMergeLength must be a positive integer, got ${value}`
    );
  }
}

/**
 * Rounds and clamps a user-supplied threshold into the range offered by
 * interactive callers (8 to 80 characters).
 */
export function clampMinMergeLength(value: number): number {
  if (!Number.isFinite(value)) {
    throw new SegmentationError(
      "InvalidArgument",
      `minMergeLength must be a finite number, got ${value}`
    );
  }
  const rounded = Math.round(value);
  return Math.min(MIN_MERGE_LENGTH_RANGE.max, Math.max(MIN_MERGE_LENGTH_RANGE.min, rounded));
}

function isTimeValue(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value) && value >= 0;
}

/**
 * Checks every pair up front and rounds it to whole milliseconds. Negative,
 * non-finite or non-numeric bounds raise `MalformedInput`.
 */
export function normalizeTimestamps(entries: readonly unknown[]): TimestampPair[] {
  return entries.map((entry, idx): TimestampPair => {
    if (!Array.isArray(entry) || entry.length !== 2) {
      throw new SegmentationError(
        "MalformedInput",
        `timestamp[${idx}] must be a [start_ms, end_ms] pair: ${JSON.stringify(entry)}`
      );
    }
    const [start, end]: unknown[] = entry;
    if (!isTimeValue(start) || !isTimeValue(end)) {
      throw new SegmentationError(
        "MalformedInput",
        `timestamp[${idx}] must hold non-negative milliseconds: ${JSON.stringify(entry)}`
      );
    }
    return [Math.round(start), Math.round(end)];
  });
}

/**
 * Splits recognised text into subtitle cues.
 *
 * Hard-break punctuation always closes the current cue. Soft-break punctuation
 * closes it only once the buffered text (punctuation and spaces included) is at
 * least `minMergeLength` code points long; shorter fragments are merged into
 * the next one. Each content unit consumes one timestamp pair in order; content
 * past the end of `timestamps` keeps the last known end time. Pairs are
 * rounded to whole milliseconds; invalid ones raise `MalformedInput`.
 */
export function segment(
  text: string,
  timestamps: readonly TimestampPair[],
  minMergeLength: number = DEFAULT_MIN_MERGE_LENGTH
): Cue[] {
  assertMinMergeLength(minMergeLength);
  const pairs = normalizeTimestamps(timestamps);

  const cues: Cue[] = [];
  let buffer = emptyBuffer();
  let cursor = 0;
  let lastEndMs = 0;

  const flush = (): void => {
    const body = buffer.units.join("").trim();
    if (buffer.hasContent && body.length > 0) {
      const startMs = buffer.timing.state === "started" ? buffer.timing.startMs : lastEndMs;
      cues.push({
        index: cues.length + 1,
        start_ms: startMs,
        end_ms: Math.max(startMs, lastEndMs),
        text: body
      });
    }
    buffer = emptyBuffer();
  };

  for (const char of text) {
    const kind = classifyUnit(char);
    buffer.units.push(char);

    if (kind === "content") {
      buffer.hasContent = true;
      if (cursor < pairs.length) {
        const [startMs, endMs] = pairs[cursor];
        if (buffer.timing.state === "pending") {
          buffer.timing = { state: "started", startMs };
        }
        lastEndMs = endMs;
        cursor += 1;
      }
    } else if (kind === "hard-break") {
      flush();
    } else if (kind === "soft-break" && buffer.units.length >= minMergeLength) {
      flush();
    }
  }

  flush();
  return cues;
}
