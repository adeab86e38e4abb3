export type TimestampPair = readonly [startMs: number, endMs: number];

export interface RecognitionResult {
  text?: unknown;
  timestamp?: unknown;
  [key: string]: unknown;
}

export interface Recognition {
  text: string;
  timestamps: TimestampPair[];
}

export interface Cue {
  index: number;
  start_ms: number;
  end_ms: number;
  text: string;
}

export type UnitKind = "content" | "hard-break" | "soft-break" | "whitespace";

export interface SegmentOptions {
  minMergeLength?: number;
}

export type ExportFormat = "srt" | "txt";

export interface ExportDocument {
  fileName: string;
  mimeType: string;
  content: string;
}
