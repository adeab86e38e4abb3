import { parseRecognitionResult } from "./recognition";
import { DEFAULT_UI_MIN_MERGE_LENGTH, clampMinMergeLength, segment } from "./segmenter";
import { exportDocument, renderSrt } from "./subtitles";
import { Cue, ExportDocument, ExportFormat, TimestampPair } from "./types";

interface FrozenRecognition {
  readonly text: string;
  readonly timestamps: readonly TimestampPair[];
}

/**
 * Keeps one recognition result and the cue list derived from it. Changing the
 * merge threshold recomputes every cue from scratch and replaces the list.
 */
export class SubtitleSession {
  readonly recognition: FrozenRecognition;
  private threshold: number;
  private currentCues: readonly Readonly<Cue>[];

  constructor(result: unknown, minMergeLength = DEFAULT_UI_MIN_MERGE_LENGTH) {
    const parsed = parseRecognitionResult(result);
    this.recognition = Object.freeze({
      text: parsed.text,
      timestamps: Object.freeze([...parsed.timestamps])
    });
    this.threshold = clampMinMergeLength(minMergeLength);
    this.currentCues = this.compute();
  }

  get minMergeLength(): number {
    return this.threshold;
  }

  get cues(): readonly Readonly<Cue>[] {
    return this.currentCues;
  }

  setMinMergeLength(value: number): readonly Readonly<Cue>[] {
    this.threshold = clampMinMergeLength(value);
    this.currentCues = this.compute();
    return this.currentCues;
  }

  toSrt(): string {
    return renderSrt(this.currentCues);
  }

  toPlainText(): string {
    return this.recognition.text;
  }

  export(format: ExportFormat): ExportDocument {
    return exportDocument(format === "srt" ? this.toSrt() : this.toPlainText(), format);
  }

  private compute(): readonly Readonly<Cue>[] {
    const cues = segment(this.recognition.text, this.recognition.timestamps, this.threshold);
    return Object.freeze(cues.map((cue) => Object.freeze(cue)));
  }
}
