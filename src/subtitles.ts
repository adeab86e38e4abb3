import fs from "node:fs";
import path from "node:path";

import { segmentResult } from "./recognition";
import { Cue, ExportDocument, ExportFormat, SegmentOptions } from "./types";

export const SRT_MIME_TYPE = "text/plain";

const EXPORT_FILE_NAMES: Record<ExportFormat, string> = {
  srt: "subtitle.srt",
  txt: "transcription.txt"
};

export function formatTimestamp(ms: number): string {
  const millis = Math.max(0, Math.floor(ms));
  const totalSeconds = Math.floor(millis / 1000);
  const remainderMillis = millis % 1000;
  const seconds = totalSeconds % 60;
  const totalMinutes = Math.floor(totalSeconds / 60);
  const minutes = totalMinutes % 60;
  const hours = Math.floor(totalMinutes / 60);
  return `${hours.toString().padStart(2, "0")}:${minutes
    .toString()
    .padStart(2, "0")}:${seconds.toString().padStart(2, "0")},${remainderMillis
    .toString()
    .padStart(3, "0")}`;
}

export function renderSrt(cues: readonly Cue[]): string {
  const chunks: string[] = [];
  for (const cue of cues) {
    chunks.push(`${cue.index}`);
    chunks.push(`${formatTimestamp(cue.start_ms)} --> ${formatTimestamp(cue.end_ms)}`);
    chunks.push(cue.text);
    chunks.push("");
  }
  return chunks.map((chunk) => `${chunk}\n`).join("");
}

export function writeSrtFile(cues: readonly Cue[], outputPath: string): void {
  const resolved = path.resolve(outputPath);
  fs.writeFileSync(resolved, renderSrt(cues), { encoding: "utf-8" });
}

export function exportDocument(content: string, format: ExportFormat): ExportDocument {
  return {
    fileName: EXPORT_FILE_NAMES[format],
    mimeType: SRT_MIME_TYPE,
    content
  };
}

export function srt(
  result: unknown,
  outputPath = EXPORT_FILE_NAMES.srt,
  options: SegmentOptions = {}
): string {
  let data: unknown;
  if (typeof result === "string") {
    const resolved = path.resolve(result);
    console.info(`Loading recognition result from ${resolved}`);
    const raw = fs.readFileSync(resolved, "utf-8");
    data = JSON.parse(raw);
  } else {
    data = result;
  }

  const cues = segmentResult(data, options);
  if (cues.length === 0) {
    throw new Error("No subtitle cues produced from recognition result.");
  }
  const resolvedOutput = path.resolve(outputPath);
  console.info(`Writing ${cues.length} subtitles to ${resolvedOutput}`);
  writeSrtFile(cues, resolvedOutput);
  return resolvedOutput;
}
