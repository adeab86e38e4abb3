import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";

import { SegmentationError } from "./errors";
import { DEFAULT_UI_MIN_MERGE_LENGTH } from "./segmenter";

export const MIN_MERGE_LENGTH_ENV = "SUBTITLE_MIN_MERGE_LENGTH";

export function loadEnvFile(filePath: string): void {
  const content = fs.readFileSync(filePath, "utf-8");
  const parsed = dotenv.parse(content);
  for (const [key, value] of Object.entries(parsed)) {
    if (process.env[key] === undefined) {
      process.env[key] = value;
    }
  }
}

export function candidateEnvPaths(extraPaths?: string[]): string[] {
  const seen = new Set<string>();
  const add = (p: string): void => {
    seen.add(path.resolve(p));
  };

  if (extraPaths) {
    for (const p of extraPaths) {
      add(p);
    }
  }

  add(path.join(process.cwd(), ".env"));

  const packageRoot = path.resolve(__dirname, "..");
  add(path.join(packageRoot, ".env"));

  return Array.from(seen);
}

/**
 * Reads the default merge threshold from the environment, falling back to the
 * first `.env` file that defines it. Already-exported variables win.
 */
export function resolveMinMergeLength(
  envVar = MIN_MERGE_LENGTH_ENV,
  options?: { searchPaths?: string[] }
): number {
  let raw = process.env[envVar];
  if (raw === undefined) {
    for (const envPath of candidateEnvPaths(options?.searchPaths)) {
      if (fs.existsSync(envPath)) {
        loadEnvFile(envPath);
        raw = process.env[envVar];
        if (raw !== undefined) {
          break;
        }
      }
    }
  }

  if (raw === undefined || raw.trim() === "") {
    return DEFAULT_UI_MIN_MERGE_LENGTH;
  }

  const value = Number(raw.trim());
  if (!Number.isInteger(value) || value <= 0) {
    throw new SegmentationError(
      "InvalidArgument",
      `${envVar} must be a positive integer, got "${raw}"`
    );
  }
  return value;
}
