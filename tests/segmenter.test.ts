import { describe, expect, it } from "vitest";

import { SegmentationError } from "../src/errors";
import {
  DEFAULT_MIN_MERGE_LENGTH,
  clampMinMergeLength,
  classifyUnit,
  segment
} from "../src/segmenter";
import { TimestampPair } from "../src/types";

function evenTimestamps(count: number, step = 100): TimestampPair[] {
  return Array.from({ length: count }, (_, i): TimestampPair => [i * step, (i + 1) * step]);
}

function captureError(fn: () => unknown): SegmentationError {
  try {
    fn();
  } catch (error) {
    if (error instanceof SegmentationError) {
      return error;
    }
    throw error;
  }
  throw new Error("expected a SegmentationError");
}

describe("classifyUnit", () => {
  it("classifies break characters before whitespace and content", () => {
    expect(classifyUnit("。")).toBe("hard-break");
    expect(classifyUnit("?")).toBe("hard-break");
    expect(classifyUnit("\n")).toBe("hard-break");
    expect(classifyUnit("、")).toBe("soft-break");
    expect(classifyUnit(" ")).toBe("soft-break");
    expect(classifyUnit("\t")).toBe("whitespace");
    expect(classifyUnit("　")).toBe("whitespace");
    expect(classifyUnit("好")).toBe("content");
    expect(classifyUnit(".")).toBe("content");
  });
});

describe("segment", () => {
  it("always ends a cue on hard-break punctuation", () => {
    const timestamps = evenTimestamps(4);
    const expected = [
      { index: 1, start_ms: 0, end_ms: 200, text: "你好。" },
      { index: 2, start_ms: 200, end_ms: 400, text: "世界！" }
    ];

    expect(segment("你好。世界！", timestamps, 1)).toEqual(expected);
    expect(segment("你好。世界！", timestamps, 50)).toEqual(expected);
  });

  it("merges short comma fragments until the threshold is reached", () => {
    const text = "短,句子,很长的内容";

    expect(segment(text, evenTimestamps(8), 10)).toEqual([
      { index: 1, start_ms: 0, end_ms: 800, text: "短,句子,很长的内容" }
    ]);
    expect(segment(text, evenTimestamps(8), 2)).toEqual([
      { index: 1, start_ms: 0, end_ms: 100, text: "短," },
      { index: 2, start_ms: 100, end_ms: 300, text: "句子," },
      { index: 3, start_ms: 300, end_ms: 800, text: "很长的内容" }
    ]);
  });

  it("counts absorbed punctuation towards the merge threshold", () => {
    expect(segment("一,二,三四", evenTimestamps(4), 4)).toEqual([
      { index: 1, start_ms: 0, end_ms: 200, text: "一,二," },
      { index: 2, start_ms: 200, end_ms: 400, text: "三四" }
    ]);
  });

  it("uses spaces as soft breaks and trims them from cue text", () => {
    const cues = segment("hello world, again", evenTimestamps(15, 10), 6);

    expect(cues).toEqual([
      { index: 1, start_ms: 0, end_ms: 50, text: "hello" },
      { index: 2, start_ms: 50, end_ms: 100, text: "world," },
      { index: 3, start_ms: 100, end_ms: 150, text: "again" }
    ]);
  });

  it("keeps other whitespace inside the cue", () => {
    expect(segment("甲\t乙", evenTimestamps(2), 1)).toEqual([
      { index: 1, start_ms: 0, end_ms: 200, text: "甲\t乙" }
    ]);
  });

  it("flushes trailing text without closing punctuation", () => {
    expect(segment("没有结尾的文字", evenTimestamps(7), DEFAULT_MIN_MERGE_LENGTH)).toEqual([
      { index: 1, start_ms: 0, end_ms: 700, text: "没有结尾的文字" }
    ]);
  });

  it("lets a hard break close a cue whose comma was absorbed", () => {
    expect(segment("短，！后", evenTimestamps(2), 10)).toEqual([
      { index: 1, start_ms: 0, end_ms: 100, text: "短，！" },
      { index: 2, start_ms: 100, end_ms: 200, text: "后" }
    ]);
  });

  it("returns no cues for empty or punctuation-only text", () => {
    expect(segment("", [], 10)).toEqual([]);
    expect(segment("，。！ ", evenTimestamps(3), 1)).toEqual([]);
    expect(segment("  \n", [], 10)).toEqual([]);
  });

  it("holds the last end time once timestamps run out", () => {
    expect(segment("一二三。四五", [[0, 100], [100, 200]], 10)).toEqual([
      { index: 1, start_ms: 0, end_ms: 200, text: "一二三。" },
      { index: 2, start_ms: 200, end_ms: 200, text: "四五" }
    ]);
  });

  it("keeps the text when no timestamps are available", () => {
    expect(segment("你好", [], 10)).toEqual([
      { index: 1, start_ms: 0, end_ms: 0, text: "你好" }
    ]);
  });

  it("never emits a cue that ends before it starts", () => {
    const [cue] = segment("甲乙", [[500, 600], [100, 200]], 10);
    expect(cue).toEqual({ index: 1, start_ms: 500, end_ms: 500, text: "甲乙" });
  });

  it("treats an astral character as a single unit", () => {
    expect(segment("😀好。", evenTimestamps(2), 10)).toEqual([
      { index: 1, start_ms: 0, end_ms: 200, text: "😀好。" }
    ]);
  });

  it("numbers cues from one without gaps and is repeatable", () => {
    const text = "第一句。第二句，还有更多内容，继续说下去！最后一句？";
    const units = [...text].filter((char) => classifyUnit(char) === "content").length;
    const timestamps = evenTimestamps(units, 120);

    const first = segment(text, timestamps, 4);
    const second = segment(text, timestamps, 4);

    expect(first.map((cue) => cue.index)).toEqual(
      Array.from({ length: first.length }, (_, i) => i + 1)
    );
    expect(first.every((cue) => cue.start_ms <= cue.end_ms)).toBe(true);
    expect(JSON.stringify(second)).toBe(JSON.stringify(first));
  });

  it("rounds fractional timestamps to whole milliseconds", () => {
    expect(segment("好", [[0.5, 1.5]], 10)).toEqual([
      { index: 1, start_ms: 1, end_ms: 2, text: "好" }
    ]);
  });

  it("rejects negative or non-finite timestamps", () => {
    const negative = captureError(() => segment("好", [[-5, 10]], 10));
    expect(negative.kind).toBe("MalformedInput");
    expect(negative.message).toBe("timestamp[0] must hold non-negative milliseconds: [-5,10]");

    const notANumber = captureError(() => segment("好好", [[0, 10], [10, Number.NaN]], 10));
    expect(notANumber.kind).toBe("MalformedInput");
    expect(notANumber.message).toBe("timestamp[1] must hold non-negative milliseconds: [10,null]");
  });

  it("rejects a threshold that is not a positive integer", () => {
    for (const value of [0, -1, 1.5, Number.NaN]) {
      const error = captureError(() => segment("你好", [], value));
      expect(error.kind).toBe("InvalidArgument");
    }
  });
});

describe("clampMinMergeLength", () => {
  it("rounds and clamps into the interactive range", () => {
    expect(clampMinMergeLength(3)).toBe(8);
    expect(clampMinMergeLength(100)).toBe(80);
    expect(clampMinMergeLength(15.4)).toBe(15);
    expect(clampMinMergeLength(20)).toBe(20);
  });

  it("rejects non-finite values", () => {
    expect(captureError(() => clampMinMergeLength(Number.POSITIVE_INFINITY)).kind).toBe(
      "InvalidArgument"
    );
  });
});
