export type SegmentationErrorKind = "InvalidArgument" | "MalformedInput";

export class SegmentationError extends Error {
  constructor(
    public readonly kind: SegmentationErrorKind,
    message: string
  ) {
    super(message);
    this.name = "SegmentationError";
  }
}
