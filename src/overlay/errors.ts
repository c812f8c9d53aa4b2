import { Data } from "effect";

export class DescriptorWriteFailedError extends Data.TaggedError("DescriptorWriteFailed")<{
  path: string;
  message: string;
}> {
  public readonly stage = "overlay" as const;
}

export class PackagingFailedError extends Data.TaggedError("PackagingFailed")<{
  path: string;
  message: string;
  cause?: unknown;
}> {
  public readonly stage = "overlay" as const;
}

export type OverlayError = DescriptorWriteFailedError | PackagingFailedError;
