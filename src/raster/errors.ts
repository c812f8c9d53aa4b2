import { Data } from "effect";

export class ConversionFailedError extends Data.TaggedError("ConversionFailed")<{
  message: string;
  stderr?: string;
}> {
  public readonly stage = "raster" as const;
}

export class TransparencyMaskFailedError extends Data.TaggedError("TransparencyMaskFailed")<{
  message: string;
  cause?: unknown;
}> {
  public readonly stage = "raster" as const;
}

export class RasterCleanupFailedError extends Data.TaggedError("RasterCleanupFailed")<{
  path: string;
  message: string;
}> {
  public readonly stage = "raster" as const;
}

export type RasterError = ConversionFailedError | TransparencyMaskFailedError | RasterCleanupFailedError;
