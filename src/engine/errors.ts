import { Data } from "effect";

export class EngineNotFoundError extends Data.TaggedError("EngineNotFound")<{
  binary: string;
  message: string;
}> {
  public readonly stage = "engine" as const;
}

export class EngineExecutionFailedError extends Data.TaggedError("EngineExecutionFailed")<{
  message: string;
  exitCode?: number;
  stderr?: string;
}> {
  public readonly stage = "engine" as const;
}

// The engine exited cleanly but never wrote its raster.
export class OutputMissingError extends Data.TaggedError("OutputMissing")<{
  path: string;
  message: string;
}> {
  public readonly stage = "engine" as const;
}

export type EngineError = EngineNotFoundError | EngineExecutionFailedError | OutputMissingError;
