import { Data } from "effect";

export class OutputDirectoryError extends Data.TaggedError("OutputDirectoryFailed")<{
  path: string;
  message: string;
}> {
  public readonly stage = "output" as const;
}
