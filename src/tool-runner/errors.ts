import { Data } from "effect";

export class ToolSpawnError extends Data.TaggedError("ToolSpawnFailed")<{
  command: string;
  message: string;
}> {}
