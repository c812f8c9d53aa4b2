import { Data } from "effect";

export class SiteConfigError extends Data.TaggedError("ConfigError")<{
  message: string;
}> {
  public readonly stage = "config" as const;
}
