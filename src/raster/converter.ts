import { Context, Effect, Layer } from "effect";
import { ToolRunner } from "../tool-runner/index.js";
import { ConversionFailedError } from "./errors.js";

export type RasterConverter = {
  /** Probes the converter so a missing tool is reported before the engine runs. */
  readonly ensureAvailable: () => Effect.Effect<void, ConversionFailedError>;
  /** Lossless conversion of `source` into a PNG at `destination`. */
  readonly toPng: (source: string, destination: string) => Effect.Effect<void, ConversionFailedError>;
};

export const RasterConverter = Context.GenericTag<RasterConverter>("@coverage-map/RasterConverter");

export const GdalRasterConverterLayer = (binary: string) => Layer.effect(
  RasterConverter,
  Effect.gen(function* () {
    const toolRunner = yield* ToolRunner;

    const exec = (args: ReadonlyArray<string>, failureMessage: string) => toolRunner.run({ command: binary, args }).pipe(
      Effect.catchTag("ToolSpawnFailed", (error) => Effect.fail(
        new ConversionFailedError({ message: `${failureMessage}: ${error.message}` })
      )),
      Effect.flatMap(({ exitCode, stderr }) => exitCode === 0
        ? Effect.void
        : Effect.fail(new ConversionFailedError({
          message: `${failureMessage}. Stderr: ${stderr.trim()}`,
          stderr,
        }))
      ),
    );

    return {
      ensureAvailable: () => exec(["--version"], `Raster converter '${binary}' is not available`),
      toPng: (source: string, destination: string) => exec(
        ["-of", "PNG", source, destination],
        `Failed to convert ${source} to PNG`,
      ).pipe(Effect.withSpan("raster.convert")),
    };
  })
);
