import { Effect } from "effect";
import { FileSystem, Path } from "@effect/platform";
import { calculateBounds } from "./bounds.js";
import { makeEngineInvocation, runEngine, verifyEngineBinary } from "./engine/index.js";
import type { EngineError } from "./engine/errors.js";
import { OutputDirectoryError } from "./errors/output-directory.error.js";
import { EventLogger } from "./event-logger/index.js";
import type { IEventLogger } from "./event-logger/types.js";
import { describeOverlay } from "./overlay/kml.js";
import { packageOverlay } from "./overlay/index.js";
import type { OverlayError } from "./overlay/errors.js";
import type { OverlayPackage } from "./overlay/types.js";
import { postProcessRaster } from "./raster/index.js";
import { RasterConverter } from "./raster/converter.js";
import type { RasterError } from "./raster/errors.js";
import type { ResolutionProfile, SiteParameters } from "./site-parameters/types.js";
import type { ToolRunner } from "./tool-runner/index.js";

export type CoverageMapError = OutputDirectoryError | EngineError | RasterError | OverlayError;

export type CoverageMapRequirements =
  | ToolRunner
  | RasterConverter
  | FileSystem.FileSystem
  | Path.Path;

/**
 * Runs the stages strictly in order: bounds, tool checks, engine, raster
 * post-processing, packaging. Nothing is written before both tools pass
 * their checks.
 */
export class CoverageMapGenerator {
  public constructor(
    private readonly eventLogger: IEventLogger = new EventLogger(),
  ) { }

  public generate(
    parameters: SiteParameters,
    profile: ResolutionProfile,
  ): Effect.Effect<OverlayPackage, CoverageMapError, CoverageMapRequirements> {
    const deps = this;
    const outputDir = parameters.paths.outputDir;

    return Effect.gen(function* () {
      const fs = yield* FileSystem.FileSystem;
      const converter = yield* RasterConverter;

      const bounds = calculateBounds(parameters.transmitter, parameters.radius, parameters.output.useMetric);
      yield* deps.eventLogger.onBoundsCalculated(bounds);

      yield* verifyEngineBinary(profile);
      yield* converter.ensureAvailable();

      yield* fs.makeDirectory(outputDir, { recursive: true }).pipe(
        Effect.mapError((error) => new OutputDirectoryError({
          path: outputDir,
          message: `Unable to create output directory ${outputDir}: ${error.message}`,
        })),
      );

      const invocation = yield* makeEngineInvocation(parameters, profile);
      yield* deps.eventLogger.onEngineStarted(invocation);

      const raster = yield* runEngine(invocation, { timeout: parameters.engineTimeout });
      yield* deps.eventLogger.onEngineCompleted(raster.path);

      const image = yield* postProcessRaster(raster, {
        siteName: parameters.siteName,
        outputDir,
        keepRaster: parameters.output.keepRaster,
      });

      const result = yield* packageOverlay(describeOverlay(parameters, profile, bounds), {
        outputDir,
        imagePath: image.path,
        createKmz: parameters.output.createKmz,
        createLeafletManifest: parameters.output.createLeafletManifest,
      });

      yield* deps.eventLogger.onCompleted(parameters, profile, result);

      return result;
    }).pipe(
      Effect.annotateLogs({ site: parameters.siteName }),
      Effect.withSpan("coverage-map.generate"),
    );
  }
}
