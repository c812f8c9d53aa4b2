import { type Duration, Effect, Option } from "effect";
import { FileSystem, Path } from "@effect/platform";
import { EngineArgumentBuilder } from "./argument-builder.js";
import { EngineExecutionFailedError, EngineNotFoundError, OutputMissingError } from "./errors.js";
import { ToolRunner } from "../tool-runner/index.js";
import type { ResolutionProfile, SiteParameters } from "../site-parameters/types.js";

export const RASTER_EXTENSION = "ppm";

export type EngineInvocation = {
  readonly binary: string;
  readonly args: ReadonlyArray<string>;
  readonly cwd: string;
  readonly outputPrefix: string;
};

export type RasterArtifact = {
  readonly path: string;
};

export const buildEngineArguments = (
  parameters: SiteParameters,
  profile: ResolutionProfile,
  outputPrefix: string,
): ReadonlyArray<string> => {
  const { transmitter, receiver, model, terrain, antenna, output } = parameters;

  return new EngineArgumentBuilder()
    .value("-sdf", profile.terrainDir)
    .optional("-color", parameters.paths.colorFile)
    .value("-lat", transmitter.latitude)
    .value("-lon", transmitter.longitude)
    .value("-txh", transmitter.height)
    .value("-f", transmitter.frequencyMhz)
    .value("-erp", transmitter.erpWatts)
    .value("-rxh", receiver.height)
    .value("-rt", receiver.threshold)
    .optional("-rxg", receiver.gainDbd)
    .optional("-te", terrain.code)
    .optional("-terdic", terrain.dielectric)
    .optional("-tercon", terrain.conductivity)
    .optional("-cl", terrain.climateCode)
    .optional("-gc", terrain.groundClutter)
    .value("-pm", model.id)
    .optional("-pe", model.mode)
    .value("-rel", model.reliability)
    .value("-conf", model.confidence)
    .optional("-ant", antenna.pattern)
    .optional("-rot", antenna.rotation)
    .optional("-dt", antenna.downtilt)
    .optional("-dtdir", antenna.downtiltDirection)
    .toggle("-hp", antenna.horizontalPolarization)
    .value("-R", parameters.radius)
    .value("-res", profile.resolution)
    .toggle("-m", output.useMetric)
    .toggle("-dbm", output.useDbm)
    .toggle("-ked", output.knifeEdgeDiffraction)
    .toggle("-t", output.terrainBackground)
    .toggle("-dbg", output.debug)
    .value("-o", outputPrefix)
    .build();
};

export const makeEngineInvocation = (
  parameters: SiteParameters,
  profile: ResolutionProfile,
): Effect.Effect<EngineInvocation, never, Path.Path> => Effect.gen(function* () {
  const path = yield* Path.Path;
  const outputPrefix = path.join(parameters.paths.outputDir, parameters.siteName);

  return Object.freeze({
    binary: profile.binary,
    args: Object.freeze(buildEngineArguments(parameters, profile, outputPrefix)),
    cwd: parameters.paths.outputDir,
    outputPrefix,
  });
});

export const rasterPathFor = (invocation: EngineInvocation): string =>
  `${invocation.outputPrefix}.${RASTER_EXTENSION}`;

export type UserIdentity = {
  readonly uid: number;
  readonly gids: ReadonlyArray<number>;
};

const currentUser = (): Option.Option<UserIdentity> =>
  process.getuid === undefined || process.getgid === undefined
    ? Option.none()
    : Option.some({
      uid: process.getuid(),
      gids: [process.getgid(), ...(process.getgroups?.() ?? [])],
    });

/**
 * Checks the one execute bit that applies to the user, as the kernel does.
 * Root needs any execute bit. Without a known user any bit counts.
 */
export const isExecutableBy = (
  info: Pick<FileSystem.File.Info, "mode" | "uid" | "gid">,
  user: Option.Option<UserIdentity>,
): boolean => {
  if (Option.isNone(user) || user.value.uid === 0) {
    return (info.mode & 0o111) !== 0;
  }
  const { uid, gids } = user.value;
  if (Option.contains(info.uid, uid)) {
    return (info.mode & 0o100) !== 0;
  }
  if (Option.exists(info.gid, (gid) => gids.includes(gid))) {
    return (info.mode & 0o010) !== 0;
  }
  return (info.mode & 0o001) !== 0;
};

/**
 * Fails when the selected binary is missing, is not a regular file, or has
 * no execute bit for the current user. Runs before anything is spawned or written.
 */
export const verifyEngineBinary = (
  profile: ResolutionProfile,
): Effect.Effect<void, EngineNotFoundError, FileSystem.FileSystem> => Effect.gen(function* () {
  const fs = yield* FileSystem.FileSystem;

  const info = yield* fs.stat(profile.binary).pipe(
    Effect.mapError(() => new EngineNotFoundError({
      binary: profile.binary,
      message: `Propagation engine binary not found: ${profile.binary}`,
    })),
  );

  if (info.type !== "File" || !isExecutableBy(info, currentUser())) {
    return yield* Effect.fail(new EngineNotFoundError({
      binary: profile.binary,
      message: `Propagation engine binary is not executable: ${profile.binary}`,
    }));
  }
});

export type RunEngineOptions = {
  readonly timeout: Option.Option<Duration.Duration>;
};

export const runEngine = (
  invocation: EngineInvocation,
  options: RunEngineOptions,
): Effect.Effect<RasterArtifact, EngineExecutionFailedError | OutputMissingError, ToolRunner | FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const toolRunner = yield* ToolRunner;
    const fs = yield* FileSystem.FileSystem;

    yield* Effect.logDebug(`Command: ${[invocation.binary, ...invocation.args].join(" ")}`);

    // The engine's own progress text is the only sign of life on long runs.
    const execution = toolRunner.run({
      command: invocation.binary,
      args: invocation.args,
      cwd: invocation.cwd,
      onOutput: (line) => line.trim() === "" ? Effect.void : Effect.logInfo(line.trim()),
    }).pipe(
      Effect.catchTag("ToolSpawnFailed", (error) => Effect.fail(
        new EngineExecutionFailedError({ message: `Propagation engine could not be started: ${error.message}` })
      )),
    );

    const { exitCode, stderr } = yield* Option.match(options.timeout, {
      onNone: () => execution,
      onSome: (duration) => execution.pipe(
        Effect.timeoutFail({
          duration,
          onTimeout: () => new EngineExecutionFailedError({ message: "Propagation engine timed out" }),
        }),
      ),
    });

    if (exitCode !== 0) {
      return yield* Effect.fail(new EngineExecutionFailedError({
        message: `Propagation engine exited with code ${exitCode}. Stderr: ${stderr.trim()}`,
        exitCode,
        stderr,
      }));
    }

    const rasterPath = rasterPathFor(invocation);
    const exists = yield* fs.exists(rasterPath).pipe(Effect.orElseSucceed(() => false));

    if (!exists) {
      return yield* Effect.fail(new OutputMissingError({
        path: rasterPath,
        message: `Propagation engine did not produce output file: ${rasterPath}`,
      }));
    }

    return { path: rasterPath };
  }).pipe(Effect.withSpan("engine.run"));
