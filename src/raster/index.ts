import { Effect } from "effect";
import { FileSystem, Path } from "@effect/platform";
import { PNG } from "pngjs";
import { RasterConverter } from "./converter.js";
import { ConversionFailedError, RasterCleanupFailedError, TransparencyMaskFailedError } from "./errors.js";
import { applyTransparencyMask, type PixelBuffer } from "./transparency-mask.js";
import type { RasterArtifact } from "../engine/index.js";

export type PostProcessOptions = {
  readonly siteName: string;
  readonly outputDir: string;
  readonly keepRaster: boolean;
};

export type FinalImage = {
  readonly path: string;
  readonly width: number;
  readonly height: number;
};

export const decodePng = (bytes: Uint8Array): PixelBuffer => {
  // pngjs always hands back 8-bit RGBA regardless of the source colour type.
  const png = PNG.sync.read(Buffer.from(bytes));
  return { width: png.width, height: png.height, channels: 4, data: new Uint8Array(png.data) };
};

export const encodePng = (pixels: PixelBuffer): Uint8Array => {
  const png = new PNG({ width: pixels.width, height: pixels.height, colorType: 6 });
  png.data = Buffer.from(pixels.data);
  return new Uint8Array(PNG.sync.write(png, { colorType: 6 }));
};

const maskFailed = (message: string) => (cause: unknown) =>
  new TransparencyMaskFailedError({
    message: `${message}: ${cause instanceof Error ? cause.message : String(cause)}`,
    cause,
  });

/**
 * Converts the engine raster to `<site>.png` and replaces it with a
 * transparency-masked RGBA version. The raw raster is removed afterwards
 * unless it is to be kept.
 */
export const postProcessRaster = (
  raster: RasterArtifact,
  options: PostProcessOptions,
): Effect.Effect<
  FinalImage,
  ConversionFailedError | TransparencyMaskFailedError | RasterCleanupFailedError,
  RasterConverter | FileSystem.FileSystem | Path.Path
> => Effect.gen(function* () {
  const converter = yield* RasterConverter;
  const fs = yield* FileSystem.FileSystem;
  const path = yield* Path.Path;

  const imagePath = path.join(options.outputDir, `${options.siteName}.png`);
  const maskedPath = path.join(options.outputDir, `${options.siteName}_transparent.png`);

  yield* converter.toPng(raster.path, imagePath);

  const converted = yield* fs.readFile(imagePath).pipe(
    Effect.mapError((error) => new ConversionFailedError({
      message: `Converted image ${imagePath} could not be read: ${error.message}`,
    })),
  );

  const masked = yield* Effect.try({
    try: () => applyTransparencyMask(decodePng(converted)),
    catch: maskFailed(`Failed to add transparency to ${imagePath}`),
  });

  const encoded = yield* Effect.try({
    try: () => encodePng(masked),
    catch: maskFailed(`Failed to encode ${maskedPath}`),
  });

  // Written beside the converted image first, then swapped into place.
  yield* fs.writeFile(maskedPath, encoded).pipe(
    Effect.zipRight(fs.rename(maskedPath, imagePath)),
    Effect.mapError(maskFailed(`Failed to write ${imagePath}`)),
  );

  if (!options.keepRaster) {
    yield* fs.remove(raster.path).pipe(
      Effect.mapError((error) => new RasterCleanupFailedError({
        path: raster.path,
        message: `Failed to remove intermediate raster ${raster.path}: ${error.message}`,
      })),
    );
  }

  yield* Effect.logInfo(`PNG created: ${imagePath}`);

  return { path: imagePath, width: masked.width, height: masked.height };
}).pipe(Effect.withSpan("raster.postProcess"));
