import { Effect, Option, Schema } from "effect";
import { FileSystem, Path } from "@effect/platform";
import JSZip from "jszip";
import { DescriptorWriteFailedError, PackagingFailedError } from "./errors.js";
import { renderKml } from "./kml.js";
import { addToManifestIndex, MANIFEST_INDEX_FILE, toLeafletManifest, type ManifestIndex } from "./leaflet-manifest.js";
import type { OverlayDescriptor, OverlayPackage } from "./types.js";

export type PackageOptions = {
  readonly outputDir: string;
  readonly imagePath: string;
  readonly createKmz: boolean;
  readonly createLeafletManifest: boolean;
};

const ManifestIndexSchema = Schema.parseJson(Schema.Struct({
  manifests: Schema.Array(Schema.String),
}));

/**
 * Adds the manifest to `index.json` in the output directory, creating the
 * index when it does not exist yet.
 */
const updateManifestIndex = (
  outputDir: string,
  manifestName: string,
): Effect.Effect<string, DescriptorWriteFailedError, FileSystem.FileSystem | Path.Path> => Effect.gen(function* () {
  const fs = yield* FileSystem.FileSystem;
  const path = yield* Path.Path;
  const indexPath = path.join(outputDir, MANIFEST_INDEX_FILE);

  const current = yield* fs.exists(indexPath).pipe(
    Effect.flatMap((exists): Effect.Effect<ManifestIndex, Error> => exists
      ? fs.readFileString(indexPath).pipe(Effect.flatMap(Schema.decodeUnknown(ManifestIndexSchema)))
      : Effect.succeed({ manifests: [] })),
    Effect.mapError((error) => new DescriptorWriteFailedError({
      path: indexPath,
      message: `Unable to read manifest index ${indexPath}: ${error.message}`,
    })),
  );

  yield* fs.writeFileString(indexPath, JSON.stringify(addToManifestIndex(current, manifestName), null, 2)).pipe(
    Effect.mapError((error) => new DescriptorWriteFailedError({
      path: indexPath,
      message: `Failed to write manifest index ${indexPath}: ${error.message}`,
    })),
  );

  return indexPath;
});

/** Zips the given files flat, each under its own name. */
export const buildArchive = (
  entries: ReadonlyArray<{ readonly name: string; readonly data: Uint8Array }>,
): Promise<Uint8Array> => {
  const zip = new JSZip();
  for (const entry of entries) {
    zip.file(entry.name, entry.data);
  }
  return zip.generateAsync({ type: "uint8array", compression: "DEFLATE" });
};

export const packageOverlay = (
  descriptor: OverlayDescriptor,
  options: PackageOptions,
): Effect.Effect<
  OverlayPackage,
  DescriptorWriteFailedError | PackagingFailedError,
  FileSystem.FileSystem | Path.Path
> => Effect.gen(function* () {
  const fs = yield* FileSystem.FileSystem;
  const path = yield* Path.Path;
  const siteName = descriptor.metadata.siteName;

  const descriptorName = `${siteName}.kml`;
  const descriptorPath = path.join(options.outputDir, descriptorName);

  yield* fs.writeFileString(descriptorPath, renderKml(descriptor)).pipe(
    Effect.mapError((error) => new DescriptorWriteFailedError({
      path: descriptorPath,
      message: `Failed to create KML file ${descriptorPath}: ${error.message}`,
    })),
  );
  yield* Effect.logInfo(`KML created: ${descriptorPath}`);

  const manifestPath = options.createLeafletManifest
    ? Option.some(path.join(options.outputDir, `${siteName}.json`))
    : Option.none<string>();

  if (Option.isSome(manifestPath)) {
    const manifest = JSON.stringify(toLeafletManifest(descriptor), null, 2);
    yield* fs.writeFileString(manifestPath.value, manifest).pipe(
      Effect.mapError((error) => new DescriptorWriteFailedError({
        path: manifestPath.value,
        message: `Failed to create Leaflet manifest ${manifestPath.value}: ${error.message}`,
      })),
    );
    yield* Effect.logInfo(`Leaflet manifest created: ${manifestPath.value}`);
  }

  const manifestIndexPath = Option.isSome(manifestPath)
    ? Option.some(yield* updateManifestIndex(options.outputDir, path.basename(manifestPath.value)))
    : Option.none<string>();

  const archivePath = options.createKmz
    ? Option.some(path.join(options.outputDir, `${siteName}.kmz`))
    : Option.none<string>();

  if (Option.isSome(archivePath)) {
    const packagingFailed = (message: string) => (cause: unknown) => new PackagingFailedError({
      path: archivePath.value,
      message: `${message}: ${cause instanceof Error ? cause.message : String(cause)}`,
      cause,
    });

    const [descriptorBytes, imageBytes] = yield* Effect.all([
      fs.readFile(descriptorPath),
      fs.readFile(options.imagePath),
    ]).pipe(Effect.mapError(packagingFailed("Failed to read files for KMZ")));

    const archive = yield* Effect.tryPromise({
      try: () => buildArchive([
        { name: descriptorName, data: descriptorBytes },
        { name: path.basename(options.imagePath), data: imageBytes },
      ]),
      catch: packagingFailed("Failed to create KMZ file"),
    });

    yield* fs.writeFile(archivePath.value, archive).pipe(
      Effect.mapError(packagingFailed(`Failed to write ${archivePath.value}`)),
    );
    yield* Effect.logInfo(`KMZ created: ${archivePath.value}`);
  }

  return Object.freeze({
    imagePath: options.imagePath,
    descriptorPath,
    bounds: descriptor.bounds,
    metadata: descriptor.metadata,
    archivePath,
    manifestPath,
    manifestIndexPath,
  });
}).pipe(Effect.withSpan("overlay.package"));
