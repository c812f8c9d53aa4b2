import { Config, ConfigError, ConfigProvider, Duration, Effect, Either, Option, Schema } from "effect";
import { FileSystem } from "@effect/platform";
import { SiteConfigError } from "./errors/site-config.error.js";
import { selectResolutionProfile } from "./site-parameters/resolution-profile.js";
import { RESOLUTIONS, type Resolution, type ResolutionProfile, type SiteParameters } from "./site-parameters/types.js";

type Range = {
  readonly min?: number;
  readonly max?: number;
  readonly exclusiveMin?: boolean;
  readonly integer?: boolean;
};

const SITE_NAME_PATTERN = /^[A-Za-z0-9._-]+$/;

// U+2212 shows up when coordinates are pasted from web pages.
export const normalizeMinusSign = (raw: string): string => raw.trim().replace(/−/g, "-");

// Two decimals, or three significant digits when that keeps more. An ERP of
// 0 switches the engine to path-loss plots, so small values must survive.
export const deriveErpWatts = (powerWatts: number, antennaGainDbi: number): number => {
  const erp = powerWatts * Math.pow(10, antennaGainDbi / 10);
  const decimals = Math.max(2, 2 - Math.floor(Math.log10(erp)));
  const scale = Math.pow(10, decimals);
  return Math.round(erp * scale) / scale;
};

const invalid = (name: string, message: string) => ConfigError.InvalidData([name], message);

const describeRange = ({ min, max, exclusiveMin }: Range): string => {
  if (min !== undefined && max !== undefined) return `between ${min} and ${max}`;
  if (min !== undefined) return exclusiveMin ? `greater than ${min}` : `at least ${min}`;
  return `at most ${max}`;
};

const parseNumber = (name: string, range: Range) =>
  (raw: string): Either.Either<number, ConfigError.ConfigError> => {
    const normalized = normalizeMinusSign(raw);
    const value = Number(normalized);

    if (normalized === "" || !Number.isFinite(value)) {
      return Either.left(invalid(name, `${name} must be a number, got "${raw}"`));
    }
    if (range.integer && !Number.isInteger(value)) {
      return Either.left(invalid(name, `${name} must be a whole number, got ${value}`));
    }

    const belowMin = range.min !== undefined && (range.exclusiveMin ? value <= range.min : value < range.min);
    const aboveMax = range.max !== undefined && value > range.max;
    if (belowMin || aboveMax) {
      return Either.left(invalid(name, `${name} must be ${describeRange(range)}, got ${value}`));
    }

    return Either.right(value);
  };

const requiredNumber = (name: string, range: Range = {}) =>
  Config.string(name).pipe(Config.mapOrFail(parseNumber(name, range)));

// Blank values count as unset so the engine keeps its own defaults.
const optionalString = (name: string) =>
  Config.option(Config.string(name)).pipe(
    Config.map((value: Option.Option<string>) => Option.filter(value, (raw) => raw.trim() !== "")),
  );

const optionalNumber = (name: string, range: Range = {}) =>
  optionalString(name).pipe(
    Config.mapOrFail((value): Either.Either<Option.Option<number>, ConfigError.ConfigError> =>
      Option.match(value, {
        onNone: () => Either.right(Option.none()),
        onSome: (raw) => Either.map(parseNumber(name, range)(raw), Option.some),
      })
    ),
  );

const numberOrDefault = (name: string, fallback: number, range: Range = {}) =>
  optionalNumber(name, range).pipe(
    Config.map((value: Option.Option<number>) => Option.getOrElse(value, () => fallback)),
  );

const flag = (name: string, fallback: boolean) =>
  Config.boolean(name).pipe(Config.withDefault(fallback));

const siteName = Config.string("SITE_NAME").pipe(
  Config.mapOrFail((raw) => {
    const name = raw.trim();
    if (name === "" || name === "." || name === ".." || !SITE_NAME_PATTERN.test(name)) {
      return Either.left(invalid(
        "SITE_NAME",
        `site name "${raw}" must be non-empty and contain only letters, digits, ".", "_" or "-"`,
      ));
    }
    return Either.right(name);
  }),
);

const resolution = numberOrDefault("RESOLUTION", 1200).pipe(
  Config.mapOrFail((value): Either.Either<Resolution, ConfigError.ConfigError> => {
    const match = RESOLUTIONS.find((candidate) => candidate === value);
    return match === undefined
      ? Either.left(invalid("RESOLUTION", `RESOLUTION must be one of ${RESOLUTIONS.join(", ")}, got ${value}`))
      : Either.right(match);
  }),
);

export const SiteConfig = Config.all({
  siteName,
  description: Config.string("SITE_DESCRIPTION").pipe(Config.withDefault("RF Coverage Map")),

  engineBin: Config.string("ENGINE_BIN"),
  engineHdBin: Config.string("ENGINE_HD_BIN"),
  terrainDir90m: Config.string("SDF_DIR_90M"),
  terrainDir30m: Config.string("SDF_DIR_30M"),
  outputDir: Config.string("OUTPUT_DIR"),
  colorFile: optionalString("COLOR_FILE"),
  converterBin: Config.string("CONVERTER_BIN").pipe(Config.withDefault("gdal_translate")),

  latitude: requiredNumber("TX_LAT", { min: -70, max: 70 }),
  longitude: requiredNumber("TX_LON", { min: -180, max: 180 }),
  txHeight: requiredNumber("TX_HEIGHT", { min: 0 }),
  frequencyMhz: requiredNumber("TX_FREQ", { min: 20, max: 100000 }),
  powerWatts: requiredNumber("TX_POWER_WATTS", { min: 0, exclusiveMin: true }),
  antennaGainDbi: numberOrDefault("TX_ANTENNA_DBI", 0),

  rxHeight: requiredNumber("RX_HEIGHT", { min: 0 }),
  rxThreshold: requiredNumber("RX_THRESHOLD"),
  rxGain: optionalNumber("RX_GAIN"),

  radius: requiredNumber("RADIUS", { min: 0, exclusiveMin: true }),
  resolution,

  propagationModel: numberOrDefault("PROP_MODEL", 1, { min: 1, max: 12, integer: true }),
  propagationMode: optionalNumber("PROP_MODE", { min: 1, max: 3, integer: true }),
  reliability: numberOrDefault("RELIABILITY", 50, { min: 1, max: 99 }),
  confidence: numberOrDefault("CONFIDENCE", 50, { min: 1, max: 99 }),

  terrainCode: optionalNumber("TERRAIN_CODE", { min: 1, max: 6, integer: true }),
  terrainDielectric: optionalNumber("TERRAIN_DIELECTRIC", { min: 2, max: 80 }),
  terrainConductivity: optionalNumber("TERRAIN_CONDUCTIVITY", { min: 0.0001, max: 0.01 }),
  climateCode: optionalNumber("CLIMATE_CODE", { min: 1, max: 7, integer: true }),
  groundClutter: optionalNumber("GROUND_CLUTTER", { min: 0 }),

  antennaPattern: optionalString("ANTENNA_PATTERN"),
  antennaRotation: optionalNumber("ANTENNA_ROTATION", { min: 0, max: 359 }),
  antennaDowntilt: optionalNumber("ANTENNA_DOWNTILT", { min: -10, max: 90 }),
  antennaDowntiltDirection: optionalNumber("ANTENNA_DOWNTILT_DIR", { min: 0, max: 359 }),
  horizontalPolarization: flag("HORIZONTAL_POL", false),

  useMetric: flag("USE_METRIC", true),
  useDbm: flag("USE_DBM", true),
  knifeEdgeDiffraction: flag("KNIFE_EDGE_DIFFRACTION", false),
  terrainBackground: flag("TERRAIN_BACKGROUND", false),
  createKmz: flag("CREATE_KMZ", true),
  keepRaster: flag("KEEP_PPM", true),
  createLeafletManifest: flag("CREATE_LEAFLET_MANIFEST", false),
  debug: flag("DEBUG", false),

  engineTimeoutSeconds: optionalNumber("ENGINE_TIMEOUT_SECONDS", { min: 0, exclusiveMin: true }),
});

type RawSiteConfig = Effect.Effect.Success<typeof SiteConfig>;

export const toSiteParameters = (raw: RawSiteConfig): SiteParameters => ({
  siteName: raw.siteName,
  description: raw.description,
  transmitter: {
    latitude: raw.latitude,
    longitude: raw.longitude,
    height: raw.txHeight,
    frequencyMhz: raw.frequencyMhz,
    powerWatts: raw.powerWatts,
    antennaGainDbi: raw.antennaGainDbi,
    erpWatts: deriveErpWatts(raw.powerWatts, raw.antennaGainDbi),
  },
  receiver: {
    height: raw.rxHeight,
    threshold: raw.rxThreshold,
    gainDbd: raw.rxGain,
  },
  radius: raw.radius,
  resolution: raw.resolution,
  model: {
    id: raw.propagationModel,
    mode: raw.propagationMode,
    reliability: raw.reliability,
    confidence: raw.confidence,
  },
  terrain: {
    code: raw.terrainCode,
    dielectric: raw.terrainDielectric,
    conductivity: raw.terrainConductivity,
    climateCode: raw.climateCode,
    groundClutter: raw.groundClutter,
  },
  antenna: {
    pattern: raw.antennaPattern,
    rotation: raw.antennaRotation,
    downtilt: raw.antennaDowntilt,
    downtiltDirection: raw.antennaDowntiltDirection,
    horizontalPolarization: raw.horizontalPolarization,
  },
  output: {
    useMetric: raw.useMetric,
    useDbm: raw.useDbm,
    knifeEdgeDiffraction: raw.knifeEdgeDiffraction,
    terrainBackground: raw.terrainBackground,
    createKmz: raw.createKmz,
    keepRaster: raw.keepRaster,
    createLeafletManifest: raw.createLeafletManifest,
    debug: raw.debug,
  },
  paths: {
    engineBin: raw.engineBin,
    engineHdBin: raw.engineHdBin,
    terrainDir90m: raw.terrainDir90m,
    terrainDir30m: raw.terrainDir30m,
    outputDir: raw.outputDir,
    colorFile: raw.colorFile,
    converterBin: raw.converterBin,
  },
  engineTimeout: Option.map(raw.engineTimeoutSeconds, Duration.seconds),
});

export type ResolvedSiteConfig = {
  readonly parameters: SiteParameters;
  readonly profile: ResolutionProfile;
};

/**
 * Reads the flat site configuration from the current `ConfigProvider`,
 * validates it and selects the resolution profile for the run.
 */
export const resolveSiteConfig: Effect.Effect<ResolvedSiteConfig, SiteConfigError> = Effect.gen(function* () {
  const parameters = yield* SiteConfig.pipe(
    Effect.map(toSiteParameters),
    Effect.mapError((error) => new SiteConfigError({ message: `Invalid configuration: ${String(error)}` })),
  );

  const profile = selectResolutionProfile(parameters.resolution, parameters.paths);

  yield* Effect.logInfo(`Using ${profile.tier} engine for ${profile.resolution} resolution (${profile.label})`, {
    binary: profile.binary,
    terrainDir: profile.terrainDir,
  });

  return { parameters, profile };
});

const ConfigFileSchema = Schema.parseJson(
  Schema.Record({
    key: Schema.String,
    value: Schema.Union(Schema.String, Schema.Number, Schema.Boolean),
  }),
);

/**
 * A flat JSON object of the same names as the environment variables.
 * Values missing from the file fall back to the environment.
 */
export const configProviderFromFile = (
  filePath: string,
): Effect.Effect<ConfigProvider.ConfigProvider, SiteConfigError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const json = yield* fs.readFileString(filePath);
    const values = yield* Schema.decodeUnknown(ConfigFileSchema)(json);

    const entries = Object.entries(values).map(([key, value]): [string, string] => [key, String(value)]);

    return ConfigProvider.fromMap(new Map(entries)).pipe(
      ConfigProvider.orElse(() => ConfigProvider.fromEnv()),
    );
  }).pipe(
    Effect.mapError((error) => new SiteConfigError({
      message: `Unable to read config file ${filePath}: ${error.message}`,
    })),
  );
