import { Effect, Layer, Option } from "effect";
import { vitest } from "@effect/vitest";
import { ToolRunner, type ToolInvocation, type ToolResult } from "../../../tool-runner/index.js";
import type { ToolSpawnError } from "../../../tool-runner/errors.js";
import { encodePng } from "../../../raster/index.js";
import type { ResolutionProfile, SiteParameters } from "../../../site-parameters/types.js";

export const makeSiteParameters = (
  outputDir: string,
  overrides: Partial<SiteParameters> = {},
): SiteParameters => ({
  siteName: "TestSite",
  description: "RF Coverage Map",
  transmitter: {
    latitude: 40.264444,
    longitude: -76.883611,
    height: 5,
    frequencyMhz: 906.875,
    powerWatts: 1,
    antennaGainDbi: 6,
    erpWatts: 3.98,
  },
  receiver: {
    height: 2,
    threshold: -120,
    gainDbd: Option.none(),
  },
  radius: 100,
  resolution: 1200,
  model: {
    id: 1,
    mode: Option.none(),
    reliability: 50,
    confidence: 50,
  },
  terrain: {
    code: Option.none(),
    dielectric: Option.none(),
    conductivity: Option.none(),
    climateCode: Option.none(),
    groundClutter: Option.none(),
  },
  antenna: {
    pattern: Option.none(),
    rotation: Option.none(),
    downtilt: Option.none(),
    downtiltDirection: Option.none(),
    horizontalPolarization: false,
  },
  output: {
    useMetric: true,
    useDbm: true,
    knifeEdgeDiffraction: false,
    terrainBackground: false,
    createKmz: true,
    keepRaster: true,
    createLeafletManifest: false,
    debug: false,
  },
  paths: {
    engineBin: "/opt/engine/signalserver",
    engineHdBin: "/opt/engine/signalserverHD",
    terrainDir90m: "/data/90m",
    terrainDir30m: "/data/30m",
    outputDir,
    colorFile: Option.none(),
    converterBin: "gdal_translate",
  },
  engineTimeout: Option.none(),
  ...overrides,
});

export const makeProfile = (binary: string, overrides: Partial<ResolutionProfile> = {}): ResolutionProfile => ({
  resolution: 1200,
  tier: "standard",
  binary,
  terrainDir: "/data/90m",
  label: "Standard 90m SRTM3",
  ...overrides,
});

/**
 * 2x2 image: white and black sentinels on the top row, near-white and a
 * ramp colour below.
 */
export const SAMPLE_PIXELS = {
  width: 2,
  height: 2,
  channels: 4 as const,
  data: new Uint8Array([
    255, 255, 255, 255, 0, 0, 0, 255,
    254, 255, 255, 255, 10, 200, 30, 255,
  ]),
};

export const samplePng = (): Uint8Array => encodePng(SAMPLE_PIXELS);

export const succeeded = (stdout = "", stderr = ""): ToolResult => ({ exitCode: 0, stdout, stderr });

export const makeToolRunnerMock = () => {
  const run = vitest.fn<(invocation: ToolInvocation) => Effect.Effect<ToolResult, ToolSpawnError>>();
  run.mockReturnValue(Effect.succeed(succeeded()));
  return { run, layer: Layer.succeed(ToolRunner, { run }) };
};
