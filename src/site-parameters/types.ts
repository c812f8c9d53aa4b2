import type { Duration, Option } from "effect";

export const RESOLUTIONS = [300, 600, 1200, 3600] as const;

/** Pixels per degree of terrain tile; 3600 needs 1 arc-second (30m) terrain data. */
export type Resolution = typeof RESOLUTIONS[number];

export type Transmitter = {
  readonly latitude: number;
  readonly longitude: number;
  readonly height: number;
  readonly frequencyMhz: number;
  readonly powerWatts: number;
  readonly antennaGainDbi: number;
  readonly erpWatts: number; // derived from power and gain
};

export type Receiver = {
  readonly height: number;
  readonly threshold: number;
  readonly gainDbd: Option.Option<number>;
};

export type PropagationModel = {
  readonly id: number;
  readonly mode: Option.Option<number>;
  readonly reliability: number;
  readonly confidence: number;
};

export type TerrainSettings = {
  readonly code: Option.Option<number>;
  readonly dielectric: Option.Option<number>;
  readonly conductivity: Option.Option<number>;
  readonly climateCode: Option.Option<number>;
  readonly groundClutter: Option.Option<number>;
};

export type AntennaSettings = {
  readonly pattern: Option.Option<string>;
  readonly rotation: Option.Option<number>;
  readonly downtilt: Option.Option<number>;
  readonly downtiltDirection: Option.Option<number>;
  readonly horizontalPolarization: boolean;
};

export type OutputSettings = {
  readonly useMetric: boolean;
  readonly useDbm: boolean;
  readonly knifeEdgeDiffraction: boolean;
  readonly terrainBackground: boolean;
  readonly createKmz: boolean;
  readonly keepRaster: boolean;
  readonly createLeafletManifest: boolean;
  readonly debug: boolean;
};

export type ToolPaths = {
  readonly engineBin: string;
  readonly engineHdBin: string;
  readonly terrainDir90m: string;
  readonly terrainDir30m: string;
  readonly outputDir: string;
  readonly colorFile: Option.Option<string>;
  readonly converterBin: string;
};

export type SiteParameters = {
  readonly siteName: string;
  readonly description: string;
  readonly transmitter: Transmitter;
  readonly receiver: Receiver;
  readonly radius: number; // km when useMetric, miles otherwise
  readonly resolution: Resolution;
  readonly model: PropagationModel;
  readonly terrain: TerrainSettings;
  readonly antenna: AntennaSettings;
  readonly output: OutputSettings;
  readonly paths: ToolPaths;
  readonly engineTimeout: Option.Option<Duration.Duration>;
};

export type ResolutionProfile = {
  readonly resolution: Resolution;
  readonly tier: "standard" | "hd";
  readonly binary: string;
  readonly terrainDir: string;
  readonly label: string;
};
