import type { IEventLogger } from "./types.js";
import { Console, Effect, Option } from "effect";
import type { BoundingBox } from "../bounds.js";
import type { EngineInvocation } from "../engine/index.js";
import type { OverlayPackage } from "../overlay/types.js";
import type { ResolutionProfile, SiteParameters } from "../site-parameters/types.js";

const RULE = "=".repeat(79);

export const formatSummary = (
  parameters: SiteParameters,
  profile: ResolutionProfile,
  result: OverlayPackage,
): string => {
  const m = result.metadata;
  const { latitude, longitude } = parameters.transmitter;

  const files = [
    `    PNG:          ${result.imagePath}`,
    `    KML:          ${result.descriptorPath}`,
    ...Option.toArray(Option.map(result.archivePath, (p) => `    KMZ:          ${p}`)),
    ...Option.toArray(Option.map(result.manifestPath, (p) => `    Manifest:     ${p}`)),
    ...Option.toArray(Option.map(result.manifestIndexPath, (p) => `    Index:        ${p}`)),
  ];

  return [
    RULE,
    "                           RF Coverage Map Complete",
    RULE,
    "",
    `  Site Name:      ${m.siteName}`,
    `  Location:       ${latitude}, ${longitude}`,
    `  Frequency:      ${m.frequencyMhz} MHz`,
    `  ERP:            ${m.erpWatts} W`,
    `  TX Height:      ${m.txHeight} ${m.heightUnit}`,
    `  Radius:         ${m.radius} ${m.radiusUnit}`,
    `  Threshold:      ${m.threshold} ${m.thresholdUnit}`,
    `  Model:          ${m.modelId}`,
    `  Resolution:     ${profile.resolution} ppd (${profile.label})`,
    "",
    "  Output Files:",
    ...files,
    "",
    RULE,
  ].join("\n");
};

export class EventLogger implements IEventLogger {

  public onBoundsCalculated(bounds: BoundingBox) {
    return Effect.log(`Bounds: N=${bounds.north}, S=${bounds.south}, E=${bounds.east}, W=${bounds.west}`);
  }

  public onEngineStarted(invocation: EngineInvocation) {
    return Effect.log(`Running propagation engine ${invocation.binary}`);
  }

  public onEngineCompleted(rasterPath: string) {
    return Effect.log(`Propagation engine completed successfully: ${rasterPath}`);
  }

  public onCompleted(parameters: SiteParameters, profile: ResolutionProfile, result: OverlayPackage) {
    return Console.log(formatSummary(parameters, profile, result));
  }
}
