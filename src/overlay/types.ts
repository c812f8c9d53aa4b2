import type { Option } from "effect";
import type { BoundingBox, Coordinates } from "../bounds.js";

export type OverlayMetadata = {
  readonly siteName: string;
  readonly description: string;
  readonly frequencyMhz: number;
  readonly erpWatts: number;
  readonly txHeight: number;
  readonly heightUnit: "m" | "ft";
  readonly radius: number;
  readonly radiusUnit: "km" | "mi";
  readonly threshold: number;
  readonly thresholdUnit: "dBm" | "dBuV/m";
  readonly modelId: number;
  readonly resolution: number;
};

export type OverlayDescriptor = {
  readonly metadata: OverlayMetadata;
  readonly bounds: BoundingBox;
  readonly transmitter: Coordinates;
  /** Relative to the descriptor, so the package can be moved as a whole. */
  readonly imageHref: string;
};

export type OverlayPackage = {
  readonly imagePath: string;
  readonly descriptorPath: string;
  readonly bounds: BoundingBox;
  readonly metadata: OverlayMetadata;
  readonly archivePath: Option.Option<string>;
  readonly manifestPath: Option.Option<string>;
  readonly manifestIndexPath: Option.Option<string>;
};
