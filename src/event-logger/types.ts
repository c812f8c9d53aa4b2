import type { Effect } from "effect";
import type { BoundingBox } from "../bounds.js";
import type { EngineInvocation } from "../engine/index.js";
import type { OverlayPackage } from "../overlay/types.js";
import type { ResolutionProfile, SiteParameters } from "../site-parameters/types.js";

export type IEventLogger = {
  onBoundsCalculated: (bounds: BoundingBox) => Effect.Effect<void>;
  onEngineStarted: (invocation: EngineInvocation) => Effect.Effect<void>;
  onEngineCompleted: (rasterPath: string) => Effect.Effect<void>;
  onCompleted: (parameters: SiteParameters, profile: ResolutionProfile, result: OverlayPackage) => Effect.Effect<void>;
};
