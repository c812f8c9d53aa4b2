import type { Resolution, ResolutionProfile, ToolPaths } from "./types.js";

export const selectResolutionProfile = (
  resolution: Resolution,
  paths: Pick<ToolPaths, "engineBin" | "engineHdBin" | "terrainDir90m" | "terrainDir30m">,
): ResolutionProfile =>
  resolution === 3600
    ? {
      resolution,
      tier: "hd",
      binary: paths.engineHdBin,
      terrainDir: paths.terrainDir30m,
      label: "HD 30m SRTM1",
    }
    : {
      resolution,
      tier: "standard",
      binary: paths.engineBin,
      terrainDir: paths.terrainDir90m,
      label: "Standard 90m SRTM3",
    };
