import { describe, it, expect } from "@effect/vitest";
import { Option } from "effect";
import { calculateBounds } from "../../bounds.js";
import { formatSummary } from "../../event-logger/index.js";
import { describeOverlay } from "../../overlay/kml.js";
import type { OverlayPackage } from "../../overlay/types.js";
import { makeProfile, makeSiteParameters } from "./helpers/fixtures.js";

describe("formatSummary", () => {
  const parameters = makeSiteParameters("/srv/maps");
  const profile = makeProfile("/opt/engine/signalserver");
  const bounds = calculateBounds(parameters.transmitter, parameters.radius, true);
  const { metadata } = describeOverlay(parameters, profile, bounds);

  const result: OverlayPackage = {
    imagePath: "/srv/maps/TestSite.png",
    descriptorPath: "/srv/maps/TestSite.kml",
    bounds,
    metadata,
    archivePath: Option.some("/srv/maps/TestSite.kmz"),
    manifestPath: Option.none(),
    manifestIndexPath: Option.none(),
  };

  it("should list the run parameters and every produced file", () => {
    const lines = formatSummary(parameters, profile, result).split("\n");

    expect(lines).toContain("  Site Name:      TestSite");
    expect(lines).toContain("  Location:       40.264444, -76.883611");
    expect(lines).toContain("  ERP:            3.98 W");
    expect(lines).toContain("  Resolution:     1200 ppd (Standard 90m SRTM3)");
    expect(lines).toContain("    KMZ:          /srv/maps/TestSite.kmz");
    expect(lines.filter((line) => line.includes("Manifest:"))).toEqual([]);
  });
});
