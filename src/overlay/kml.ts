import type { BoundingBox } from "../bounds.js";
import type { ResolutionProfile, SiteParameters } from "../site-parameters/types.js";
import type { OverlayDescriptor, OverlayMetadata } from "./types.js";

export const PROPAGATION_MODEL_NAMES: Readonly<Record<number, string>> = {
  1: "ITM",
  2: "LOS",
  3: "Hata",
  4: "ECC33",
  5: "SUI",
  6: "COST-Hata",
  7: "FSPL",
  8: "ITWOM",
  9: "Ericsson",
  10: "Plane Earth",
  11: "Egli",
  12: "Soil",
};

const TRANSMITTER_ICON = "http://maps.google.com/mapfiles/kml/shapes/target.png";

export const escapeXml = (value: string): string =>
  value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");

export const formatCoordinate = (value: number): string => value.toFixed(6);

const modelLabel = (modelId: number): string => {
  const name = PROPAGATION_MODEL_NAMES[modelId];
  return name === undefined ? `${modelId}` : `${modelId} (${name})`;
};

export const describeOverlay = (
  parameters: SiteParameters,
  profile: ResolutionProfile,
  bounds: BoundingBox,
): OverlayDescriptor => {
  const metric = parameters.output.useMetric;

  const metadata: OverlayMetadata = {
    siteName: parameters.siteName,
    description: parameters.description,
    frequencyMhz: parameters.transmitter.frequencyMhz,
    erpWatts: parameters.transmitter.erpWatts,
    txHeight: parameters.transmitter.height,
    heightUnit: metric ? "m" : "ft",
    radius: parameters.radius,
    radiusUnit: metric ? "km" : "mi",
    threshold: parameters.receiver.threshold,
    thresholdUnit: parameters.output.useDbm ? "dBm" : "dBuV/m",
    modelId: parameters.model.id,
    resolution: profile.resolution,
  };

  return {
    metadata,
    bounds,
    transmitter: {
      latitude: parameters.transmitter.latitude,
      longitude: parameters.transmitter.longitude,
    },
    imageHref: `${parameters.siteName}.png`,
  };
};

/** KML 2.2 document: a GroundOverlay for the coverage image plus a transmitter Placemark. */
export const renderKml = (descriptor: OverlayDescriptor): string => {
  const { metadata: m, bounds, transmitter } = descriptor;
  const name = escapeXml(m.siteName);

  const lines = [
    `<?xml version="1.0" encoding="UTF-8"?>`,
    `<kml xmlns="http://www.opengis.net/kml/2.2">`,
    `  <Document>`,
    `    <name>${name}</name>`,
    `    <description>${escapeXml(m.description)}</description>`,
    `    <GroundOverlay>`,
    `      <name>${name} Coverage</name>`,
    `      <description>`,
    `        Frequency: ${m.frequencyMhz} MHz`,
    `        ERP: ${m.erpWatts} W`,
    `        TX Height: ${m.txHeight} ${m.heightUnit}`,
    `        Radius: ${m.radius} ${m.radiusUnit}`,
    `        Threshold: ${m.threshold} ${escapeXml(m.thresholdUnit)}`,
    `        Model: ${escapeXml(modelLabel(m.modelId))}`,
    `        Resolution: ${m.resolution} ppd`,
    `      </description>`,
    `      <Icon>`,
    `        <href>${escapeXml(descriptor.imageHref)}</href>`,
    `      </Icon>`,
    `      <LatLonBox>`,
    `        <north>${formatCoordinate(bounds.north)}</north>`,
    `        <south>${formatCoordinate(bounds.south)}</south>`,
    `        <east>${formatCoordinate(bounds.east)}</east>`,
    `        <west>${formatCoordinate(bounds.west)}</west>`,
    `      </LatLonBox>`,
    `    </GroundOverlay>`,
    `    <Placemark>`,
    `      <name>${name} TX</name>`,
    `      <description>`,
    `        Transmitter Location`,
    `        Lat: ${transmitter.latitude}`,
    `        Lon: ${transmitter.longitude}`,
    `        Height: ${m.txHeight} ${m.heightUnit} AGL`,
    `        Frequency: ${m.frequencyMhz} MHz`,
    `        ERP: ${m.erpWatts} W`,
    `      </description>`,
    `      <Style>`,
    `        <IconStyle>`,
    `          <Icon>`,
    `            <href>${TRANSMITTER_ICON}</href>`,
    `          </Icon>`,
    `        </IconStyle>`,
    `      </Style>`,
    `      <Point>`,
    `        <coordinates>${transmitter.longitude},${transmitter.latitude},0</coordinates>`,
    `      </Point>`,
    `    </Placemark>`,
    `  </Document>`,
    `</kml>`,
  ];

  return lines.join("\n") + "\n";
};
