import type { OverlayDescriptor } from "./types.js";

const METERS_PER_FOOT = 0.3048;

export const MANIFEST_INDEX_FILE = "index.json";

export type LatLngTuple = readonly [latitude: number, longitude: number];

export type LeafletOverlay = {
  readonly name: string;
  readonly source_url: string;
  readonly bounds: readonly [southWest: LatLngTuple, northEast: LatLngTuple];
  readonly rotation: number | null;
  readonly image: string | null;
  readonly download_ok: boolean;
  readonly http_status: number | null;
  readonly error: string | null;
};

/**
 * Key names are read as-is by the web map front-end; they stay snake_case.
 */
export type LeafletManifest = {
  readonly site: {
    readonly name: string;
    readonly lat: number;
    readonly lon: number;
    readonly antenna_agl_m: number;
    readonly antenna_agl_note: string;
    readonly folder_name: string | null;
    readonly placemark_name: string | null;
    readonly source_kml: string;
  };
  readonly overlays: ReadonlyArray<LeafletOverlay>;
};

export type ManifestIndex = {
  readonly manifests: ReadonlyArray<string>;
};

// Bounds in Leaflet's [[south, west], [north, east]] order.
export const toLeafletManifest = (descriptor: OverlayDescriptor): LeafletManifest => {
  const { metadata, bounds, transmitter } = descriptor;
  const antennaAglM = metadata.heightUnit === "m"
    ? metadata.txHeight
    : Math.round(metadata.txHeight * METERS_PER_FOOT * 100) / 100;

  return {
    site: {
      name: metadata.siteName,
      lat: transmitter.latitude,
      lon: transmitter.longitude,
      antenna_agl_m: antennaAglM,
      antenna_agl_note: "",
      folder_name: null,
      placemark_name: `${metadata.siteName} TX`,
      source_kml: `${metadata.siteName}.kml`,
    },
    overlays: [
      {
        name: metadata.siteName,
        source_url: descriptor.imageHref,
        bounds: [[bounds.south, bounds.west], [bounds.north, bounds.east]],
        rotation: null,
        // The image sits beside the manifest, so it is always present.
        image: descriptor.imageHref,
        download_ok: true,
        http_status: null,
        error: null,
      },
    ],
  };
};

/** Appends `manifestName` to the index once, keeping the existing order. */
export const addToManifestIndex = (index: ManifestIndex, manifestName: string): ManifestIndex =>
  index.manifests.includes(manifestName)
    ? index
    : { manifests: [...index.manifests, manifestName] };
