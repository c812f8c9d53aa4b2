export const KM_PER_DEGREE_LATITUDE = 111.32;
export const KM_PER_MILE = 1.60934;

export type BoundingBox = {
  readonly north: number;
  readonly south: number;
  readonly east: number;
  readonly west: number;
};

export type Coordinates = {
  readonly latitude: number;
  readonly longitude: number;
};

/**
 * Equirectangular box around the transmitter. The north/south span uses a
 * fixed km-per-degree constant while the east/west span is widened by
 * 1 / cos(latitude). Only meaningful within the ±70° operating envelope.
 */
export const calculateBounds = (center: Coordinates, radius: number, useMetric: boolean): BoundingBox => {
  const radiusKm = useMetric ? radius : radius * KM_PER_MILE;

  const latitudeOffset = radiusKm / KM_PER_DEGREE_LATITUDE;

  const latitudeRad = (center.latitude * Math.PI) / 180;
  const longitudeOffset = radiusKm / (KM_PER_DEGREE_LATITUDE * Math.cos(latitudeRad));

  return {
    north: center.latitude + latitudeOffset,
    south: center.latitude - latitudeOffset,
    east: center.longitude + longitudeOffset,
    west: center.longitude - longitudeOffset,
  };
};
