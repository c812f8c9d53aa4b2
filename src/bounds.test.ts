import { describe, it, expect } from "@effect/vitest";
import { calculateBounds, KM_PER_DEGREE_LATITUDE } from "./bounds.js";

describe("calculateBounds", () => {
  it("should match the documented example bounds", () => {
    const bounds = calculateBounds({ latitude: 40.264444, longitude: -76.883611 }, 100, true);

    expect(bounds.north).toBeCloseTo(41.163, 2);
    expect(bounds.south).toBeCloseTo(39.366, 2);
    expect(bounds.east).toBeCloseTo(-75.706378, 5);
    expect(bounds.west).toBeCloseTo(-78.060845, 5);
  });

  it("should be symmetric around the transmitter", () => {
    const center = { latitude: -33.8688, longitude: 151.2093 };
    const bounds = calculateBounds(center, 42, true);

    expect(bounds.north - center.latitude).toBeCloseTo(center.latitude - bounds.south, 10);
    expect(bounds.east - center.longitude).toBeCloseTo(center.longitude - bounds.west, 10);
    expect(bounds.north).toBeGreaterThan(bounds.south);
  });

  it("should grow the north-south span with the radius", () => {
    const center = { latitude: 12.5, longitude: 8 };
    const spans = [1, 10, 50, 150].map((radius) => {
      const bounds = calculateBounds(center, radius, true);
      return bounds.north - bounds.south;
    });

    for (let i = 1; i < spans.length; i++) {
      expect(spans[i]).toBeGreaterThan(spans[i - 1]);
    }
  });

  it("should keep the north-south span independent of latitude", () => {
    const equator = calculateBounds({ latitude: 0, longitude: 0 }, 80, true);
    const north = calculateBounds({ latitude: 60, longitude: 0 }, 80, true);

    expect(north.north - north.south).toBeCloseTo(equator.north - equator.south, 10);
    expect(equator.north - equator.south).toBeCloseTo((2 * 80) / KM_PER_DEGREE_LATITUDE, 10);
  });

  it("should widen the longitude span by 1/cos(latitude)", () => {
    const radius = 80;
    const spanAt = (latitude: number) => {
      const bounds = calculateBounds({ latitude, longitude: 10 }, radius, true);
      return bounds.east - bounds.west;
    };

    for (const latitude of [-65, -30, 0, 20, 45, 69]) {
      const expected = (2 * radius) / (KM_PER_DEGREE_LATITUDE * Math.cos((latitude * Math.PI) / 180));
      expect(spanAt(latitude)).toBeCloseTo(expected, 10);
      expect(spanAt(latitude)).toBeGreaterThanOrEqual(spanAt(0) - 1e-12);
    }

    expect(spanAt(45)).toBeGreaterThan(spanAt(20));
    expect(spanAt(-65)).toBeGreaterThan(spanAt(-30));
  });

  it("should convert miles to kilometres when not metric", () => {
    const center = { latitude: 41.203586, longitude: -76.964072 };
    const imperial = calculateBounds(center, 10, false);
    const metric = calculateBounds(center, 16.0934, true);

    expect(imperial.north).toBeCloseTo(metric.north, 10);
    expect(imperial.south).toBeCloseTo(metric.south, 10);
    expect(imperial.east).toBeCloseTo(metric.east, 10);
    expect(imperial.west).toBeCloseTo(metric.west, 10);
  });
});
