import { describe, it, expect } from "@effect/vitest";
import { applyTransparencyMask, isSentinelColor } from "./transparency-mask.js";

const alphaOf = (rgb: readonly [number, number, number]): number => {
  const { data } = applyTransparencyMask({ width: 1, height: 1, channels: 3, data: new Uint8Array(rgb) });
  return data[3];
};

describe("isSentinelColor", () => {
  it("should only match pure white and pure black", () => {
    expect(isSentinelColor(255, 255, 255)).toBe(true);
    expect(isSentinelColor(0, 0, 0)).toBe(true);
    expect(isSentinelColor(254, 255, 255)).toBe(false);
    expect(isSentinelColor(1, 0, 0)).toBe(false);
    expect(isSentinelColor(255, 0, 0)).toBe(false);
  });
});

describe("applyTransparencyMask", () => {
  it("should make exact sentinel pixels transparent", () => {
    expect(alphaOf([255, 255, 255])).toBe(0);
    expect(alphaOf([0, 0, 0])).toBe(0);
  });

  it("should leave near-sentinel pixels opaque", () => {
    expect(alphaOf([254, 255, 255])).toBe(255);
    expect(alphaOf([255, 255, 254])).toBe(255);
    expect(alphaOf([1, 0, 0])).toBe(255);
    expect(alphaOf([0, 0, 1])).toBe(255);
  });

  it("should keep colour channels and replace any existing alpha", () => {
    const result = applyTransparencyMask({
      width: 3,
      height: 1,
      channels: 4,
      data: new Uint8Array([
        255, 255, 255, 128,
        200, 40, 40, 0,
        0, 0, 0, 255,
      ]),
    });

    expect(result.channels).toBe(4);
    expect(Array.from(result.data)).toEqual([
      255, 255, 255, 0,
      200, 40, 40, 255,
      0, 0, 0, 0,
    ]);
  });

  it("should expand RGB input to RGBA", () => {
    const result = applyTransparencyMask({
      width: 2,
      height: 1,
      channels: 3,
      data: new Uint8Array([12, 34, 56, 255, 255, 255]),
    });

    expect(result).toEqual({
      width: 2,
      height: 1,
      channels: 4,
      data: new Uint8Array([12, 34, 56, 255, 255, 255, 255, 0]),
    });
  });

  it("should not modify the source buffer", () => {
    const data = new Uint8Array([255, 255, 255]);
    applyTransparencyMask({ width: 1, height: 1, channels: 3, data });

    expect(Array.from(data)).toEqual([255, 255, 255]);
  });

  it("should reject a buffer whose size does not match its dimensions", () => {
    expect(() => applyTransparencyMask({ width: 2, height: 2, channels: 3, data: new Uint8Array(9) }))
      .toThrow("Pixel buffer holds 9 bytes, expected 12 for 2x2x3");
  });
});
