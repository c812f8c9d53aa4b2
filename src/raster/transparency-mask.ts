export type PixelBuffer = {
  readonly width: number;
  readonly height: number;
  readonly channels: 3 | 4;
  readonly data: Uint8Array;
};

const OPAQUE = 255;
const TRANSPARENT = 0;

/**
 * Pure white marks "outside coverage" and pure black marks "no data".
 * Exact channel equality; near-white edge pixels stay opaque.
 */
export const isSentinelColor = (red: number, green: number, blue: number): boolean =>
  (red === 255 && green === 255 && blue === 255) || (red === 0 && green === 0 && blue === 0);

/**
 * Returns an RGBA copy of `pixels` with every sentinel pixel fully
 * transparent and every other pixel fully opaque. Any incoming alpha
 * channel is discarded.
 */
export const applyTransparencyMask = (pixels: PixelBuffer): PixelBuffer => {
  const { width, height, channels, data } = pixels;
  const pixelCount = width * height;

  if (data.length !== pixelCount * channels) {
    throw new RangeError(
      `Pixel buffer holds ${data.length} bytes, expected ${pixelCount * channels} for ${width}x${height}x${channels}`
    );
  }

  const rgba = new Uint8Array(pixelCount * 4);

  for (let i = 0; i < pixelCount; i++) {
    const source = i * channels;
    const target = i * 4;
    const red = data[source];
    const green = data[source + 1];
    const blue = data[source + 2];

    rgba[target] = red;
    rgba[target + 1] = green;
    rgba[target + 2] = blue;
    rgba[target + 3] = isSentinelColor(red, green, blue) ? TRANSPARENT : OPAQUE;
  }

  return { width, height, channels: 4, data: rgba };
};
