import type { PaletteEntry, PixelBuffer, RGB } from './types';

// ==========================================
// PALETTE CLASSIFICATION
// ==========================================

export function colorDistance(a: RGB, b: RGB): number {
  const dr = a[0] - b[0];
  const dg = a[1] - b[1];
  const db = a[2] - b[2];
  return Math.sqrt(dr * dr + dg * dg + db * db);
}

/**
 * Nearest palette entry by Euclidean distance. Exact ties go to the entry listed first.
 */
export function closestPaletteColor(rgb: RGB, palette: readonly PaletteEntry[]): string {
  let best: PaletteEntry | undefined;
  let bestDistance = Infinity;
  for (const entry of palette) {
    const distance = colorDistance(rgb, entry.rgb);
    if (distance < bestDistance) {
      best = entry;
      bestDistance = distance;
    }
  }
  if (!best) {
    throw new Error('Palette is empty');
  }
  return best.name;
}

// ==========================================
// CROPPING
// ==========================================

export type CropBox = {
  left: number;
  top: number;
  right: number;
  bottom: number;
};

/** Round half to even, so 2.5 -> 2 and 3.5 -> 4. */
export function roundHalfToEven(value: number): number {
  const floor = Math.floor(value);
  const diff = value - floor;
  if (diff > 0.5) return floor + 1;
  if (diff < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

/**
 * Copy the pixels inside `box` into a new buffer. Coordinates are rounded to
 * whole pixels; pixels outside the source image come back black. An inverted
 * box yields an empty buffer.
 */
export function cropPixels(image: PixelBuffer, box: CropBox): PixelBuffer {
  const left = roundHalfToEven(box.left);
  const top = roundHalfToEven(box.top);
  const width = Math.max(0, roundHalfToEven(box.right) - left);
  const height = Math.max(0, roundHalfToEven(box.bottom) - top);

  const data = new Uint8Array(width * height * 3);
  for (let row = 0; row < height; row++) {
    const sy = top + row;
    if (sy < 0 || sy >= image.height) continue;
    for (let col = 0; col < width; col++) {
      const sx = left + col;
      if (sx < 0 || sx >= image.width) continue;
      const src = (sy * image.width + sx) * 3;
      const dst = (row * width + col) * 3;
      data[dst] = image.data[src];
      data[dst + 1] = image.data[src + 1];
      data[dst + 2] = image.data[src + 2];
    }
  }

  return { width, height, channels: 3, data };
}

// ==========================================
// HISTOGRAM
// ==========================================

export type ColorCount = {
  rgb: RGB;
  count: number;
};

/**
 * Distinct colors in first-seen (row-major) order with their pixel counts.
 * Returns null when the buffer holds more than `maxColors` distinct colors.
 */
export function colorHistogram(pixels: PixelBuffer, maxColors: number): ColorCount[] | null {
  const counts = new Map<number, ColorCount>();
  const total = pixels.width * pixels.height;

  for (let i = 0; i < total; i++) {
    const offset = i * 3;
    const r = pixels.data[offset];
    const g = pixels.data[offset + 1];
    const b = pixels.data[offset + 2];
    const key = (r << 16) | (g << 8) | b;

    const existing = counts.get(key);
    if (existing) {
      existing.count++;
      continue;
    }
    if (counts.size >= maxColors) return null;
    counts.set(key, { rgb: [r, g, b], count: 1 });
  }

  return Array.from(counts.values());
}

/** The `n` most frequent colors. Equal counts keep histogram order. */
export function dominantColors(histogram: readonly ColorCount[], n: number): ColorCount[] {
  return [...histogram].sort((a, b) => b.count - a.count).slice(0, n);
}
