import { describe, it, expect } from 'vitest';
import {
  closestPaletteColor,
  colorHistogram,
  cropPixels,
  dominantColors,
  roundHalfToEven,
  type ColorCount,
} from '../src/lib/colors';
import { DEFAULT_PALETTE } from '../src/lib/config';
import type { RGB } from '../src/lib/types';
import { makeImage } from './helpers';

describe('closestPaletteColor', () => {
  it('picks the nearest entry', () => {
    expect(closestPaletteColor([250, 10, 10], DEFAULT_PALETTE)).toBe('red');
    expect(closestPaletteColor([20, 30, 200], DEFAULT_PALETTE)).toBe('blue');
    expect(closestPaletteColor([128, 128, 128], DEFAULT_PALETTE)).toBe('white');
  });

  it('breaks exact ties by palette order', () => {
    // Black is 255 away from red, green and blue
    expect(closestPaletteColor([0, 0, 0], DEFAULT_PALETTE)).toBe('red');
  });

  it('throws on an empty palette', () => {
    expect(() => closestPaletteColor([0, 0, 0], [])).toThrow('Palette is empty');
  });
});

describe('roundHalfToEven', () => {
  it('rounds halves to the even neighbour', () => {
    expect(roundHalfToEven(2.5)).toBe(2);
    expect(roundHalfToEven(3.5)).toBe(4);
    expect(roundHalfToEven(1.6)).toBe(2);
    expect(roundHalfToEven(1.4)).toBe(1);
  });
});

describe('cropPixels', () => {
  // 4x2 image, each pixel encodes its coordinates
  const image = makeImage(4, 2, (x, y) => [x * 10, y * 10, 1]);

  it('copies the pixels inside the box', () => {
    const crop = cropPixels(image, { left: 1, top: 0, right: 3, bottom: 1 });
    expect(crop.width).toBe(2);
    expect(crop.height).toBe(1);
    expect(Array.from(crop.data)).toEqual([10, 0, 1, 20, 0, 1]);
  });

  it('fills pixels outside the image with black', () => {
    const crop = cropPixels(image, { left: -1, top: -1, right: 1, bottom: 1 });
    expect(Array.from(crop.data)).toEqual([0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 1]);
  });

  it('returns an empty buffer for an inverted box', () => {
    const crop = cropPixels(image, { left: 3, top: 0, right: 1, bottom: 2 });
    expect(crop.width).toBe(0);
    expect(crop.data.length).toBe(0);
  });
});

describe('colorHistogram', () => {
  it('counts distinct colors in first-seen order', () => {
    const colors: RGB[] = [[1, 1, 1], [2, 2, 2], [1, 1, 1]];
    const pixels = makeImage(3, 1, (x) => colors[x]);
    expect(colorHistogram(pixels, 256)).toEqual([
      { rgb: [1, 1, 1], count: 2 },
      { rgb: [2, 2, 2], count: 1 },
    ]);
  });

  it('gives up when there are more colors than allowed', () => {
    const pixels = makeImage(3, 1, (x) => [x, 0, 0]);
    expect(colorHistogram(pixels, 2)).toBeNull();
    expect(colorHistogram(pixels, 3)).toHaveLength(3);
  });

  it('is empty for an empty buffer', () => {
    expect(colorHistogram({ width: 0, height: 0, channels: 3, data: new Uint8Array(0) }, 256)).toEqual([]);
  });
});

describe('dominantColors', () => {
  it('keeps the most frequent colors and histogram order on ties', () => {
    const histogram: ColorCount[] = [
      { rgb: [1, 1, 1], count: 2 },
      { rgb: [2, 2, 2], count: 5 },
      { rgb: [3, 3, 3], count: 2 },
    ];
    expect(dominantColors(histogram, 2).map((entry) => entry.rgb)).toEqual([
      [2, 2, 2],
      [1, 1, 1],
    ]);
  });
});
