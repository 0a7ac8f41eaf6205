import type { Annotation } from './types';

// ==========================================
// PIXEL RANGES
// ==========================================

/** Half-open integer pixel range [start, end). */
export type PixelRange = {
  start: number;
  end: number;
};

export type BoxRanges = {
  x: PixelRange;
  y: PixelRange;
};

/**
 * Offset and size are each truncated toward zero before the range is built,
 * so a box at left=2.7 with width=3.9 covers pixels 2..4.
 */
export function pixelRange(offset: number, size: number): PixelRange {
  const start = Math.trunc(offset);
  return { start, end: start + Math.trunc(size) };
}

export function rangeLength(range: PixelRange): number {
  return Math.max(0, range.end - range.start);
}

export function boxRanges(annotation: Pick<Annotation, 'left' | 'top' | 'width' | 'height'>): BoxRanges {
  return {
    x: pixelRange(annotation.left, annotation.width),
    y: pixelRange(annotation.top, annotation.height),
  };
}

export function isZeroArea(annotation: Pick<Annotation, 'left' | 'top' | 'width' | 'height'>): boolean {
  const { x, y } = boxRanges(annotation);
  return rangeLength(x) === 0 || rangeLength(y) === 0;
}

// ==========================================
// AXIS OVERLAP
// ==========================================

export function intersectionLength(a: PixelRange, b: PixelRange): number {
  return Math.max(0, Math.min(a.end, b.end) - Math.max(a.start, b.start));
}

/**
 * Shared pixels on one axis divided by the distance between the first pixel
 * of the leftmost range and the last pixel of the rightmost one.
 * Returns null when either range is empty or the span is zero.
 */
export function axisOverlapFraction(a: PixelRange, b: PixelRange): number | null {
  if (rangeLength(a) === 0 || rangeLength(b) === 0) return null;

  const span = Math.max(a.end - 1, b.end - 1) - Math.min(a.start, b.start);
  if (span === 0) return null;

  return intersectionLength(a, b) / span;
}

/**
 * Approximate occlusion between two boxes: the mean of the horizontal and
 * vertical overlap fractions, as a percentage. Zero unless the boxes overlap
 * on both axes. This is not IoU.
 *
 * Returns null for degenerate geometry (empty range or zero span on an axis).
 */
export function occlusionPercentage(
  a: Pick<Annotation, 'left' | 'top' | 'width' | 'height'>,
  b: Pick<Annotation, 'left' | 'top' | 'width' | 'height'>
): number | null {
  const boxA = boxRanges(a);
  const boxB = boxRanges(b);

  const fx = axisOverlapFraction(boxA.x, boxB.x);
  const fy = axisOverlapFraction(boxA.y, boxB.y);
  if (fx === null || fy === null) return null;

  const overlapping = fx > 0 && fy > 0;
  return overlapping ? ((fx + fy) / 2) * 100 : 0;
}
