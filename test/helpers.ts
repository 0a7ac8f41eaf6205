import { vi } from 'vitest';
import type { ImageFetcher } from '../src/lib/image-fetcher';
import type { Annotation, PixelBuffer, RGB, Task } from '../src/lib/types';

export function makeAnnotation(overrides: Partial<Omit<Annotation, 'attributes'>> & {
  occlusion?: string;
  color?: string;
} = {}): Annotation {
  const { occlusion = '0%', color = 'other', ...rest } = overrides;
  return {
    id: 'ann',
    label: 'car',
    left: 0,
    top: 0,
    width: 10,
    height: 10,
    ...rest,
    attributes: { occlusion, background_color: color },
  };
}

export function makeTask(annotations: Annotation[], id: Task['id'] = 'task-1'): Task {
  return { id, imageUrl: `https://images.example.test/${id}.png`, annotations };
}

/** Build an RGB buffer from a per-pixel color function. */
export function makeImage(width: number, height: number, colorAt: (x: number, y: number) => RGB): PixelBuffer {
  const data = new Uint8Array(width * height * 3);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const [r, g, b] = colorAt(x, y);
      const offset = (y * width + x) * 3;
      data[offset] = r;
      data[offset + 1] = g;
      data[offset + 2] = b;
    }
  }
  return { width, height, channels: 3, data };
}

export function solidImage(width: number, height: number, rgb: RGB): PixelBuffer {
  return makeImage(width, height, () => rgb);
}

export function stubFetcher(image: PixelBuffer) {
  const fetchImage = vi.fn(async (_url: string) => image);
  const fetcher: ImageFetcher = { fetchImage };
  return { fetcher, fetchImage };
}
