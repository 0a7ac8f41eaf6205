import sharp from 'sharp';
import fs from 'fs/promises';
import path from 'path';
import { ImageFetchError } from './errors';
import { createLogger, type Logger } from './logger';
import type { PixelBuffer } from './types';

export interface ImageFetcher {
  fetchImage(url: string): Promise<PixelBuffer>;
}

export type HttpImageFetcherOptions = {
  /** Abort the request after this many ms (default: 4000) */
  timeoutMs?: number;
  /** When set, each downloaded image is also written to `<debugDir>/temp.<ext>` */
  debugDir?: string;
  fetchFn?: typeof fetch;
  debug?: boolean;
};

/**
 * Decode an encoded image (PNG, JPEG, WebP, ...) to packed 8-bit RGB.
 */
export async function decodeToRgb(bytes: Buffer, url: string): Promise<PixelBuffer> {
  let decoded: { data: Buffer; info: sharp.OutputInfo };
  try {
    decoded = await sharp(bytes)
      .removeAlpha()
      .toColourspace('srgb')
      .raw()
      .toBuffer({ resolveWithObject: true });
  } catch (error) {
    throw new ImageFetchError(url, 'Content is not a decodable image', { cause: error });
  }

  const { data, info } = decoded;
  if (info.channels !== 3) {
    throw new ImageFetchError(url, `Expected 3 color channels, got ${info.channels}`);
  }

  return {
    width: info.width,
    height: info.height,
    channels: 3,
    data: new Uint8Array(data.buffer, data.byteOffset, data.byteLength),
  };
}

export function imageExtension(url: string): string {
  try {
    const ext = path.extname(new URL(url).pathname).slice(1).toLowerCase();
    return ext || 'img';
  } catch {
    return 'img';
  }
}

export class HttpImageFetcher implements ImageFetcher {
  private timeoutMs: number;
  private debugDir: string | undefined;
  private fetchFn: typeof fetch;
  private logger: Logger;

  constructor(options: HttpImageFetcherOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 4000;
    this.debugDir = options.debugDir;
    this.fetchFn = options.fetchFn ?? fetch;
    this.logger = createLogger('ImageFetcher', options.debug ?? false);
  }

  async fetchImage(url: string): Promise<PixelBuffer> {
    const bytes = await this.download(url);

    if (this.debugDir) {
      const target = path.join(this.debugDir, `temp.${imageExtension(url)}`);
      await fs.mkdir(this.debugDir, { recursive: true });
      await fs.writeFile(target, bytes);
      this.logger.debug(`Saved ${url} -> ${target}`);
    }

    const image = await decodeToRgb(bytes, url);
    this.logger.debug(`Decoded ${url} (${image.width}x${image.height})`);
    return image;
  }

  private async download(url: string): Promise<Buffer> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      this.logger.debug(`GET ${url}`);
      const response = await this.fetchFn(url, { signal: controller.signal });
      if (!response.ok) {
        throw new ImageFetchError(url, `Invalid URL for the image (HTTP ${response.status})`, {
          status: response.status,
        });
      }
      return Buffer.from(await response.arrayBuffer());
    } catch (error) {
      if (error instanceof ImageFetchError) throw error;
      const reason = controller.signal.aborted
        ? `Timed out after ${this.timeoutMs}ms`
        : 'Request failed';
      throw new ImageFetchError(url, reason, { cause: error });
    } finally {
      clearTimeout(timeout);
    }
  }
}
