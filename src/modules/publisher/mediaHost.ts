/**
 * imgBB media host
 *
 * Downloads the catalog image and re-uploads it to imgBB so the publish API
 * can pull it from a stable public URL. Re-invoking on retry only uploads
 * another copy.
 */

import { z } from 'zod';
import { HostingError, errorMessage } from '../errors/index.js';
import { combineSignals, isTransientStatus, requestJson, type JsonResponse } from '../http/index.js';
import type { MediaHost } from './types.js';

export interface ImgbbConfig {
  apiKey: string;
  apiUrl: string;
  /** Largest source image accepted, in bytes */
  maxBytes: number;
  timeoutMs: number;
}

export const DEFAULT_IMGBB_CONFIG: Omit<ImgbbConfig, 'apiKey'> = {
  apiUrl: 'https://api.imgbb.com/1/upload',
  maxBytes: 10 * 1024 * 1024,
  timeoutMs: 30000,
};

const uploadResponseSchema = z.object({
  success: z.literal(true),
  data: z.object({ url: z.string().url() }),
});

export class ImgbbMediaHost implements MediaHost {
  private readonly config: ImgbbConfig;

  constructor(config: Partial<ImgbbConfig> & Pick<ImgbbConfig, 'apiKey'>) {
    this.config = { ...DEFAULT_IMGBB_CONFIG, ...config };
  }

  async host(sourceUrl: string, signal?: AbortSignal): Promise<string> {
    const image = await this.download(sourceUrl, signal);
    const publicUrl = await this.upload(image, signal);
    console.log(`[MediaHost] Hosted ${sourceUrl} at ${publicUrl}`);
    return publicUrl;
  }

  private async download(sourceUrl: string, signal?: AbortSignal): Promise<Buffer> {
    let response: Response;
    try {
      response = await fetch(sourceUrl, {
        signal: combineSignals(this.config.timeoutMs, signal),
      });
    } catch (error) {
      throw new HostingError(`Image download failed: ${errorMessage(error)}`, true, { cause: error });
    }

    if (!response.ok) {
      throw new HostingError(
        `Image download returned HTTP ${response.status}`,
        isTransientStatus(response.status)
      );
    }

    const declared = Number(response.headers.get('content-length') ?? '0');
    if (declared > this.config.maxBytes) {
      throw new HostingError(`Image is too large (${declared} bytes)`, false);
    }

    const image = Buffer.from(await response.arrayBuffer());
    if (image.byteLength === 0) {
      throw new HostingError('Image download returned an empty body', false);
    }
    if (image.byteLength > this.config.maxBytes) {
      throw new HostingError(`Image is too large (${image.byteLength} bytes)`, false);
    }
    return image;
  }

  private async upload(image: Buffer, signal?: AbortSignal): Promise<string> {
    const url = new URL(this.config.apiUrl);
    url.searchParams.set('key', this.config.apiKey);

    let response: JsonResponse;
    try {
      response = await requestJson(url.toString(), {
        method: 'POST',
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        body: new URLSearchParams({ image: image.toString('base64') }),
        timeoutMs: this.config.timeoutMs,
        signal,
      });
    } catch (error) {
      throw new HostingError(`Image upload failed: ${errorMessage(error)}`, true, { cause: error });
    }

    if (!response.ok) {
      throw new HostingError(
        `Image upload returned HTTP ${response.status}`,
        isTransientStatus(response.status)
      );
    }

    const parsed = uploadResponseSchema.safeParse(response.body);
    if (!parsed.success) {
      throw new HostingError('Image upload response has no URL', false);
    }
    return parsed.data.data.url;
  }
}
