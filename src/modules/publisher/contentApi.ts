/**
 * TikTok Content Posting API client (photo posts, direct post mode)
 */

import { z } from 'zod';
import { RemoteError, errorMessage } from '../errors/index.js';
import { isTransientStatus, requestJson, type JsonResponse } from '../http/index.js';
import type { ContentPublisher, PublishOptions, StatusReport } from './types.js';

export interface ContentApiConfig {
  apiBaseUrl: string;
  timeoutMs: number;
}

export const DEFAULT_CONTENT_API_CONFIG: ContentApiConfig = {
  apiBaseUrl: 'https://open.tiktokapis.com',
  timeoutMs: 60000,
};

const apiErrorSchema = z.object({
  code: z.string(),
  message: z.string().optional(),
  log_id: z.string().optional(),
});

const initResponseSchema = z.object({
  data: z.object({ publish_id: z.string().min(1) }).partial().optional(),
  error: apiErrorSchema.optional(),
});

const statusResponseSchema = z.object({
  data: z
    .object({
      status: z.string(),
      fail_reason: z.string().optional(),
    })
    .partial()
    .optional(),
  error: apiErrorSchema.optional(),
});

/**
 * Remote status values that end processing
 */
const STATUS_PUBLISHED = 'PUBLISH_COMPLETE';
const STATUS_FAILED = 'FAILED';

export class TikTokContentApi implements ContentPublisher {
  private readonly config: ContentApiConfig;

  constructor(config: Partial<ContentApiConfig> = {}) {
    this.config = { ...DEFAULT_CONTENT_API_CONFIG, ...config };
  }

  async initPublish(
    text: string,
    publicUrl: string,
    options: PublishOptions,
    accessToken: string,
    signal?: AbortSignal
  ): Promise<string> {
    const payload = {
      post_info: {
        title: text,
        privacy_level: options.privacyLevel,
        disable_comment: options.disableComment ?? false,
        auto_add_music: options.autoAddMusic ?? true,
      },
      source_info: {
        source: 'PULL_FROM_URL',
        photo_images: [publicUrl],
        photo_cover_index: 0,
      },
      post_mode: 'DIRECT_POST',
      media_type: 'PHOTO',
    };

    const response = await this.post('/v2/post/publish/content/init/', payload, accessToken, signal);
    const parsed = initResponseSchema.safeParse(response.body);
    if (!parsed.success) {
      throw response.ok
        ? new RemoteError('Publish init returned an unreadable body', false, { status: response.status })
        : this.toRemoteError('Publish init', response.status, undefined, undefined);
    }

    const { data, error } = parsed.data;
    if (!response.ok || (error && error.code !== 'ok')) {
      throw this.toRemoteError('Publish init', response.status, error?.code, error?.message);
    }
    if (!data?.publish_id) {
      throw new RemoteError('Publish init response has no publish_id', false, { status: response.status });
    }
    return data.publish_id;
  }

  async confirmStatus(publishId: string, accessToken: string, signal?: AbortSignal): Promise<StatusReport> {
    const response = await this.post(
      '/v2/post/publish/status/fetch/',
      { publish_id: publishId },
      accessToken,
      signal
    );

    const parsed = statusResponseSchema.safeParse(response.body);
    if (!parsed.success) {
      throw response.ok
        ? new RemoteError('Status fetch returned an unreadable body', true, { status: response.status })
        : this.toRemoteError('Status fetch', response.status, undefined, undefined);
    }

    const { data, error } = parsed.data;
    if (!response.ok || (error && error.code !== 'ok')) {
      throw this.toRemoteError('Status fetch', response.status, error?.code, error?.message);
    }

    switch (data?.status) {
      case STATUS_PUBLISHED:
        return { status: 'published' };
      case STATUS_FAILED:
        return { status: 'rejected', detail: data.fail_reason || 'unknown' };
      default:
        return { status: 'processing' };
    }
  }

  private async post(
    path: string,
    payload: unknown,
    accessToken: string,
    signal?: AbortSignal
  ): Promise<JsonResponse> {
    try {
      return await requestJson(new URL(path, this.config.apiBaseUrl).toString(), {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${accessToken}`,
          'Content-Type': 'application/json; charset=UTF-8',
        },
        body: JSON.stringify(payload),
        timeoutMs: this.config.timeoutMs,
        signal,
      });
    } catch (error) {
      throw new RemoteError(`${path} unreachable: ${errorMessage(error)}`, true, { cause: error });
    }
  }

  private toRemoteError(
    operation: string,
    status: number,
    code: string | undefined,
    message: string | undefined
  ): RemoteError {
    const detail = [code, message].filter(Boolean).join(': ') || `HTTP ${status}`;
    // Rate limiting comes back as an error code on a 4xx
    const retryable = isTransientStatus(status) || code === 'rate_limit_exceeded';
    return new RemoteError(`${operation} failed (${detail})`, retryable, { status });
  }
}
