/**
 * TikTok OAuth token endpoint client
 *
 * Covers the initial authorization-code exchange and refresh-token grants.
 */

import { z } from 'zod';
import { AuthError, errorMessage } from '../errors/index.js';
import { isTransientStatus, requestJson, type JsonResponse } from '../http/index.js';
import type { CredentialRecord, TokenRefresher } from './types.js';

/** Access token lifetime assumed when the endpoint omits expires_in */
const DEFAULT_EXPIRES_IN_SECONDS = 86400;

export const PUBLISH_SCOPES = ['video.publish', 'video.upload'] as const;

export interface TokenClientConfig {
  clientKey: string;
  clientSecret: string;
  apiBaseUrl: string;
  authUrl: string;
}

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().min(1).optional(),
  expires_in: z.number().positive().optional(),
  open_id: z.string().optional(),
});

const tokenErrorSchema = z.object({
  error: z.string(),
  error_description: z.string().optional(),
});

export class TikTokTokenClient implements TokenRefresher {
  private readonly tokenUrl: string;

  constructor(
    private readonly config: TokenClientConfig,
    private readonly clock: () => Date = () => new Date()
  ) {
    this.tokenUrl = new URL('/v2/oauth/token/', config.apiBaseUrl).toString();
  }

  /**
   * URL the account owner visits to grant publishing access
   */
  authorizationUrl(redirectUri: string, state: string): string {
    const params = new URLSearchParams({
      client_key: this.config.clientKey,
      scope: PUBLISH_SCOPES.join(','),
      response_type: 'code',
      redirect_uri: redirectUri,
      state,
    });
    return `${this.config.authUrl}?${params.toString()}`;
  }

  /**
   * Exchange an authorization code for the first token pair
   */
  async exchangeCode(code: string, redirectUri: string): Promise<CredentialRecord> {
    const response = await this.post({
      grant_type: 'authorization_code',
      code,
      redirect_uri: redirectUri,
    });
    return this.toRecord(response);
  }

  /**
   * Trade a refresh token for a complete new record
   */
  async refresh(refreshToken: string): Promise<CredentialRecord> {
    const response = await this.post({
      grant_type: 'refresh_token',
      refresh_token: refreshToken,
    });
    return this.toRecord(response, refreshToken);
  }

  private async post(grant: Record<string, string>): Promise<JsonResponse> {
    const body = new URLSearchParams({
      client_key: this.config.clientKey,
      client_secret: this.config.clientSecret,
      ...grant,
    });

    try {
      return await requestJson(this.tokenUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        body,
      });
    } catch (error) {
      throw new AuthError(`Token endpoint unreachable: ${errorMessage(error)}`, true, { cause: error });
    }
  }

  private toRecord(response: JsonResponse, previousRefreshToken?: string): CredentialRecord {
    const failure = tokenErrorSchema.safeParse(response.body);
    if (!response.ok || failure.success) {
      const detail = failure.success
        ? `${failure.data.error}${failure.data.error_description ? `: ${failure.data.error_description}` : ''}`
        : `HTTP ${response.status}`;
      throw new AuthError(`Token request rejected (${detail})`, isTransientStatus(response.status));
    }

    const parsed = tokenResponseSchema.safeParse(response.body);
    if (!parsed.success) {
      throw new AuthError('Token response is missing access_token', false);
    }

    const refreshToken = parsed.data.refresh_token ?? previousRefreshToken;
    if (!refreshToken) {
      throw new AuthError('Token response is missing refresh_token', false);
    }

    const expiresIn = parsed.data.expires_in ?? DEFAULT_EXPIRES_IN_SECONDS;
    return {
      accessToken: parsed.data.access_token,
      refreshToken,
      expiresAt: new Date(this.clock().getTime() + expiresIn * 1000),
      accountId: parsed.data.open_id ?? null,
    };
  }
}
