import { fetch, type RequestInit } from 'undici';
import { AUDIBLE_APP } from './constants';
import { ApiError, AuthenticationError, describeError } from './errors';
import { resolveLocale } from './locales';
import type { AudibleLibraryResponse, AudibleLocale, Credential, LibraryQuery } from './types';

interface ApiResponse {
  status: number;
  body: unknown;
}

export interface LibraryClient {
  getLibrary(query: LibraryQuery): Promise<AudibleLibraryResponse>;
}

// Refresh a little early so the token cannot lapse mid-request.
const EXPIRY_MARGIN_MS = 60 * 1000;

function parseBody(text: string): unknown {
  if (!text.length) return {};
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

function stringField(value: object, key: string): string | undefined {
  const field: unknown = Reflect.get(value, key);
  return typeof field === 'string' && field.length > 0 ? field : undefined;
}

function errorMessage(parsed: unknown, status: number): string {
  if (typeof parsed === 'object' && parsed !== null) {
    const detail =
      stringField(parsed, 'message') ?? stringField(parsed, 'error_description') ?? stringField(parsed, 'error');
    if (detail) return detail;
  }
  return `Audible request failed with status ${status}`;
}

function isLibraryResponse(value: unknown): value is AudibleLibraryResponse {
  return typeof value === 'object' && value !== null && Array.isArray(Reflect.get(value, 'items'));
}

export class AudibleApiClient implements LibraryClient {
  private readonly locale: AudibleLocale;
  private accessToken: string;
  private expiresAt: number;

  constructor(
    private readonly credential: Credential,
    private readonly now: () => number = Date.now
  ) {
    this.locale = resolveLocale(credential.localeCode);
    this.accessToken = credential.accessToken;
    this.expiresAt = credential.expiresAt;
  }

  private get apiBase(): string {
    return `https://api.audible.${this.locale.domain}`;
  }

  private async send(url: string, init: RequestInit): Promise<ApiResponse> {
    let response: Awaited<ReturnType<typeof fetch>>;
    try {
      response = await fetch(url, init);
    } catch (error) {
      throw new ApiError(`Request to ${url} failed: ${describeError(error)}`, undefined, { cause: error });
    }

    const parsed = parseBody(await response.text());
    if (!response.ok) {
      throw new ApiError(errorMessage(parsed, response.status), response.status);
    }

    return { status: response.status, body: parsed };
  }

  /** Swaps the refresh token for a new access token; the credential file is left untouched. */
  async refreshAccessToken(): Promise<void> {
    const body = new URLSearchParams({
      app_name: AUDIBLE_APP.NAME,
      app_version: AUDIBLE_APP.VERSION,
      source_token: this.credential.refreshToken,
      requested_token_type: 'access_token',
      source_token_type: 'refresh_token'
    });

    let payload: ApiResponse;
    try {
      payload = await this.send(`https://api.amazon.${this.locale.domain}/auth/token`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          'x-amzn-identity-auth-domain': `api.amazon.${this.locale.domain}`
        },
        body: body.toString()
      });
    } catch (error) {
      throw new AuthenticationError(`Unable to refresh access token: ${describeError(error)}`, { cause: error });
    }

    const tokens = payload.body;
    const accessToken = typeof tokens === 'object' && tokens !== null ? stringField(tokens, 'access_token') : undefined;
    if (!accessToken) {
      throw new AuthenticationError('Token refresh response did not include an access token');
    }

    const expiresIn: unknown = typeof tokens === 'object' && tokens !== null ? Reflect.get(tokens, 'expires_in') : undefined;
    this.accessToken = accessToken;
    this.expiresAt = this.now() + (typeof expiresIn === 'number' ? expiresIn : 3600) * 1000;
  }

  private async request(path: string, params: Record<string, string>): Promise<ApiResponse> {
    if (this.now() + EXPIRY_MARGIN_MS >= this.expiresAt) {
      await this.refreshAccessToken();
    }

    const url = new URL(`${this.apiBase}/${path}`);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }

    return this.send(url.toString(), {
      method: 'GET',
      headers: {
        Accept: 'application/json',
        Authorization: `Bearer ${this.accessToken}`,
        'client-id': '0'
      }
    });
  }

  async getLibrary(query: LibraryQuery): Promise<AudibleLibraryResponse> {
    const response = await this.request('1.0/library', {
      num_results: String(query.numResults),
      response_groups: query.responseGroups.join(','),
      sort_by: query.sortBy
    });

    if (!isLibraryResponse(response.body)) {
      throw new ApiError('Unexpected library response', response.status);
    }
    return response.body;
  }
}
