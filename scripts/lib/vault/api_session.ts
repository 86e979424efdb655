import axios, { type AxiosInstance } from 'axios';

import { errorMessage, ProvisioningError } from '../errors.js';
import { tokenResponseSchema } from './types.js';

/** A token this close to expiry is treated as expired. */
export const TOKEN_EXPIRY_BUFFER_MS = 60_000;

export interface ApiCredentials {
  identityUrl: string;
  clientId: string;
  clientSecret: string;
}

export interface TokenProvider {
  getToken(): Promise<string>;
}

export interface ApiTokenSessionOptions {
  http?: AxiosInstance;
  now?: () => number;
}

/**
 * Client-credentials bearer token for the public API. The token is fetched on
 * first use and refreshed lazily before it expires.
 */
export class ApiTokenSession implements TokenProvider {
  private token: string | null = null;
  private expiresAt: number | null = null;
  private readonly http: AxiosInstance;
  private readonly now: () => number;

  constructor(
    private readonly credentials: ApiCredentials,
    options: ApiTokenSessionOptions = {}
  ) {
    this.http = options.http ?? axios.create();
    this.now = options.now ?? Date.now;
  }

  get expiry(): Date | null {
    return this.expiresAt === null ? null : new Date(this.expiresAt);
  }

  isValid(): boolean {
    if (!this.token || this.expiresAt === null) {
      return false;
    }
    return this.now() < this.expiresAt - TOKEN_EXPIRY_BUFFER_MS;
  }

  async getToken(): Promise<string> {
    if (this.token && this.isValid()) {
      return this.token;
    }
    return this.refresh();
  }

  async refresh(): Promise<string> {
    const form = new URLSearchParams({
      grant_type: 'client_credentials',
      scope: 'api.organization',
      client_id: this.credentials.clientId,
      client_secret: this.credentials.clientSecret
    });

    let data: unknown;
    try {
      const response = await this.http.post<unknown>(this.credentials.identityUrl, form.toString(), {
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' }
      });
      data = response.data;
    } catch (error) {
      this.clear();
      const status = axios.isAxiosError(error) ? error.response?.status : undefined;
      throw ProvisioningError.setup(
        'TOKEN_REFRESH_FAILED',
        `Could not obtain an API bearer token${status ? ` (status ${status})` : ''}: ${errorMessage(error)}`
      );
    }

    const parsed = tokenResponseSchema.safeParse(data);
    if (!parsed.success) {
      this.clear();
      throw ProvisioningError.setup(
        'TOKEN_REFRESH_FAILED',
        'Identity endpoint returned an unexpected token response',
        parsed.error.issues
      );
    }

    this.token = parsed.data.access_token;
    this.expiresAt = this.now() + parsed.data.expires_in * 1000;
    return this.token;
  }

  private clear(): void {
    this.token = null;
    this.expiresAt = null;
  }
}
