import axios, { type AxiosAdapter, type AxiosError, type AxiosInstance } from 'axios';
import type { ZodType, ZodTypeDef } from 'zod';

import { ProvisioningError } from '../errors.js';
import type { TokenProvider } from './api_session.js';
import {
  describeIssues,
  groupListSchema,
  vaultGroupSchema,
  type CollectionAccessRequest,
  type GroupCreateRequest,
  type GroupsApi,
  type GroupUpdateRequest,
  type VaultGroup
} from './types.js';

export const DEFAULT_API_URL = 'https://api.bitwarden.com';

export interface PublicApiClientOptions {
  baseURL?: string;
  session: TokenProvider;
  /** Replaces the HTTP transport; tests answer requests in process. */
  adapter?: AxiosAdapter;
}

function describeFailure(error: AxiosError): string {
  const method = error.config?.method?.toUpperCase() ?? 'REQUEST';
  const url = error.config?.url ?? '';
  const status = error.response?.status;
  const body = error.response?.data;
  const detail =
    body === undefined || body === '' ? error.message : typeof body === 'string' ? body : JSON.stringify(body);
  return `${method} ${url} failed${status ? ` with status ${status}` : ''}: ${detail}`;
}

/** Group endpoints of the organisation public API. */
export class PublicApiClient implements GroupsApi {
  private readonly client: AxiosInstance;

  constructor(options: PublicApiClientOptions) {
    this.client = axios.create({
      baseURL: options.baseURL ?? DEFAULT_API_URL,
      headers: {
        'Content-Type': 'application/json'
      },
      adapter: options.adapter
    });

    this.client.interceptors.request.use(async (config) => {
      const token = await options.session.getToken();
      config.headers.set('Authorization', `Bearer ${token}`);
      return config;
    });

    this.client.interceptors.response.use(
      (response) => response,
      (error: unknown) => {
        // Token refresh failures from the request interceptor pass through as-is.
        if (error instanceof ProvisioningError) {
          throw error;
        }
        if (axios.isAxiosError(error)) {
          throw ProvisioningError.entity(
            'API_REQUEST_FAILED',
            describeFailure(error),
            error.response?.status,
            error.response?.data
          );
        }
        throw error;
      }
    );
  }

  async listGroups(): Promise<VaultGroup[]> {
    const response = await this.client.get<unknown>('/public/groups');
    return this.parse(groupListSchema, response.data, 'GET /public/groups').data;
  }

  async createGroup(name: string): Promise<VaultGroup> {
    const body: GroupCreateRequest = { name, externalId: null, collections: [] };
    const response = await this.client.post<unknown>('/public/groups', body);
    return this.parse(vaultGroupSchema, response.data, 'POST /public/groups');
  }

  async updateGroupCollections(
    group: { id: string; name: string; externalId?: string | null },
    collections: CollectionAccessRequest[]
  ): Promise<void> {
    const body: GroupUpdateRequest = {
      name: group.name,
      externalId: group.externalId ?? null,
      collections
    };
    await this.client.put<unknown>(`/public/groups/${encodeURIComponent(group.id)}`, body);
  }

  private parse<T>(schema: ZodType<T, ZodTypeDef, unknown>, data: unknown, operation: string): T {
    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      throw ProvisioningError.entity(
        'UNEXPECTED_RESPONSE',
        `${operation} returned an unexpected body: ${describeIssues(parsed.error.issues)}`,
        undefined,
        data
      );
    }
    return parsed.data;
  }
}
