import { z, type ZodIssue } from 'zod';

import type { CollectionRights } from '../permissions.js';

export function describeIssues(issues: ZodIssue[]): string {
  return issues.map((issue) => `${issue.path.join('.') || '(root)'} ${issue.message}`).join('; ');
}

export const tokenResponseSchema = z.object({
  access_token: z.string().trim().min(1),
  expires_in: z.number().positive(),
  token_type: z.string().optional()
});

export type TokenResponse = z.infer<typeof tokenResponseSchema>;

export const vaultGroupSchema = z
  .object({
    id: z.string().min(1),
    name: z.string(),
    externalId: z.string().nullable().optional()
  })
  .passthrough();

export type VaultGroup = z.infer<typeof vaultGroupSchema>;

export const groupListSchema = z.object({
  data: z.array(vaultGroupSchema).default([])
});

export const vaultCollectionSchema = z
  .object({
    id: z.string().min(1),
    organizationId: z.string().min(1),
    name: z.string()
  })
  .passthrough();

export type VaultCollection = z.infer<typeof vaultCollectionSchema>;

export const collectionListSchema = z.array(vaultCollectionSchema);

/** One entry of a group's collection list; the list replaces whatever the group had. */
export interface CollectionAccessRequest extends CollectionRights {
  id: string;
}

export interface GroupCreateRequest {
  name: string;
  externalId: string | null;
  collections: CollectionAccessRequest[];
}

export type GroupUpdateRequest = GroupCreateRequest;

export interface CollectionCreateRequest {
  organizationId: string;
  name: string;
  externalId: string | null;
  groups: CollectionAccessRequest[];
}

export interface GroupsApi {
  listGroups(): Promise<VaultGroup[]>;
  createGroup(name: string): Promise<VaultGroup>;
  updateGroupCollections(
    group: { id: string; name: string; externalId?: string | null },
    collections: CollectionAccessRequest[]
  ): Promise<void>;
}

export interface CollectionsCli {
  authenticate(): Promise<void>;
  createCollection(collectionPath: string): Promise<VaultCollection>;
  listCollections(): Promise<VaultCollection[]>;
}
