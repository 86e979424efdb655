import { z } from 'zod';

import { errorMessage, ProvisioningError } from './errors.js';
import {
  fileTimestamp,
  listFilesByRecency,
  readJsonFile,
  toPosixRelative,
  uniqueJsonPath,
  writeJsonFile
} from './io.js';
import type { PermissionLabel } from './permission_matrix.js';
import type { CollectionRights } from './permissions.js';
import { describeIssues } from './vault/types.js';

export const DEFAULT_OUTPUT_DIR = 'output';

export const EXPORT_PREFIXES = {
  groups: 'groups_mapping',
  collections: 'collections_mapping',
  permissions: 'permissions_summary'
} as const;

export type MappingPrefix = (typeof EXPORT_PREFIXES)['groups' | 'collections'];

const mappingSchema = z.record(z.string());

export interface LoadedMapping {
  filePath: string;
  mapping: Map<string, string>;
}

function toPlainObject(mapping: ReadonlyMap<string, string>): Record<string, string> {
  return Object.fromEntries(mapping);
}

/** Writes `<prefix>_<timestamp>.json` as a flat name -> ID object and returns its path. */
export async function exportMapping(
  outputDir: string,
  prefix: MappingPrefix,
  mapping: ReadonlyMap<string, string>,
  timestamp: Date
): Promise<string> {
  const filePath = await uniqueJsonPath(outputDir, `${prefix}_${fileTimestamp(timestamp)}`);
  await writeJsonFile(filePath, toPlainObject(mapping));
  return filePath;
}

export async function readMapping(filePath: string): Promise<Map<string, string>> {
  let raw: unknown;
  try {
    raw = await readJsonFile(filePath);
  } catch (error) {
    throw ProvisioningError.setup(
      'MAPPING_UNREADABLE',
      `Could not read mapping file ${toPosixRelative(filePath)}: ${errorMessage(error)}`
    );
  }

  const parsed = mappingSchema.safeParse(raw);
  if (!parsed.success) {
    throw ProvisioningError.setup(
      'MAPPING_INVALID',
      `Mapping file ${toPosixRelative(filePath)} is not a name -> ID object: ${describeIssues(parsed.error.issues)}`
    );
  }

  return new Map(Object.entries(parsed.data));
}

/** The most recently modified `<prefix>_*.json` in outputDir, or null. */
export async function latestMapping(
  outputDir: string,
  prefix: MappingPrefix
): Promise<LoadedMapping | null> {
  const [latest] = await listFilesByRecency(outputDir, `${prefix}_*.json`);
  if (!latest) {
    return null;
  }
  return { filePath: latest.filePath, mapping: await readMapping(latest.filePath) };
}

export interface CollectionGrantSummary {
  collection_path: string;
  collection_id: string | null;
  permission_level: Exclude<PermissionLabel, 'None'>;
  api_permissions: CollectionRights;
}

export interface GroupGrantSummary {
  group_name: string;
  group_id: string;
  collections: CollectionGrantSummary[];
}

export interface PermissionsSummaryDocument {
  csv_source: string;
  groups: Record<string, string>;
  collections: Record<string, string>;
  permission_matrix: Record<string, Record<string, PermissionLabel>>;
  permission_mappings: GroupGrantSummary[];
}

export async function exportPermissionsSummary(
  outputDir: string,
  summary: PermissionsSummaryDocument,
  timestamp: Date
): Promise<string> {
  const filePath = await uniqueJsonPath(
    outputDir,
    `${EXPORT_PREFIXES.permissions}_${fileTimestamp(timestamp)}`
  );
  await writeJsonFile(filePath, summary);
  return filePath;
}
