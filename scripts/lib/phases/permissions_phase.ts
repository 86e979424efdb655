import { errorMessage, isPhaseFatal, ProvisioningError } from '../errors.js';
import { toPosixRelative } from '../io.js';
import {
  EXPORT_PREFIXES,
  exportPermissionsSummary,
  latestMapping,
  readMapping,
  type GroupGrantSummary,
  type PermissionsSummaryDocument
} from '../mapping_exports.js';
import {
  labelFor,
  readPermissionMatrix,
  uniquePaths,
  type PermissionLabel,
  type PermissionMatrix
} from '../permission_matrix.js';
import {
  buildGroupAssociations,
  toRights,
  type GroupAssociations,
  type ResolutionGap,
  type ResolvedIds
} from '../permissions.js';
import {
  createdIdsFrom,
  readSnapshot,
  ReconciliationStore,
  resolveCreatedIds,
  type ResolutionStrategy,
  type SnapshotRef
} from '../reconciliation_store.js';
import type { GroupsApi, VaultGroup } from '../vault/types.js';
import { logPhaseSummary, type PhaseContext, type PhaseResult } from './types.js';

export interface ResolvedIdSource {
  ids: Map<string, string>;
  /** Files the IDs were read from; empty when nothing was found. */
  sources: string[];
}

/** An explicit snapshot wins; otherwise the record files are searched with `strategy`. */
export async function loadCollectionIds(
  recordsDir: string,
  snapshot: SnapshotRef | string | undefined,
  strategy: ResolutionStrategy
): Promise<ResolvedIdSource> {
  if (snapshot !== undefined) {
    const filePath = typeof snapshot === 'string' ? snapshot : snapshot.filePath;
    return { ids: createdIdsFrom(await readSnapshot(filePath), 'collection'), sources: [filePath] };
  }
  return resolveCreatedIds('collection', recordsDir, strategy);
}

/** An explicit mapping file wins; otherwise the newest groups export. */
export async function loadGroupIds(
  outputDir: string,
  mappingFile: string | undefined
): Promise<ResolvedIdSource> {
  if (mappingFile !== undefined) {
    return { ids: await readMapping(mappingFile), sources: [mappingFile] };
  }

  const latest = await latestMapping(outputDir, EXPORT_PREFIXES.groups);
  if (!latest) {
    return { ids: new Map(), sources: [] };
  }
  return { ids: latest.mapping, sources: [latest.filePath] };
}

function describeSources(source: ResolvedIdSource, fallback: string): string {
  return source.sources.map(toPosixRelative).join(', ') || fallback;
}

export interface UnresolvedNames {
  paths: string[];
  groups: string[];
}

export function findUnresolved(matrix: PermissionMatrix, ids: ResolvedIds): UnresolvedNames {
  return {
    paths: uniquePaths(matrix).filter((collectionPath) => !ids.collections.has(collectionPath)),
    groups: matrix.groups.filter((groupName) => !ids.groups.has(groupName))
  };
}

function validateResolution(matrix: PermissionMatrix, ids: ResolvedIds): void {
  const problems: string[] = [];
  if (ids.collections.size === 0) {
    problems.push('no collection IDs were loaded');
  }
  if (ids.groups.size === 0) {
    problems.push('no group IDs were loaded');
  }

  const unresolved = findUnresolved(matrix, ids);
  if (unresolved.paths.length > 0) {
    problems.push(`missing collection IDs for: ${unresolved.paths.join(', ')}`);
  }
  if (unresolved.groups.length > 0) {
    problems.push(`missing group IDs for: ${unresolved.groups.join(', ')}`);
  }

  if (problems.length > 0) {
    throw ProvisioningError.validation(
      'UNRESOLVED_IDS',
      `Permission validation failed: ${problems.join('; ')}`,
      unresolved
    );
  }
}

export function buildPermissionsSummary(
  csvSource: string,
  matrix: PermissionMatrix,
  ids: ResolvedIds
): PermissionsSummaryDocument {
  const permissionMatrix: Record<string, Record<string, PermissionLabel>> = {};
  for (const [collectionPath, labels] of matrix.permissions) {
    permissionMatrix[collectionPath] = Object.fromEntries(labels);
  }

  const permissionMappings: GroupGrantSummary[] = [];
  for (const groupName of matrix.groups) {
    const groupId = ids.groups.get(groupName);
    if (groupId === undefined) {
      continue;
    }

    const grants: GroupGrantSummary = { group_name: groupName, group_id: groupId, collections: [] };
    for (const collectionPath of uniquePaths(matrix)) {
      const label = labelFor(matrix, collectionPath, groupName);
      const rights = toRights(label);
      if (label === 'None' || !rights) {
        continue;
      }
      grants.collections.push({
        collection_path: collectionPath,
        collection_id: ids.collections.get(collectionPath) ?? null,
        permission_level: label,
        api_permissions: rights
      });
    }
    permissionMappings.push(grants);
  }

  return {
    csv_source: csvSource,
    groups: Object.fromEntries(ids.groups),
    collections: Object.fromEntries(ids.collections),
    permission_matrix: permissionMatrix,
    permission_mappings: permissionMappings
  };
}

export interface PermissionsPhaseOptions {
  organizationId: string;
  collectionsSnapshot?: SnapshotRef | string;
  groupsMapping?: string;
  resolution?: ResolutionStrategy;
}

export interface PermissionsPhaseResult extends PhaseResult {
  updatedGroups: string[];
  failedGroups: string[];
  /** Resolved groups that the CSV does not declare; left untouched. */
  skippedGroups: string[];
  gaps: ResolutionGap[];
  summaryFile: string;
}

/**
 * External IDs of remote groups by group ID. The update replaces the whole
 * group, so each PUT has to send the externalId the group already carries.
 */
async function remoteExternalIds(api: GroupsApi): Promise<Map<string, string>> {
  let remote: VaultGroup[];
  try {
    remote = await api.listGroups();
  } catch (error) {
    if (isPhaseFatal(error)) {
      throw error;
    }
    throw ProvisioningError.setup(
      'GROUP_LISTING_FAILED',
      `Could not list existing groups: ${errorMessage(error)}`
    );
  }

  const externalIds = new Map<string, string>();
  for (const group of remote) {
    if (group.externalId) {
      externalIds.set(group.id, group.externalId);
    }
  }
  return externalIds;
}

async function updateGroup(
  api: GroupsApi,
  associations: GroupAssociations,
  externalId: string | undefined
): Promise<{ ok: true } | { ok: false; error: string }> {
  const group = { id: associations.groupId, name: associations.groupName };
  try {
    await api.updateGroupCollections(
      externalId === undefined ? group : { ...group, externalId },
      associations.associations.map(({ collectionId, rights }) => ({ id: collectionId, ...rights }))
    );
    return { ok: true };
  } catch (error) {
    if (isPhaseFatal(error)) {
      throw error;
    }
    return { ok: false, error: errorMessage(error) };
  }
}

export async function runPermissionsPhase(
  context: PhaseContext,
  api: GroupsApi,
  options: PermissionsPhaseOptions
): Promise<PermissionsPhaseResult> {
  const { logger } = context;

  const matrix = await readPermissionMatrix(context.csvPath, { pathColumn: context.pathColumn });
  const collections = await loadCollectionIds(
    context.recordsDir,
    options.collectionsSnapshot,
    options.resolution ?? 'latest'
  );
  const groups = await loadGroupIds(context.outputDir, options.groupsMapping);
  logger.info(
    `Loaded ${collections.ids.size} collection IDs from ${describeSources(collections, 'no record files')}`
  );
  logger.info(`Loaded ${groups.ids.size} group IDs from ${describeSources(groups, 'no mapping file')}`);

  const ids: ResolvedIds = { collections: collections.ids, groups: groups.ids };
  validateResolution(matrix, ids);
  const externalIds = await remoteExternalIds(api);

  const declared = new Set(matrix.groups);
  const skippedGroups = Array.from(groups.ids.keys()).filter((groupName) => !declared.has(groupName));
  for (const groupName of skippedGroups) {
    logger.info(`Skipping group '${groupName}' (not in CSV)`);
  }

  const store = await ReconciliationStore.open({
    recordsDir: context.recordsDir,
    operationName: 'permission_assignment',
    organizationId: options.organizationId,
    now: context.now
  });

  const updatedGroups: string[] = [];
  const failedGroups: string[] = [];
  const gaps: ResolutionGap[] = [];

  for (const groupName of matrix.groups) {
    const associations = buildGroupAssociations(groupName, matrix, ids);
    for (const gap of associations.gaps) {
      gaps.push(gap);
      logger.warn(`Collection ID not found for '${gap.collectionPath}'; omitted from '${groupName}'`);
    }

    logger.info(
      `Assigning ${associations.associations.length} collections to group '${groupName}'`
    );
    const result = await updateGroup(api, associations, externalIds.get(associations.groupId));

    if (result.ok) {
      for (const association of associations.associations) {
        await store.record({
          kind: 'permission',
          collectionPath: association.collectionPath,
          groupName,
          permissionLevel: association.label,
          outcome: {
            status: 'mapped',
            collectionId: association.collectionId,
            groupId: association.groupId
          }
        });
        logger.info(`Permission mapped: '${groupName}' -> '${association.collectionPath}' (${association.label})`);
      }
      updatedGroups.push(groupName);
      continue;
    }

    logger.error(`Failed to assign permissions to '${groupName}': ${result.error}`);
    for (const collectionPath of uniquePaths(matrix)) {
      const label = labelFor(matrix, collectionPath, groupName);
      if (label === 'None') {
        continue;
      }
      await store.record({
        kind: 'permission',
        collectionPath,
        groupName,
        permissionLevel: label,
        outcome: {
          status: 'failed',
          error: result.error,
          collectionId: ids.collections.get(collectionPath),
          groupId: associations.groupId
        }
      });
    }
    failedGroups.push(groupName);
  }

  const csvSource = toPosixRelative(context.csvPath);
  const summary = await store.finalize({
    operationType: 'Permission Assignment',
    totalAttempted: updatedGroups.length + failedGroups.length,
    totalSucceeded: updatedGroups.length,
    totalSkipped: skippedGroups.length,
    csvSourceFile: csvSource
  });
  const snapshot = store.snapshotRef();
  logPhaseSummary(logger, summary, snapshot);

  const summaryFile = await exportPermissionsSummary(
    context.outputDir,
    buildPermissionsSummary(csvSource, matrix, ids),
    context.now()
  );
  logger.info(`Permission summary exported to ${toPosixRelative(summaryFile)}`);

  return { summary, snapshot, updatedGroups, failedGroups, skippedGroups, gaps, summaryFile };
}
