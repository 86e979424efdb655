import { errorMessage, isPhaseFatal, ProvisioningError } from '../errors.js';
import { toPosixRelative } from '../io.js';
import { EXPORT_PREFIXES, exportMapping } from '../mapping_exports.js';
import { readPermissionMatrix } from '../permission_matrix.js';
import { ReconciliationStore, type AttemptOutcome } from '../reconciliation_store.js';
import type { GroupsApi, VaultGroup } from '../vault/types.js';
import { logPhaseSummary, type PhaseContext, type PhaseResult } from './types.js';

export interface GroupPartition {
  toCreate: string[];
  /** CSV groups that already exist remotely, with their IDs. */
  existing: Map<string, string>;
}

/** Splits CSV groups into those to create and those already present remotely. */
export function partitionGroups(
  csvGroups: string[],
  remoteGroups: VaultGroup[],
  skipExisting = true
): GroupPartition {
  const remoteIds = remoteIdsByName(remoteGroups);
  const toCreate: string[] = [];
  const existing = new Map<string, string>();

  for (const groupName of csvGroups) {
    const remoteId = remoteIds.get(groupName);
    if (skipExisting && remoteId !== undefined) {
      existing.set(groupName, remoteId);
    } else {
      toCreate.push(groupName);
    }
  }

  return { toCreate, existing };
}

function remoteIdsByName(remoteGroups: VaultGroup[]): Map<string, string> {
  const ids = new Map<string, string>();
  for (const group of remoteGroups) {
    if (!ids.has(group.name)) {
      ids.set(group.name, group.id);
    }
  }
  return ids;
}

export interface GroupsPhaseOptions {
  organizationId: string;
  skipExisting?: boolean;
}

export interface GroupsPhaseResult extends PhaseResult {
  created: string[];
  skipped: string[];
  failed: string[];
  /** Every remote group plus this run's creations. */
  groupIds: Map<string, string>;
  mappingFile: string;
}

async function createOne(api: GroupsApi, groupName: string): Promise<AttemptOutcome> {
  try {
    const created = await api.createGroup(groupName);
    return { status: 'created', remoteId: created.id };
  } catch (error) {
    if (isPhaseFatal(error)) {
      throw error;
    }
    return { status: 'failed', error: errorMessage(error) };
  }
}

export async function runGroupsPhase(
  context: PhaseContext,
  api: GroupsApi,
  options: GroupsPhaseOptions
): Promise<GroupsPhaseResult> {
  const { logger } = context;
  const skipExisting = options.skipExisting ?? true;

  const matrix = await readPermissionMatrix(context.csvPath, { pathColumn: context.pathColumn });
  logger.info(`Groups declared in CSV (${matrix.groups.length}): ${matrix.groups.join(', ')}`);

  let remoteGroups: VaultGroup[];
  try {
    remoteGroups = await api.listGroups();
  } catch (error) {
    if (isPhaseFatal(error)) {
      throw error;
    }
    throw ProvisioningError.setup(
      'GROUP_LISTING_FAILED',
      `Could not list existing groups: ${errorMessage(error)}`
    );
  }
  logger.info(`Found ${remoteGroups.length} existing groups`);

  const partition = partitionGroups(matrix.groups, remoteGroups, skipExisting);
  for (const [groupName, groupId] of partition.existing) {
    logger.warn(`Skipping existing group '${groupName}' (${groupId})`);
  }

  const store = await ReconciliationStore.open({
    recordsDir: context.recordsDir,
    operationName: 'group_management',
    organizationId: options.organizationId,
    now: context.now
  });

  const groupIds = remoteIdsByName(remoteGroups);
  const created: string[] = [];
  const failed: string[] = [];

  for (const groupName of partition.toCreate) {
    const outcome = await createOne(api, groupName);
    await store.record({ kind: 'group', groupName, outcome });

    if (outcome.status === 'created') {
      created.push(groupName);
      groupIds.set(groupName, outcome.remoteId);
      logger.info(`Group created: '${groupName}' -> ${outcome.remoteId}`);
    } else {
      failed.push(groupName);
      logger.error(`Group failed: '${groupName}': ${outcome.error}`);
    }
  }

  const skipped = Array.from(partition.existing.keys());
  const summary = await store.finalize({
    operationType: 'Group Management',
    totalAttempted: partition.toCreate.length,
    totalSucceeded: created.length,
    totalSkipped: skipped.length,
    csvSourceFile: toPosixRelative(context.csvPath)
  });
  const snapshot = store.snapshotRef();
  logPhaseSummary(logger, summary, snapshot);

  const mappingFile = await exportMapping(
    context.outputDir,
    EXPORT_PREFIXES.groups,
    groupIds,
    context.now()
  );
  logger.info(`Group mapping exported to ${toPosixRelative(mappingFile)}`);

  return { summary, snapshot, created, skipped, failed, groupIds, mappingFile };
}
