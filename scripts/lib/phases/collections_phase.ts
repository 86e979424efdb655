import { buildHierarchy, expandPaths, renderHierarchy } from '../collection_hierarchy.js';
import { errorMessage, isPhaseFatal, ProvisioningError } from '../errors.js';
import { toPosixRelative } from '../io.js';
import { EXPORT_PREFIXES, exportMapping } from '../mapping_exports.js';
import { readPermissionMatrix } from '../permission_matrix.js';
import { ReconciliationStore, type AttemptOutcome } from '../reconciliation_store.js';
import type { CollectionsCli, VaultCollection } from '../vault/types.js';
import { logPhaseSummary, type PhaseContext, type PhaseResult } from './types.js';

export interface CollectionsPhaseResult extends PhaseResult {
  /** Paths in the order they were attempted. */
  attempted: string[];
  /** Paths already present in the organisation, adopted with their remote IDs. */
  skipped: string[];
  collectionIds: Map<string, string>;
  mappingFile: string;
  /** Org collections listed after the run; null when listing failed. */
  remoteCollections: VaultCollection[] | null;
}

/** Remote collection IDs by name; the first listed wins on duplicates. */
export function remoteCollectionIds(remote: VaultCollection[]): Map<string, string> {
  const ids = new Map<string, string>();
  for (const collection of remote) {
    if (!ids.has(collection.name)) {
      ids.set(collection.name, collection.id);
    }
  }
  return ids;
}

async function listExisting(cli: CollectionsCli): Promise<Map<string, string>> {
  try {
    return remoteCollectionIds(await cli.listCollections());
  } catch (error) {
    if (isPhaseFatal(error)) {
      throw error;
    }
    throw ProvisioningError.setup(
      'COLLECTION_LISTING_FAILED',
      `Could not list existing collections: ${errorMessage(error)}`
    );
  }
}

async function createOne(cli: CollectionsCli, collectionPath: string): Promise<AttemptOutcome> {
  try {
    const created = await cli.createCollection(collectionPath);
    return { status: 'created', remoteId: created.id };
  } catch (error) {
    if (isPhaseFatal(error)) {
      throw error;
    }
    return { status: 'failed', error: errorMessage(error) };
  }
}

export async function runCollectionsPhase(
  context: PhaseContext,
  cli: CollectionsCli,
  organizationId: string
): Promise<CollectionsPhaseResult> {
  const { logger } = context;

  const matrix = await readPermissionMatrix(context.csvPath, { pathColumn: context.pathColumn });
  const expanded = expandPaths(matrix.paths);
  logger.info(`Collections in CSV hierarchy (${expanded.length}):`);
  for (const line of renderHierarchy(buildHierarchy(matrix.paths))) {
    logger.info(line);
  }

  await cli.authenticate();
  const existing = await listExisting(cli);

  const store = await ReconciliationStore.open({
    recordsDir: context.recordsDir,
    operationName: 'collection_creation',
    organizationId,
    now: context.now
  });

  const attempted: string[] = [];
  const skipped: string[] = [];
  let succeeded = 0;
  for (const collectionPath of expanded) {
    const remoteId = existing.get(collectionPath);
    if (remoteId !== undefined) {
      await store.record({ kind: 'collection', collectionPath, outcome: { status: 'existing', remoteId } });
      skipped.push(collectionPath);
      logger.warn(`Skipping existing collection '${collectionPath}' (${remoteId})`);
      continue;
    }

    attempted.push(collectionPath);
    const outcome = await createOne(cli, collectionPath);
    await store.record({ kind: 'collection', collectionPath, outcome });

    if (outcome.status === 'created') {
      succeeded += 1;
      logger.info(`Collection created: '${collectionPath}' -> ${outcome.remoteId}`);
    } else {
      logger.error(`Collection failed: '${collectionPath}': ${outcome.error}`);
    }
  }

  const summary = await store.finalize({
    operationType: 'Collection Creation',
    totalAttempted: attempted.length,
    totalSucceeded: succeeded,
    totalSkipped: skipped.length,
    csvSourceFile: toPosixRelative(context.csvPath)
  });
  const snapshot = store.snapshotRef();
  logPhaseSummary(logger, summary, snapshot);

  const collectionIds = store.createdIds('collection');
  const mappingFile = await exportMapping(
    context.outputDir,
    EXPORT_PREFIXES.collections,
    collectionIds,
    context.now()
  );
  logger.info(`Collection mapping exported to ${toPosixRelative(mappingFile)}`);

  let remoteCollections: VaultCollection[] | null = null;
  try {
    remoteCollections = await cli.listCollections();
    logger.info(`Organisation now has ${remoteCollections.length} collections`);
  } catch (error) {
    logger.warn(`Could not list organisation collections: ${errorMessage(error)}`);
  }

  return { summary, snapshot, attempted, skipped, collectionIds, mappingFile, remoteCollections };
}
