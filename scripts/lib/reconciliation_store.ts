import path from 'node:path';
import { z } from 'zod';

import { errorMessage, ProvisioningError } from './errors.js';
import {
  fileTimestamp,
  listFilesByRecency,
  readJsonFile,
  toPosixRelative,
  uniqueJsonPath,
  writeJsonFile,
  type FileEntry
} from './io.js';
import { describeIssues } from './vault/types.js';

export const OPERATION_FOR_KIND = {
  collection: 'collection_creation',
  group: 'group_management',
  permission: 'permission_assignment'
} as const;

export type RecordKind = keyof typeof OPERATION_FOR_KIND;
export type OperationName = (typeof OPERATION_FOR_KIND)[RecordKind];
export type CreatedKind = Exclude<RecordKind, 'permission'>;

export const DEFAULT_RECORDS_DIR = 'logs';

const collectionRecordSchema = z.object({
  timestamp: z.string(),
  collection_path: z.string(),
  collection_id: z.string(),
  organization_id: z.string(),
  status: z.enum(['created', 'existing', 'failed']),
  error_message: z.string().nullable()
});

const groupRecordSchema = z.object({
  timestamp: z.string(),
  group_name: z.string(),
  group_id: z.string(),
  organization_id: z.string(),
  status: z.enum(['created', 'existing', 'failed']),
  error_message: z.string().nullable()
});

const permissionRecordSchema = z.object({
  timestamp: z.string(),
  collection_path: z.string(),
  collection_id: z.string(),
  group_name: z.string(),
  group_id: z.string(),
  permission_level: z.string(),
  organization_id: z.string(),
  status: z.enum(['mapped', 'failed']),
  error_message: z.string().nullable()
});

const summarySchema = z.object({
  operation_type: z.string(),
  start_time: z.string(),
  end_time: z.string(),
  total_attempted: z.number().int().nonnegative(),
  total_succeeded: z.number().int().nonnegative(),
  total_failed: z.number().int(),
  total_skipped: z.number().int().nonnegative(),
  organization_id: z.string(),
  csv_source_file: z.string()
});

export const recordDocumentSchema = z.object({
  operation_metadata: z.object({
    operation_name: z.string(),
    run_id: z.string(),
    start_time: z.string(),
    log_file: z.string()
  }),
  collections: z.array(collectionRecordSchema).default([]),
  groups: z.array(groupRecordSchema).default([]),
  permissions: z.array(permissionRecordSchema).default([]),
  summary: summarySchema.nullable().default(null)
});

export type CollectionRecord = Readonly<z.infer<typeof collectionRecordSchema>>;
export type GroupRecord = Readonly<z.infer<typeof groupRecordSchema>>;
export type PermissionRecord = Readonly<z.infer<typeof permissionRecordSchema>>;
export type SummaryRecord = Readonly<z.infer<typeof summarySchema>>;
export type RecordDocument = z.infer<typeof recordDocumentSchema>;

/** `existing` marks an entity found remotely and adopted instead of created. */
export type EntityOutcome =
  | { status: 'created'; remoteId: string }
  | { status: 'existing'; remoteId: string }
  | { status: 'failed'; error: string };

export type AttemptOutcome = Extract<EntityOutcome, { status: 'created' | 'failed' }>;

export type PermissionOutcome =
  | { status: 'mapped'; collectionId: string; groupId: string }
  | { status: 'failed'; error: string; collectionId?: string; groupId?: string };

export type RecordInput =
  | { kind: 'collection'; collectionPath: string; outcome: EntityOutcome }
  | { kind: 'group'; groupName: string; outcome: EntityOutcome }
  | {
      kind: 'permission';
      collectionPath: string;
      groupName: string;
      permissionLevel: string;
      outcome: PermissionOutcome;
    };

export type ReconciliationRecord = CollectionRecord | GroupRecord | PermissionRecord;

export interface OperationSummary {
  operationType: string;
  startTime: string;
  endTime: string;
  totalAttempted: number;
  totalSucceeded: number;
  totalFailed: number;
  totalSkipped: number;
  organizationId: string;
  csvSourceFile: string;
}

export interface SummaryInput {
  operationType: string;
  totalAttempted: number;
  totalSucceeded: number;
  totalSkipped?: number;
  csvSourceFile: string;
}

/** Handle a phase passes downstream instead of leaving the next one to search the disk. */
export interface SnapshotRef {
  runId: string;
  operationName: OperationName;
  filePath: string;
}

export interface OpenStoreOptions {
  recordsDir: string;
  operationName: OperationName;
  organizationId?: string;
  now?: () => Date;
}

function toOperationSummary(summary: SummaryRecord): OperationSummary {
  return Object.freeze({
    operationType: summary.operation_type,
    startTime: summary.start_time,
    endTime: summary.end_time,
    totalAttempted: summary.total_attempted,
    totalSucceeded: summary.total_succeeded,
    totalFailed: summary.total_failed,
    totalSkipped: summary.total_skipped,
    organizationId: summary.organization_id,
    csvSourceFile: summary.csv_source_file
  });
}

/**
 * Append-only record of one phase run. Every record is written to disk before
 * record() resolves, so a crash loses at most the attempt in flight.
 */
export class ReconciliationStore {
  private finalized = false;

  private constructor(
    readonly filePath: string,
    readonly operationName: OperationName,
    private readonly document: RecordDocument,
    private readonly organizationId: string,
    private readonly now: () => Date
  ) {}

  static async open(options: OpenStoreOptions): Promise<ReconciliationStore> {
    const now = options.now ?? (() => new Date());
    const startedAt = now();
    const filePath = await uniqueJsonPath(
      options.recordsDir,
      `${options.operationName}_${fileTimestamp(startedAt)}`
    );

    const document: RecordDocument = {
      operation_metadata: {
        operation_name: options.operationName,
        run_id: path.basename(filePath, '.json'),
        start_time: startedAt.toISOString(),
        log_file: toPosixRelative(filePath)
      },
      collections: [],
      groups: [],
      permissions: [],
      summary: null
    };

    const store = new ReconciliationStore(
      filePath,
      options.operationName,
      document,
      options.organizationId ?? '',
      now
    );
    await store.save();
    return store;
  }

  get runId(): string {
    return this.document.operation_metadata.run_id;
  }

  snapshotRef(): SnapshotRef {
    return { runId: this.runId, operationName: this.operationName, filePath: this.filePath };
  }

  get records(): {
    collections: readonly CollectionRecord[];
    groups: readonly GroupRecord[];
    permissions: readonly PermissionRecord[];
  } {
    return {
      collections: this.document.collections,
      groups: this.document.groups,
      permissions: this.document.permissions
    };
  }

  async record(input: RecordInput): Promise<ReconciliationRecord> {
    if (this.finalized) {
      throw new Error(`Run ${this.runId} is finalized; no further records can be added`);
    }

    const timestamp = this.now().toISOString();
    const organization_id = this.organizationId;

    let entry: ReconciliationRecord;
    if (input.kind === 'collection') {
      const record: CollectionRecord = Object.freeze({
        timestamp,
        collection_path: input.collectionPath,
        collection_id: input.outcome.status === 'failed' ? '' : input.outcome.remoteId,
        organization_id,
        status: input.outcome.status,
        error_message: input.outcome.status === 'failed' ? input.outcome.error : null
      });
      this.document.collections.push(record);
      entry = record;
    } else if (input.kind === 'group') {
      const record: GroupRecord = Object.freeze({
        timestamp,
        group_name: input.groupName,
        group_id: input.outcome.status === 'failed' ? '' : input.outcome.remoteId,
        organization_id,
        status: input.outcome.status,
        error_message: input.outcome.status === 'failed' ? input.outcome.error : null
      });
      this.document.groups.push(record);
      entry = record;
    } else {
      const { outcome } = input;
      const record: PermissionRecord = Object.freeze({
        timestamp,
        collection_path: input.collectionPath,
        collection_id: outcome.collectionId ?? '',
        group_name: input.groupName,
        group_id: outcome.groupId ?? '',
        permission_level: input.permissionLevel,
        organization_id,
        status: outcome.status,
        error_message: outcome.status === 'failed' ? outcome.error : null
      });
      this.document.permissions.push(record);
      entry = record;
    }

    await this.save();
    return entry;
  }

  async finalize(input: SummaryInput): Promise<OperationSummary> {
    if (this.finalized) {
      throw new Error(`Run ${this.runId} is already finalized`);
    }

    const summary: SummaryRecord = Object.freeze({
      operation_type: input.operationType,
      start_time: this.document.operation_metadata.start_time,
      end_time: this.now().toISOString(),
      total_attempted: input.totalAttempted,
      total_succeeded: input.totalSucceeded,
      total_failed: input.totalAttempted - input.totalSucceeded,
      total_skipped: input.totalSkipped ?? 0,
      organization_id: this.organizationId,
      csv_source_file: input.csvSourceFile
    });

    this.document.summary = summary;
    this.finalized = true;
    await this.save();
    return toOperationSummary(summary);
  }

  /** Name -> remote ID for everything this run created or adopted. */
  createdIds(kind: CreatedKind): Map<string, string> {
    return createdIdsFrom(this.document, kind);
  }

  private async save(): Promise<void> {
    await writeJsonFile(this.filePath, this.document);
  }
}

export function createdIdsFrom(document: RecordDocument, kind: CreatedKind): Map<string, string> {
  const ids = new Map<string, string>();
  if (kind === 'collection') {
    for (const entry of document.collections) {
      if (entry.status !== 'failed') {
        ids.set(entry.collection_path, entry.collection_id);
      }
    }
  } else {
    for (const entry of document.groups) {
      if (entry.status !== 'failed') {
        ids.set(entry.group_name, entry.group_id);
      }
    }
  }
  return ids;
}

export function summaryOf(document: RecordDocument): OperationSummary | null {
  return document.summary ? toOperationSummary(document.summary) : null;
}

export async function readSnapshot(ref: SnapshotRef | string): Promise<RecordDocument> {
  const filePath = typeof ref === 'string' ? ref : ref.filePath;

  let raw: unknown;
  try {
    raw = await readJsonFile(filePath);
  } catch (error) {
    throw ProvisioningError.setup(
      'SNAPSHOT_UNREADABLE',
      `Could not read record file ${toPosixRelative(filePath)}: ${errorMessage(error)}`
    );
  }

  const parsed = recordDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    throw ProvisioningError.setup(
      'SNAPSHOT_INVALID',
      `Record file ${toPosixRelative(filePath)} is not a valid record document: ${describeIssues(parsed.error.issues)}`
    );
  }
  return parsed.data;
}

/** Record files of one operation, newest first. */
export async function listSnapshots(
  recordsDir: string,
  operationName: OperationName
): Promise<FileEntry[]> {
  return listFilesByRecency(recordsDir, `${operationName}_*.json`);
}

export const RESOLUTION_STRATEGIES = ['latest', 'merge'] as const;

/**
 * latest: only the newest run's creations are visible.
 * merge: every run of the operation, newer IDs overriding older ones.
 */
export type ResolutionStrategy = (typeof RESOLUTION_STRATEGIES)[number];

export function isResolutionStrategy(value: string): value is ResolutionStrategy {
  return (RESOLUTION_STRATEGIES as readonly string[]).includes(value);
}

/**
 * Successful creations from the most recently modified record file of the
 * operation that owns `kind`. Empty when no run has been recorded.
 */
export async function latestSnapshotFor(
  kind: CreatedKind,
  recordsDir: string
): Promise<Map<string, string>> {
  const [latest] = await listSnapshots(recordsDir, OPERATION_FOR_KIND[kind]);
  if (!latest) {
    return new Map();
  }
  return createdIdsFrom(await readSnapshot(latest.filePath), kind);
}

export interface ResolvedCreatedIds {
  ids: Map<string, string>;
  /** Record files consulted, oldest first. */
  sources: string[];
}

export async function resolveCreatedIds(
  kind: CreatedKind,
  recordsDir: string,
  strategy: ResolutionStrategy = 'latest'
): Promise<ResolvedCreatedIds> {
  const snapshots = await listSnapshots(recordsDir, OPERATION_FOR_KIND[kind]);
  const selected = strategy === 'latest' ? snapshots.slice(0, 1) : [...snapshots].reverse();

  const ids = new Map<string, string>();
  for (const entry of selected) {
    for (const [name, id] of createdIdsFrom(await readSnapshot(entry.filePath), kind)) {
      ids.set(name, id);
    }
  }

  return { ids, sources: selected.map((entry) => entry.filePath) };
}
