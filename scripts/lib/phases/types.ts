import { toPosixRelative } from '../io.js';
import { banner, type ProvisionLogger } from '../logger.js';
import type { OperationSummary, SnapshotRef } from '../reconciliation_store.js';

export const PHASE_NAMES = ['collections', 'groups', 'permissions'] as const;

export type PhaseName = (typeof PHASE_NAMES)[number];

export interface PhaseContext {
  csvPath: string;
  recordsDir: string;
  outputDir: string;
  pathColumn: string;
  logger: ProvisionLogger;
  now: () => Date;
}

export interface PhaseResult {
  summary: OperationSummary;
  snapshot: SnapshotRef;
}

export function logPhaseSummary(
  logger: ProvisionLogger,
  summary: OperationSummary,
  snapshot: SnapshotRef
): void {
  for (const line of banner(`OPERATION SUMMARY: ${summary.operationType}`)) {
    logger.info(line);
  }
  logger.info(`Succeeded: ${summary.totalSucceeded}`);
  logger.info(`Failed: ${summary.totalFailed}`);
  logger.info(`Skipped: ${summary.totalSkipped}`);
  logger.info(`Total: ${summary.totalAttempted}`);
  logger.info(`Source: ${summary.csvSourceFile}`);
  logger.info(`Records: ${toPosixRelative(snapshot.filePath)}`);
}
