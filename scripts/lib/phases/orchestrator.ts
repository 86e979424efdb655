import { errorMessage } from '../errors.js';
import { banner } from '../logger.js';
import type { ResolutionStrategy, SnapshotRef } from '../reconciliation_store.js';
import type { CollectionsCli, GroupsApi } from '../vault/types.js';
import { runCollectionsPhase, type CollectionsPhaseResult } from './collections_phase.js';
import { runGroupsPhase, type GroupsPhaseResult } from './groups_phase.js';
import { runPermissionsPhase, type PermissionsPhaseResult } from './permissions_phase.js';
import { PHASE_NAMES, type PhaseContext, type PhaseName } from './types.js';

export type PipelineState = 'idle' | PhaseName | 'complete' | 'failed';

const NEXT_STATES: Record<PipelineState, readonly PipelineState[]> = {
  idle: ['collections', 'groups', 'permissions', 'complete'],
  collections: ['groups', 'permissions', 'complete', 'failed'],
  groups: ['permissions', 'complete', 'failed'],
  permissions: ['complete', 'failed'],
  complete: [],
  failed: []
};

export interface StateTransition {
  from: PipelineState;
  to: PipelineState;
  at: string;
  reason?: string;
}

/**
 * Clients are built on first use, so a single-phase run only needs the
 * credentials of the client it talks to.
 */
export interface PipelineClients {
  collections(): { cli: CollectionsCli; organizationId: string };
  groups(): { api: GroupsApi; organizationId: string };
}

export interface PipelineOptions {
  context: PhaseContext;
  clients: PipelineClients;
  skipExisting?: boolean;
  resolution?: ResolutionStrategy;
  /** Used by the permissions phase when the collections phase is not part of the run. */
  collectionsSnapshot?: string;
  /** Used by the permissions phase when the groups phase is not part of the run. */
  groupsMapping?: string;
}

export interface PipelineOutcome {
  state: 'complete' | 'failed';
  collections?: CollectionsPhaseResult;
  groups?: GroupsPhaseResult;
  permissions?: PermissionsPhaseResult;
  failedPhase?: PhaseName;
  error?: unknown;
  history: StateTransition[];
}

export class ProvisioningPipeline {
  private current: PipelineState = 'idle';
  private readonly transitions: StateTransition[] = [];

  constructor(private readonly options: PipelineOptions) {}

  get state(): PipelineState {
    return this.current;
  }

  get history(): readonly StateTransition[] {
    return this.transitions;
  }

  /** Runs the requested phases in pipeline order and halts at the first phase-fatal error. */
  async run(requested: readonly PhaseName[] = PHASE_NAMES): Promise<PipelineOutcome> {
    if (this.current !== 'idle') {
      throw new Error(`Pipeline has already run (state: ${this.current})`);
    }

    const { logger } = this.options.context;
    const phases = PHASE_NAMES.filter((phase) => requested.includes(phase));
    const outcome: Omit<PipelineOutcome, 'state' | 'history'> = {};

    for (const phase of phases) {
      this.transition(phase);
      for (const line of banner(`PHASE: ${phase}`)) {
        logger.info(line);
      }

      try {
        if (phase === 'collections') {
          outcome.collections = await this.runCollections();
        } else if (phase === 'groups') {
          outcome.groups = await this.runGroups();
        } else {
          outcome.permissions = await this.runPermissions(
            outcome.collections?.snapshot,
            outcome.groups?.mappingFile
          );
        }
      } catch (error) {
        this.transition('failed', errorMessage(error));
        logger.error(`Phase '${phase}' failed: ${errorMessage(error)}`);
        return { ...outcome, state: 'failed', failedPhase: phase, error, history: [...this.transitions] };
      }
    }

    this.transition('complete');
    return { ...outcome, state: 'complete', history: [...this.transitions] };
  }

  private async runCollections(): Promise<CollectionsPhaseResult> {
    const { cli, organizationId } = this.options.clients.collections();
    return runCollectionsPhase(this.options.context, cli, organizationId);
  }

  private async runGroups(): Promise<GroupsPhaseResult> {
    const { api, organizationId } = this.options.clients.groups();
    return runGroupsPhase(this.options.context, api, {
      organizationId,
      skipExisting: this.options.skipExisting
    });
  }

  private async runPermissions(
    collectionsSnapshot: SnapshotRef | undefined,
    groupsMapping: string | undefined
  ): Promise<PermissionsPhaseResult> {
    const { api, organizationId } = this.options.clients.groups();
    return runPermissionsPhase(this.options.context, api, {
      organizationId,
      collectionsSnapshot: collectionsSnapshot ?? this.options.collectionsSnapshot,
      groupsMapping: groupsMapping ?? this.options.groupsMapping,
      resolution: this.options.resolution
    });
  }

  private transition(to: PipelineState, reason?: string): void {
    if (!NEXT_STATES[this.current].includes(to)) {
      throw new Error(`Invalid pipeline transition ${this.current} -> ${to}`);
    }
    this.transitions.push({
      from: this.current,
      to,
      at: this.options.context.now().toISOString(),
      ...(reason === undefined ? {} : { reason })
    });
    this.current = to;
  }
}
