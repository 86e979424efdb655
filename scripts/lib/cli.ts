import { resolveFromCwd } from './io.js';
import type { ProvisionLogger } from './logger.js';
import { DEFAULT_OUTPUT_DIR } from './mapping_exports.js';
import { DEFAULT_PATH_COLUMN } from './permission_matrix.js';
import {
  ProvisioningPipeline,
  type PipelineClients,
  type PipelineOutcome
} from './phases/orchestrator.js';
import { PHASE_NAMES, type PhaseName } from './phases/types.js';
import type { PromptAdapter } from './prompts.js';
import {
  DEFAULT_RECORDS_DIR,
  isResolutionStrategy,
  RESOLUTION_STRATEGIES,
  type ResolutionStrategy
} from './reconciliation_store.js';

export const DEFAULT_CSV_PATH = 'input/collections_permissions.csv';

/** Options that take no value. */
const FLAG_OPTIONS: ReadonlySet<string> = new Set(['yes']);

const VALUE_OPTIONS = [
  'csv',
  'records-dir',
  'output-dir',
  'path-column',
  'resolution',
  'collections-snapshot',
  'groups-mapping',
  'skip-existing'
] as const;

export function parseCliOptionMap(
  args: string[],
  flags: ReadonlySet<string> = FLAG_OPTIONS
): Map<string, string> {
  const options = new Map<string, string>();

  for (let index = 0; index < args.length; index += 1) {
    const keyToken = args[index];
    if (!keyToken.startsWith('--')) {
      throw new Error(`Unexpected argument '${keyToken}'. Expected --key value pairs`);
    }

    const key = keyToken.slice(2).trim();
    if (!key) {
      throw new Error(`Invalid option '${keyToken}'`);
    }

    if (flags.has(key)) {
      options.set(key, 'true');
      continue;
    }

    const value = args[index + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new Error(`Missing value for option '--${key}'`);
    }

    options.set(key, value);
    index += 1;
  }

  return options;
}

export interface RunOptions {
  csvPath: string;
  recordsDir: string;
  outputDir: string;
  pathColumn: string;
  resolution: ResolutionStrategy;
  collectionsSnapshot?: string;
  groupsMapping?: string;
  skipExisting: boolean;
  assumeYes: boolean;
}

function parseYesNo(key: string, value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (normalized === 'yes') {
    return true;
  }
  if (normalized === 'no') {
    return false;
  }
  throw new Error(`Invalid value '${value}' for option '--${key}'. Expected yes|no`);
}

export function resolveRunOptions(options: Map<string, string>): RunOptions {
  const known = new Set<string>([...VALUE_OPTIONS, ...FLAG_OPTIONS]);
  for (const key of options.keys()) {
    if (!known.has(key)) {
      const expected = Array.from(known, (name) => `--${name}`).join(', ');
      throw new Error(`Unknown option '--${key}'. Expected one of: ${expected}`);
    }
  }

  const resolution = options.get('resolution') ?? 'latest';
  if (!isResolutionStrategy(resolution)) {
    throw new Error(
      `Invalid value '${resolution}' for option '--resolution'. Expected ${RESOLUTION_STRATEGIES.join('|')}`
    );
  }

  const pathColumn = (options.get('path-column') ?? DEFAULT_PATH_COLUMN).trim();
  if (!pathColumn) {
    throw new Error("Option '--path-column' must not be empty");
  }

  const collectionsSnapshot = options.get('collections-snapshot');
  const groupsMapping = options.get('groups-mapping');

  return {
    csvPath: resolveFromCwd(options.get('csv') ?? DEFAULT_CSV_PATH),
    recordsDir: resolveFromCwd(options.get('records-dir') ?? DEFAULT_RECORDS_DIR),
    outputDir: resolveFromCwd(options.get('output-dir') ?? DEFAULT_OUTPUT_DIR),
    pathColumn,
    resolution,
    collectionsSnapshot:
      collectionsSnapshot === undefined ? undefined : resolveFromCwd(collectionsSnapshot),
    groupsMapping: groupsMapping === undefined ? undefined : resolveFromCwd(groupsMapping),
    skipExisting: parseYesNo('skip-existing', options.get('skip-existing') ?? 'yes'),
    assumeYes: options.get('yes') === 'true'
  };
}

/** `all` or one phase name; undefined leaves the choice to the prompt. */
export function parsePhaseCommand(command: string | undefined): PhaseName[] | undefined {
  const normalized = command?.trim().toLowerCase();
  if (!normalized) {
    return undefined;
  }
  if (normalized === 'all') {
    return [...PHASE_NAMES];
  }

  const phase = PHASE_NAMES.find((name) => name === normalized);
  if (!phase) {
    throw new Error(`Unknown command '${command}'. Expected all|${PHASE_NAMES.join('|')}`);
  }
  return [phase];
}

export interface ProvisionCliDeps {
  prompt: PromptAdapter;
  logger: ProvisionLogger;
  clients: PipelineClients;
  now?: () => Date;
}

/** Returns null when the operator declines the confirmation. */
export async function runProvisionCli(
  argv: string[],
  deps: ProvisionCliDeps
): Promise<PipelineOutcome | null> {
  const hasCommand = argv.length > 0 && !argv[0].startsWith('--');
  const commandToken = hasCommand ? argv[0] : undefined;
  const runOptions = resolveRunOptions(parseCliOptionMap(hasCommand ? argv.slice(1) : argv));

  let phases = parsePhaseCommand(commandToken);
  if (!phases) {
    const selected = await deps.prompt.select<PhaseName | 'all'>({
      message: 'Phase to run:',
      choices: [
        { name: 'all phases', value: 'all' },
        ...PHASE_NAMES.map((phase) => ({ name: phase, value: phase }))
      ],
      defaultValue: 'all'
    });
    phases = selected === 'all' ? [...PHASE_NAMES] : [selected];
  }

  if (!runOptions.assumeYes) {
    const confirmed = await deps.prompt.confirm({
      message: `Run ${phases.join(' -> ')} against the vault organisation?`,
      defaultValue: false
    });
    if (!confirmed) {
      deps.logger.info('Aborted; nothing was changed.');
      return null;
    }
  }

  const pipeline = new ProvisioningPipeline({
    context: {
      csvPath: runOptions.csvPath,
      recordsDir: runOptions.recordsDir,
      outputDir: runOptions.outputDir,
      pathColumn: runOptions.pathColumn,
      logger: deps.logger,
      now: deps.now ?? (() => new Date())
    },
    clients: deps.clients,
    skipExisting: runOptions.skipExisting,
    resolution: runOptions.resolution,
    collectionsSnapshot: runOptions.collectionsSnapshot,
    groupsMapping: runOptions.groupsMapping
  });

  return pipeline.run(phases);
}
