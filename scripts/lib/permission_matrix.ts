import fs from 'fs-extra';

import { parseCsv } from './csv.js';
import { errorMessage, ProvisioningError } from './errors.js';
import { toPosixRelative } from './io.js';

export const PERMISSION_LABELS = ['Read', 'Edit', 'Manage', 'None'] as const;

export type PermissionLabel = (typeof PERMISSION_LABELS)[number];

export const DEFAULT_PATH_COLUMN = 'Path';

export function isPermissionLabel(value: string): value is PermissionLabel {
  return (PERMISSION_LABELS as readonly string[]).includes(value);
}

export interface PermissionMatrix {
  /** Collection paths in row order; a path declared twice appears twice. */
  paths: string[];
  /** Group names in column order, path column excluded. */
  groups: string[];
  /** path -> group -> label. Empty cells have no entry. */
  permissions: Map<string, Map<string, PermissionLabel>>;
}

export interface ParseMatrixOptions {
  pathColumn?: string;
  /** Name used in error messages. */
  source?: string;
}

export function normalizeCollectionPath(raw: string, location: string): string {
  const trimmed = raw.trim();
  if (!trimmed) {
    throw ProvisioningError.validation('EMPTY_PATH', `${location}: collection path is empty`);
  }

  const segments = trimmed.split('/');
  if (segments.some((segment) => segment.trim().length === 0)) {
    throw ProvisioningError.validation(
      'EMPTY_PATH_SEGMENT',
      `${location}: collection path '${trimmed}' has an empty segment`
    );
  }

  return trimmed;
}

function validateHeaders(headers: string[], pathColumn: string, source: string): number {
  const pathIndex = headers.indexOf(pathColumn);
  if (pathIndex === -1) {
    throw ProvisioningError.setup(
      'CSV_MALFORMED',
      `${source}: header has no '${pathColumn}' column`
    );
  }

  const seen = new Set<string>();
  headers.forEach((header, index) => {
    if (index === pathIndex) {
      return;
    }
    if (!header) {
      throw ProvisioningError.setup(
        'CSV_MALFORMED',
        `${source}: column ${index + 1} has an empty group name`
      );
    }
    if (header === pathColumn || seen.has(header)) {
      throw ProvisioningError.setup(
        'CSV_MALFORMED',
        `${source}: group column '${header}' is declared more than once`
      );
    }
    seen.add(header);
  });

  return pathIndex;
}

export function parsePermissionMatrix(
  csvText: string,
  options: ParseMatrixOptions = {}
): PermissionMatrix {
  const pathColumn = options.pathColumn ?? DEFAULT_PATH_COLUMN;
  const source = options.source ?? 'CSV input';
  const parsed = parseCsv(csvText, source);
  const pathIndex = validateHeaders(parsed.headers, pathColumn, source);

  const groups = parsed.headers.filter((_, index) => index !== pathIndex);
  const paths: string[] = [];
  const permissions = new Map<string, Map<string, PermissionLabel>>();

  for (const row of parsed.rows) {
    const location = `${source}:${row.line}`;
    if (row.values.length > parsed.headers.length) {
      throw ProvisioningError.setup(
        'CSV_MALFORMED',
        `${location}: row has ${row.values.length} cells but the header declares ${parsed.headers.length}`
      );
    }

    const collectionPath = normalizeCollectionPath(row.values[pathIndex] ?? '', location);
    paths.push(collectionPath);

    const labels = permissions.get(collectionPath) ?? new Map<string, PermissionLabel>();
    permissions.set(collectionPath, labels);

    parsed.headers.forEach((group, index) => {
      if (index === pathIndex) {
        return;
      }

      const cell = (row.values[index] ?? '').trim();
      if (!cell) {
        return;
      }

      if (!isPermissionLabel(cell)) {
        throw ProvisioningError.validation(
          'UNKNOWN_PERMISSION_LABEL',
          `${location}: '${cell}' is not a permission level for '${collectionPath}' / '${group}'. Expected ${PERMISSION_LABELS.join('|')}`
        );
      }

      const previous = labels.get(group);
      if (previous !== undefined && previous !== cell) {
        throw ProvisioningError.validation(
          'CONFLICTING_PERMISSION',
          `${location}: '${collectionPath}' / '${group}' is both ${previous} and ${cell}`
        );
      }
      labels.set(group, cell);
    });
  }

  return { paths, groups, permissions };
}

export async function readPermissionMatrix(
  csvPath: string,
  options: Omit<ParseMatrixOptions, 'source'> = {}
): Promise<PermissionMatrix> {
  let csvText: string;
  try {
    csvText = await fs.readFile(csvPath, 'utf8');
  } catch (error) {
    throw ProvisioningError.setup(
      'CSV_UNREADABLE',
      `Could not read CSV file ${toPosixRelative(csvPath)}: ${errorMessage(error)}`
    );
  }

  return parsePermissionMatrix(csvText, { ...options, source: toPosixRelative(csvPath) });
}

/** The label a group holds on a path; empty cells read as None. */
export function labelFor(
  matrix: PermissionMatrix,
  collectionPath: string,
  groupName: string
): PermissionLabel {
  return matrix.permissions.get(collectionPath)?.get(groupName) ?? 'None';
}

/** Paths in declaration order with repeats removed. */
export function uniquePaths(matrix: PermissionMatrix): string[] {
  return Array.from(new Set(matrix.paths));
}
