import { buildHierarchy, expandPaths, renderHierarchy } from './collection_hierarchy.js';
import { planCollectionCommand } from './vault/bw_cli.js';

export const ORGANIZATION_PLACEHOLDER = '<organization-id>';

/** Hierarchy, creation order and the CLI pipeline for each collection, with no remote call. */
export function renderCollectionPlan(
  paths: string[],
  organizationId: string = ORGANIZATION_PLACEHOLDER,
  command = 'bw'
): string {
  const ordered = expandPaths(paths);
  const lines = [
    ...renderHierarchy(buildHierarchy(paths)),
    '',
    `Creation order (${ordered.length}):`,
    ...ordered.map((collectionPath, index) => `${index + 1}. ${collectionPath}`),
    '',
    'Commands:',
    ...ordered.map((collectionPath) => planCollectionCommand(collectionPath, organizationId, command))
  ];
  return `${lines.join('\n')}\n`;
}
