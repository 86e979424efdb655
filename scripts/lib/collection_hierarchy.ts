/**
 * Collection hierarchy is encoded only in names: "A/B/C" is a child of "A/B",
 * which is a child of "A". Every ancestor has to exist before its children
 * can be created, so raw paths are expanded to their prefix closure.
 */

export const PATH_SEPARATOR = '/';

/** Bucket holding depth-0 collections; a symbol so no real path can collide with it. */
export const ROOT_BUCKET: unique symbol = Symbol('root');

export type HierarchyKey = string | typeof ROOT_BUCKET;

export interface CollectionNode {
  path: string;
  name: string;
  depth: number;
  parentPath: string | null;
}

export function pathSegments(collectionPath: string): string[] {
  return collectionPath.split(PATH_SEPARATOR);
}

export function toCollectionNode(collectionPath: string): CollectionNode {
  const segments = pathSegments(collectionPath);
  const depth = segments.length - 1;

  return {
    path: collectionPath,
    name: segments[depth],
    depth,
    parentPath: depth === 0 ? null : segments.slice(0, depth).join(PATH_SEPARATOR)
  };
}

/** "A/B/C" -> ["A", "A/B", "A/B/C"] */
export function pathPrefixes(collectionPath: string): string[] {
  const segments = pathSegments(collectionPath);
  return segments.map((_, index) => segments.slice(0, index + 1).join(PATH_SEPARATOR));
}

function compareCodeUnits(left: string, right: string): number {
  if (left === right) {
    return 0;
  }
  return left < right ? -1 : 1;
}

/** Fewer segments first, then plain code-unit order. */
export function compareCreationOrder(left: string, right: string): number {
  const depthDelta = pathSegments(left).length - pathSegments(right).length;
  return depthDelta !== 0 ? depthDelta : compareCodeUnits(left, right);
}

export function expandPaths(paths: Iterable<string>): string[] {
  const closure = new Set<string>();
  for (const collectionPath of paths) {
    for (const prefix of pathPrefixes(collectionPath)) {
      closure.add(prefix);
    }
  }

  return Array.from(closure).sort(compareCreationOrder);
}

export function buildHierarchy(paths: Iterable<string>): Map<HierarchyKey, string[]> {
  const hierarchy = new Map<HierarchyKey, string[]>();

  for (const collectionPath of expandPaths(paths)) {
    const { parentPath } = toCollectionNode(collectionPath);
    const key: HierarchyKey = parentPath ?? ROOT_BUCKET;
    const children = hierarchy.get(key) ?? [];
    children.push(collectionPath);
    hierarchy.set(key, children);
  }

  return hierarchy;
}

export function renderHierarchy(hierarchy: Map<HierarchyKey, string[]>): string[] {
  const lines: string[] = [];

  const roots = hierarchy.get(ROOT_BUCKET) ?? [];
  if (roots.length > 0) {
    lines.push('Root Collections:');
    for (const child of roots) {
      lines.push(`  └── ${child}`);
    }
  }

  for (const [parent, children] of hierarchy) {
    if (parent === ROOT_BUCKET) {
      continue;
    }
    lines.push(`${parent}:`);
    for (const child of children) {
      lines.push(`  └── ${toCollectionNode(child).name}`);
    }
  }

  return lines;
}
