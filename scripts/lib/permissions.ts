import { ProvisioningError } from './errors.js';
import {
  isPermissionLabel,
  labelFor,
  PERMISSION_LABELS,
  uniquePaths,
  type PermissionLabel,
  type PermissionMatrix
} from './permission_matrix.js';

export interface CollectionRights {
  readOnly: boolean;
  hidePasswords: boolean;
  manage: boolean;
}

export type GrantingLabel = Exclude<PermissionLabel, 'None'>;

const RIGHTS_BY_LABEL: Readonly<Record<GrantingLabel, Readonly<CollectionRights>>> = {
  Read: Object.freeze({ readOnly: true, hidePasswords: false, manage: false }),
  Edit: Object.freeze({ readOnly: false, hidePasswords: false, manage: false }),
  Manage: Object.freeze({ readOnly: false, hidePasswords: false, manage: true })
};

/**
 * Rights for a label, or null for None. Labels outside the vocabulary throw:
 * a misread permission must never fall back to a default.
 */
export function toRights(label: string): CollectionRights | null {
  if (!isPermissionLabel(label)) {
    throw ProvisioningError.validation(
      'UNKNOWN_PERMISSION_LABEL',
      `Unknown permission level '${label}'. Expected ${PERMISSION_LABELS.join('|')}`
    );
  }

  if (label === 'None') {
    return null;
  }

  return { ...RIGHTS_BY_LABEL[label] };
}

export function rightsToLabel(rights: CollectionRights): GrantingLabel {
  if (rights.manage) {
    return 'Manage';
  }
  return rights.readOnly ? 'Read' : 'Edit';
}

export interface PermissionAssociation {
  collectionPath: string;
  collectionId: string;
  groupId: string;
  label: GrantingLabel;
  rights: CollectionRights;
}

/** A granted cell whose collection has no remote ID; omitted, never fatal. */
export interface ResolutionGap {
  groupName: string;
  collectionPath: string;
  label: GrantingLabel;
}

export interface GroupAssociations {
  groupName: string;
  groupId: string;
  associations: PermissionAssociation[];
  gaps: ResolutionGap[];
}

export interface ResolvedIds {
  collections: ReadonlyMap<string, string>;
  groups: ReadonlyMap<string, string>;
}

export function buildGroupAssociations(
  groupName: string,
  matrix: PermissionMatrix,
  ids: ResolvedIds
): GroupAssociations {
  const groupId = ids.groups.get(groupName);
  if (!groupId) {
    throw ProvisioningError.validation(
      'UNRESOLVED_GROUP',
      `Group '${groupName}' has no resolved ID`
    );
  }

  const associations: PermissionAssociation[] = [];
  const gaps: ResolutionGap[] = [];

  for (const collectionPath of uniquePaths(matrix)) {
    const label = labelFor(matrix, collectionPath, groupName);
    const rights = toRights(label);
    if (!rights || label === 'None') {
      continue;
    }

    const collectionId = ids.collections.get(collectionPath);
    if (!collectionId) {
      gaps.push({ groupName, collectionPath, label });
      continue;
    }

    associations.push({ collectionPath, collectionId, groupId, label, rights });
  }

  return { groupName, groupId, associations, gaps };
}
