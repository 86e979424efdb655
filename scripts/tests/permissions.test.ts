import assert from 'node:assert/strict';
import test from 'node:test';

import { ProvisioningError } from '../lib/errors.js';
import { parsePermissionMatrix } from '../lib/permission_matrix.js';
import { buildGroupAssociations, rightsToLabel, toRights } from '../lib/permissions.js';

test('toRights maps each granting label to its fixed tuple and None to no entry', () => {
  assert.deepEqual(toRights('Read'), { readOnly: true, hidePasswords: false, manage: false });
  assert.deepEqual(toRights('Edit'), { readOnly: false, hidePasswords: false, manage: false });
  assert.deepEqual(toRights('Manage'), { readOnly: false, hidePasswords: false, manage: true });
  assert.equal(toRights('None'), null);
});

test('toRights returns a fresh tuple on every call', () => {
  const first = toRights('Read');
  const second = toRights('Read');
  assert.ok(first);
  assert.ok(second);
  first.readOnly = false;
  assert.equal(second.readOnly, true);
  assert.deepEqual(toRights('Read'), { readOnly: true, hidePasswords: false, manage: false });
});

test('toRights rejects anything outside the vocabulary', () => {
  for (const label of ['read', 'Admin', '', 'Read ']) {
    assert.throws(
      () => toRights(label),
      (error: unknown) =>
        error instanceof ProvisioningError &&
        error.kind === 'VALIDATION' &&
        error.code === 'UNKNOWN_PERMISSION_LABEL' &&
        error.message === `Unknown permission level '${label}'. Expected Read|Edit|Manage|None`
    );
  }
});

test('rightsToLabel inverts the translation', () => {
  for (const label of ['Read', 'Edit', 'Manage'] as const) {
    const rights = toRights(label);
    assert.ok(rights);
    assert.equal(rightsToLabel(rights), label);
  }
});

test('matrix scenario: G1 reads A, G2 manages A/B', () => {
  const matrix = parsePermissionMatrix('Path,G1,G2\nA,Read,None\nA/B,None,Manage\n');
  const ids = {
    collections: new Map([
      ['A', 'c-a'],
      ['A/B', 'c-ab']
    ]),
    groups: new Map([
      ['G1', 'g-1'],
      ['G2', 'g-2']
    ])
  };

  const g1 = buildGroupAssociations('G1', matrix, ids);
  const g2 = buildGroupAssociations('G2', matrix, ids);

  assert.deepEqual(g1.associations, [
    {
      collectionPath: 'A',
      collectionId: 'c-a',
      groupId: 'g-1',
      label: 'Read',
      rights: { readOnly: true, hidePasswords: false, manage: false }
    }
  ]);
  assert.deepEqual(g2.associations, [
    {
      collectionPath: 'A/B',
      collectionId: 'c-ab',
      groupId: 'g-2',
      label: 'Manage',
      rights: { readOnly: false, hidePasswords: false, manage: true }
    }
  ]);
  assert.deepEqual(g1.gaps, []);
  assert.deepEqual(g2.gaps, []);
});

test('buildGroupAssociations omits unresolved collections without throwing', () => {
  const matrix = parsePermissionMatrix('Path,G1\nX,Edit\nY,Read\nY,Read\nZ,\n');
  const result = buildGroupAssociations('G1', matrix, {
    collections: new Map([['Y', 'c-y']]),
    groups: new Map([['G1', 'g-1']])
  });

  assert.deepEqual(
    result.associations.map((association) => [association.collectionPath, association.label]),
    [['Y', 'Read']]
  );
  assert.deepEqual(result.gaps, [{ groupName: 'G1', collectionPath: 'X', label: 'Edit' }]);
});

test('buildGroupAssociations requires the group to be resolved', () => {
  const matrix = parsePermissionMatrix('Path,G1\nA,Read\n');
  assert.throws(
    () =>
      buildGroupAssociations('G1', matrix, { collections: new Map([['A', 'c-a']]), groups: new Map() }),
    (error: unknown) =>
      error instanceof ProvisioningError && error.code === 'UNRESOLVED_GROUP'
  );
});
