import assert from 'node:assert/strict';
import path from 'node:path';
import test from 'node:test';

import { ProvisioningError } from '../lib/errors.js';
import {
  labelFor,
  normalizeCollectionPath,
  parsePermissionMatrix,
  readPermissionMatrix,
  uniquePaths
} from '../lib/permission_matrix.js';
import { withTempCwd, writeFixtureFile } from './test_fs.js';

function expectProvisioningError(kind: string, code: string, message?: string) {
  return (error: unknown) =>
    error instanceof ProvisioningError &&
    error.kind === kind &&
    error.code === code &&
    (message === undefined || error.message === message);
}

test('parsePermissionMatrix keeps column and row order and leaves empty cells out', () => {
  const matrix = parsePermissionMatrix('Path,G1,G2\nA,Read,\n A/B ,None, Manage \n');

  assert.deepEqual(matrix.groups, ['G1', 'G2']);
  assert.deepEqual(matrix.paths, ['A', 'A/B']);
  assert.deepEqual(Object.fromEntries(matrix.permissions.get('A') ?? []), { G1: 'Read' });
  assert.deepEqual(Object.fromEntries(matrix.permissions.get('A/B') ?? []), {
    G1: 'None',
    G2: 'Manage'
  });
  assert.equal(labelFor(matrix, 'A', 'G2'), 'None');
  assert.equal(labelFor(matrix, 'A/B', 'G2'), 'Manage');
});

test('parsePermissionMatrix honours a custom path column in any position', () => {
  const matrix = parsePermissionMatrix('G1,Collection\nEdit,Vaults/Ops\n', {
    pathColumn: 'Collection'
  });

  assert.deepEqual(matrix.groups, ['G1']);
  assert.deepEqual(matrix.paths, ['Vaults/Ops']);
  assert.equal(labelFor(matrix, 'Vaults/Ops', 'G1'), 'Edit');
});

test('parsePermissionMatrix rejects labels outside the vocabulary, case-sensitively', () => {
  assert.throws(
    () => parsePermissionMatrix('Path,G1\nA,read\n', { source: 'matrix.csv' }),
    expectProvisioningError(
      'VALIDATION',
      'UNKNOWN_PERMISSION_LABEL',
      "matrix.csv:2: 'read' is not a permission level for 'A' / 'G1'. Expected Read|Edit|Manage|None"
    )
  );
});

test('parsePermissionMatrix rejects empty paths and empty path segments', () => {
  assert.throws(
    () => parsePermissionMatrix('Path,G1\nA,Read\n  ,Edit\n', { source: 'matrix.csv' }),
    expectProvisioningError('VALIDATION', 'EMPTY_PATH', 'matrix.csv:3: collection path is empty')
  );
  assert.throws(
    () => parsePermissionMatrix('Path,G1\nA//B,Read\n', { source: 'matrix.csv' }),
    expectProvisioningError(
      'VALIDATION',
      'EMPTY_PATH_SEGMENT',
      "matrix.csv:2: collection path 'A//B' has an empty segment"
    )
  );
  assert.throws(
    () => normalizeCollectionPath('/A', 'row'),
    expectProvisioningError('VALIDATION', 'EMPTY_PATH_SEGMENT')
  );
});

test('parsePermissionMatrix merges repeated paths and rejects conflicting labels', () => {
  const matrix = parsePermissionMatrix('Path,G1,G2\nA,Read,\nA,,Edit\nA,Read,\n');

  assert.deepEqual(matrix.paths, ['A', 'A', 'A']);
  assert.deepEqual(uniquePaths(matrix), ['A']);
  assert.equal(labelFor(matrix, 'A', 'G1'), 'Read');
  assert.equal(labelFor(matrix, 'A', 'G2'), 'Edit');

  assert.throws(
    () => parsePermissionMatrix('Path,G1\nA,Read\nA,Manage\n', { source: 'matrix.csv' }),
    expectProvisioningError(
      'VALIDATION',
      'CONFLICTING_PERMISSION',
      "matrix.csv:3: 'A' / 'G1' is both Read and Manage"
    )
  );
});

test('parsePermissionMatrix reports malformed headers and rows as setup errors', () => {
  assert.throws(
    () => parsePermissionMatrix('Name,G1\nA,Read\n', { source: 'matrix.csv' }),
    expectProvisioningError('SETUP', 'CSV_MALFORMED', "matrix.csv: header has no 'Path' column")
  );
  assert.throws(
    () => parsePermissionMatrix('Path,G1,G1\nA,Read,Read\n', { source: 'matrix.csv' }),
    expectProvisioningError(
      'SETUP',
      'CSV_MALFORMED',
      "matrix.csv: group column 'G1' is declared more than once"
    )
  );
  assert.throws(
    () => parsePermissionMatrix('Path,G1, \nA,Read,\n', { source: 'matrix.csv' }),
    expectProvisioningError('SETUP', 'CSV_MALFORMED', 'matrix.csv: column 3 has an empty group name')
  );
  assert.throws(
    () => parsePermissionMatrix('Path,G1\nA,Read,Edit\n', { source: 'matrix.csv' }),
    expectProvisioningError(
      'SETUP',
      'CSV_MALFORMED',
      'matrix.csv:2: row has 3 cells but the header declares 2'
    )
  );
});

test('readPermissionMatrix names the file in errors and fails setup when it is missing', async () => {
  await withTempCwd('vault-matrix-', async (root) => {
    await writeFixtureFile(root, 'input/matrix.csv', 'Path,G1\nA,Bogus');

    await assert.rejects(
      readPermissionMatrix(path.join(root, 'input', 'matrix.csv')),
      expectProvisioningError(
        'VALIDATION',
        'UNKNOWN_PERMISSION_LABEL',
        "input/matrix.csv:2: 'Bogus' is not a permission level for 'A' / 'G1'. Expected Read|Edit|Manage|None"
      )
    );

    await assert.rejects(
      readPermissionMatrix(path.join(root, 'input', 'absent.csv')),
      expectProvisioningError('SETUP', 'CSV_UNREADABLE')
    );
  });
});

test('parsePermissionMatrix keeps a quote inside a collection name', () => {
  const matrix = parsePermissionMatrix('Path,G1\nTeam "X"/Docs,Read\n');

  assert.deepEqual(matrix.paths, ['Team "X"/Docs']);
  assert.equal(matrix.permissions.get('Team "X"/Docs')?.get('G1'), 'Read');
});
