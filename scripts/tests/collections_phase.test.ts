import assert from 'node:assert/strict';
import fs from 'fs-extra';
import path from 'node:path';
import test from 'node:test';

import { ProvisioningError } from '../lib/errors.js';
import { runCollectionsPhase } from '../lib/phases/collections_phase.js';
import { readSnapshot } from '../lib/reconciliation_store.js';
import { withTempCwd, writeFixtureFile } from './test_fs.js';
import { MemoryLogger, MockCollectionsCli, TEST_ORG_ID, testContext } from './vault_mocks.js';

const MATRIX = `
Path,G1,G2
A/B,None,Manage
A,Read,None
C,,Edit
`;

test('runCollectionsPhase creates the hierarchy in order and records every attempt', async () => {
  await withTempCwd('vault-collections-', async (root) => {
    await writeFixtureFile(root, 'input/matrix.csv', MATRIX);
    const logger = new MemoryLogger();
    const cli = new MockCollectionsCli({
      failOn: { 'A/B': ProvisioningError.entity('CLI_COMMAND_FAILED', 'already exists') }
    });

    const result = await runCollectionsPhase(testContext(root, logger), cli, TEST_ORG_ID);

    assert.equal(cli.authenticateCalls, 1);
    assert.equal(cli.listCalls, 2);
    assert.deepEqual(cli.createCalls, ['A', 'C', 'A/B']);
    assert.deepEqual(result.attempted, ['A', 'C', 'A/B']);
    assert.deepEqual(Object.fromEntries(result.collectionIds), { A: 'col:A', C: 'col:C' });
    assert.equal(result.summary.totalAttempted, 3);
    assert.equal(result.summary.totalSucceeded, 2);
    assert.equal(result.summary.totalFailed, 1);
    assert.equal(result.summary.csvSourceFile, 'input/matrix.csv');
    assert.deepEqual(logger.messages('error'), ["Collection failed: 'A/B': already exists"]);

    const document = await readSnapshot(result.snapshot);
    assert.deepEqual(
      document.collections.map((entry) => [entry.collection_path, entry.status, entry.collection_id]),
      [
        ['A', 'created', 'col:A'],
        ['C', 'created', 'col:C'],
        ['A/B', 'failed', '']
      ]
    );
    assert.equal(document.collections[2].error_message, 'already exists');

    assert.equal(
      result.mappingFile,
      path.join(root, 'output', 'collections_mapping_20260102T030410000.json')
    );
    assert.deepEqual(await fs.readJson(result.mappingFile), { A: 'col:A', C: 'col:C' });
    assert.deepEqual(
      result.remoteCollections?.map((collection) => collection.name),
      ['A', 'C']
    );
  });
});

test('runCollectionsPhase stops before any remote call when the CSV is invalid', async () => {
  await withTempCwd('vault-collections-', async (root) => {
    await writeFixtureFile(root, 'input/matrix.csv', 'Path,G1\nA,Owner');
    const cli = new MockCollectionsCli();

    await assert.rejects(
      runCollectionsPhase(testContext(root, new MemoryLogger()), cli, TEST_ORG_ID),
      (error: unknown) => error instanceof ProvisioningError && error.kind === 'VALIDATION'
    );
    assert.equal(cli.authenticateCalls, 0);
    assert.equal(await fs.pathExists(path.join(root, 'logs')), false);
  });
});

test('runCollectionsPhase fails the phase when authentication fails', async () => {
  await withTempCwd('vault-collections-', async (root) => {
    await writeFixtureFile(root, 'input/matrix.csv', MATRIX);
    const cli = new MockCollectionsCli({
      authError: ProvisioningError.setup('CLI_LOGIN_FAILED', 'bad key')
    });

    await assert.rejects(
      runCollectionsPhase(testContext(root, new MemoryLogger()), cli, TEST_ORG_ID),
      (error: unknown) => error instanceof ProvisioningError && error.code === 'CLI_LOGIN_FAILED'
    );
    assert.deepEqual(cli.createCalls, []);
    assert.equal(await fs.pathExists(path.join(root, 'logs')), false);
  });
});

test('runCollectionsPhase lets setup errors from a create end the phase', async () => {
  await withTempCwd('vault-collections-', async (root) => {
    await writeFixtureFile(root, 'input/matrix.csv', MATRIX);
    const cli = new MockCollectionsCli({
      failOn: { C: ProvisioningError.setup('CLI_NOT_AUTHENTICATED', 'session expired') }
    });

    await assert.rejects(
      runCollectionsPhase(testContext(root, new MemoryLogger()), cli, TEST_ORG_ID),
      (error: unknown) => error instanceof ProvisioningError && error.code === 'CLI_NOT_AUTHENTICATED'
    );
    assert.deepEqual(cli.createCalls, ['A', 'C']);
  });
});

test('runCollectionsPhase only warns when the verification listing fails', async () => {
  await withTempCwd('vault-collections-', async (root) => {
    await writeFixtureFile(root, 'input/matrix.csv', 'Path,G1\nA,Read');
    const logger = new MemoryLogger();
    const cli = new MockCollectionsCli({ listError: new Error('offline'), listErrorOnCall: 2 });

    const result = await runCollectionsPhase(testContext(root, logger), cli, TEST_ORG_ID);

    assert.equal(result.remoteCollections, null);
    assert.equal(result.summary.totalSucceeded, 1);
    assert.deepEqual(logger.messages('warn'), ['Could not list organisation collections: offline']);
  });
});

test('runCollectionsPhase adopts collections that already exist instead of creating them again', async () => {
  await withTempCwd('vault-collections-', async (root) => {
    await writeFixtureFile(root, 'input/matrix.csv', MATRIX);
    const logger = new MemoryLogger();
    const cli = new MockCollectionsCli({
      existing: [{ id: 'c-a-old', organizationId: TEST_ORG_ID, name: 'A' }]
    });

    const result = await runCollectionsPhase(testContext(root, logger), cli, TEST_ORG_ID);

    assert.deepEqual(cli.createCalls, ['C', 'A/B']);
    assert.deepEqual(result.attempted, ['C', 'A/B']);
    assert.deepEqual(result.skipped, ['A']);
    assert.deepEqual(Object.fromEntries(result.collectionIds), {
      A: 'c-a-old',
      C: 'col:C',
      'A/B': 'col:A/B'
    });
    assert.equal(result.summary.totalAttempted, 2);
    assert.equal(result.summary.totalSucceeded, 2);
    assert.equal(result.summary.totalFailed, 0);
    assert.equal(result.summary.totalSkipped, 1);
    assert.deepEqual(logger.messages('warn'), ["Skipping existing collection 'A' (c-a-old)"]);

    const document = await readSnapshot(result.snapshot);
    assert.deepEqual(
      document.collections.map((entry) => [entry.collection_path, entry.status, entry.collection_id]),
      [
        ['A', 'existing', 'c-a-old'],
        ['C', 'created', 'col:C'],
        ['A/B', 'created', 'col:A/B']
      ]
    );
  });
});

test('runCollectionsPhase run twice creates each collection once', async () => {
  await withTempCwd('vault-collections-', async (root) => {
    await writeFixtureFile(root, 'input/matrix.csv', 'Path,G1\nA/B,Read');
    const cli = new MockCollectionsCli();

    await runCollectionsPhase(testContext(root, new MemoryLogger()), cli, TEST_ORG_ID);
    const logger = new MemoryLogger();
    const rerun = await runCollectionsPhase(testContext(root, logger), cli, TEST_ORG_ID);

    assert.deepEqual(cli.createCalls, ['A', 'A/B']);
    assert.deepEqual(
      rerun.remoteCollections?.map((collection) => collection.name),
      ['A', 'A/B']
    );
    assert.deepEqual(rerun.attempted, []);
    assert.deepEqual(rerun.skipped, ['A', 'A/B']);
    assert.deepEqual(Object.fromEntries(rerun.collectionIds), { A: 'col:A', 'A/B': 'col:A/B' });
    assert.equal(rerun.summary.totalAttempted, 0);
    assert.equal(rerun.summary.totalSkipped, 2);
    assert.deepEqual(logger.messages('warn'), [
      "Skipping existing collection 'A' (col:A)",
      "Skipping existing collection 'A/B' (col:A/B)"
    ]);
    assert.equal(
      rerun.snapshot.filePath,
      path.join(root, 'logs', 'collection_creation_20260102T030405000_2.json')
    );
  });
});

test('runCollectionsPhase fails the phase when existing collections cannot be listed', async () => {
  await withTempCwd('vault-collections-', async (root) => {
    await writeFixtureFile(root, 'input/matrix.csv', MATRIX);
    const cli = new MockCollectionsCli({ listError: new Error('offline') });

    await assert.rejects(
      runCollectionsPhase(testContext(root, new MemoryLogger()), cli, TEST_ORG_ID),
      (error: unknown) =>
        error instanceof ProvisioningError &&
        error.kind === 'SETUP' &&
        error.code === 'COLLECTION_LISTING_FAILED' &&
        error.message === 'Could not list existing collections: offline'
    );
    assert.deepEqual(cli.createCalls, []);
    assert.equal(await fs.pathExists(path.join(root, 'logs')), false);
  });
});
