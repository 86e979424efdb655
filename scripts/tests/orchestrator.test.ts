import assert from 'node:assert/strict';
import test from 'node:test';

import { loadApiConfig } from '../lib/config.js';
import { ProvisioningError } from '../lib/errors.js';
import { ProvisioningPipeline, type PipelineClients } from '../lib/phases/orchestrator.js';
import { withTempCwd, writeFixtureFile } from './test_fs.js';
import {
  MemoryLogger,
  MockCollectionsCli,
  MockGroupsApi,
  TEST_ORG_ID,
  testContext
} from './vault_mocks.js';

const MATRIX = `
Path,G1,G2
A,Read,None
A/B,None,Manage
`;

function mockClients(cli: MockCollectionsCli, api: MockGroupsApi): PipelineClients & { groupCalls: number } {
  const clients = {
    groupCalls: 0,
    collections: () => ({ cli, organizationId: TEST_ORG_ID }),
    groups: () => {
      clients.groupCalls += 1;
      return { api, organizationId: TEST_ORG_ID };
    }
  };
  return clients;
}

test('ProvisioningPipeline runs every phase and hands each result to the next', async () => {
  await withTempCwd('vault-pipeline-', async (root) => {
    await writeFixtureFile(root, 'input/matrix.csv', MATRIX);
    const cli = new MockCollectionsCli();
    const api = new MockGroupsApi();
    const pipeline = new ProvisioningPipeline({
      context: testContext(root, new MemoryLogger()),
      clients: mockClients(cli, api)
    });

    const outcome = await pipeline.run();

    assert.equal(outcome.state, 'complete');
    assert.equal(pipeline.state, 'complete');
    assert.deepEqual(
      outcome.history.map((transition) => [transition.from, transition.to]),
      [
        ['idle', 'collections'],
        ['collections', 'groups'],
        ['groups', 'permissions'],
        ['permissions', 'complete']
      ]
    );
    assert.deepEqual(cli.createCalls, ['A', 'A/B']);
    assert.deepEqual(api.createCalls, ['G1', 'G2']);
    assert.deepEqual(api.updates, [
      {
        group: { id: 'grp:G1', name: 'G1' },
        collections: [{ id: 'col:A', readOnly: true, hidePasswords: false, manage: false }]
      },
      {
        group: { id: 'grp:G2', name: 'G2' },
        collections: [{ id: 'col:A/B', readOnly: false, hidePasswords: false, manage: true }]
      }
    ]);
    assert.equal(outcome.permissions?.summary.totalSucceeded, 2);
  });
});

test('ProvisioningPipeline halts at the first phase-fatal error', async () => {
  await withTempCwd('vault-pipeline-', async (root) => {
    await writeFixtureFile(root, 'input/matrix.csv', 'Path,G1\nA,Owner');
    const api = new MockGroupsApi();
    const clients = mockClients(new MockCollectionsCli(), api);
    const pipeline = new ProvisioningPipeline({ context: testContext(root, new MemoryLogger()), clients });

    const outcome = await pipeline.run();

    assert.equal(outcome.state, 'failed');
    assert.equal(outcome.failedPhase, 'collections');
    assert.ok(outcome.error instanceof ProvisioningError);
    assert.equal(outcome.error.code, 'UNKNOWN_PERMISSION_LABEL');
    assert.deepEqual(
      outcome.history.map((transition) => [transition.from, transition.to]),
      [
        ['idle', 'collections'],
        ['collections', 'failed']
      ]
    );
    assert.equal(clients.groupCalls, 0);
    await assert.rejects(pipeline.run(), /already run/);
  });
});

test('ProvisioningPipeline fails a phase whose client cannot be configured', async () => {
  await withTempCwd('vault-pipeline-', async (root) => {
    await writeFixtureFile(root, 'input/matrix.csv', MATRIX);
    const pipeline = new ProvisioningPipeline({
      context: testContext(root, new MemoryLogger()),
      clients: {
        collections: () => ({ cli: new MockCollectionsCli(), organizationId: TEST_ORG_ID }),
        groups: () => {
          const config = loadApiConfig({});
          return { api: new MockGroupsApi(), organizationId: config.organizationId };
        }
      }
    });

    const outcome = await pipeline.run(['groups']);

    assert.equal(outcome.state, 'failed');
    assert.equal(outcome.failedPhase, 'groups');
    assert.equal(outcome.collections, undefined);
    assert.equal(
      outcome.history.at(-1)?.reason,
      'Missing environment variables: BW_ORGID, BW_ORGCLIENTID, BW_ORGCLIENTSECRET'
    );
  });
});

test('ProvisioningPipeline runs a single phase straight from idle', async () => {
  await withTempCwd('vault-pipeline-', async (root) => {
    await writeFixtureFile(root, 'input/matrix.csv', MATRIX);
    const cli = new MockCollectionsCli();
    const pipeline = new ProvisioningPipeline({
      context: testContext(root, new MemoryLogger()),
      clients: mockClients(cli, new MockGroupsApi())
    });

    const outcome = await pipeline.run(['collections']);

    assert.equal(outcome.state, 'complete');
    assert.deepEqual(
      outcome.history.map((transition) => transition.to),
      ['collections', 'complete']
    );
    assert.equal(outcome.collections?.summary.totalSucceeded, 2);
  });
});
