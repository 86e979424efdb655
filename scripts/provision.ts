import { runProvisionCli } from './lib/cli.js';
import { loadApiConfig, loadCliConfig } from './lib/config.js';
import { consoleLogger } from './lib/logger.js';
import type { PipelineClients } from './lib/phases/orchestrator.js';
import { interactivePromptAdapter } from './lib/prompts.js';
import { ApiTokenSession } from './lib/vault/api_session.js';
import { BwCliClient } from './lib/vault/bw_cli.js';
import { PublicApiClient } from './lib/vault/public_api.js';
import type { CollectionsCli, GroupsApi } from './lib/vault/types.js';

function environmentClients(): PipelineClients {
  let collections: { cli: CollectionsCli; organizationId: string } | undefined;
  let groups: { api: GroupsApi; organizationId: string } | undefined;

  return {
    collections() {
      if (!collections) {
        const credentials = loadCliConfig();
        collections = {
          cli: new BwCliClient(credentials),
          organizationId: credentials.organizationId
        };
      }
      return collections;
    },
    groups() {
      if (!groups) {
        const config = loadApiConfig();
        groups = {
          api: new PublicApiClient({
            baseURL: config.apiUrl,
            session: new ApiTokenSession(config.credentials)
          }),
          organizationId: config.organizationId
        };
      }
      return groups;
    }
  };
}

async function main(): Promise<void> {
  const outcome = await runProvisionCli(process.argv.slice(2), {
    prompt: interactivePromptAdapter,
    logger: consoleLogger,
    clients: environmentClients()
  });

  if (outcome?.state === 'failed') {
    process.exit(1);
  }
}

main().catch((error) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
