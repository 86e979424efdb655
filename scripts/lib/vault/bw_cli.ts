import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import type { ZodType, ZodTypeDef } from 'zod';

import { errorMessage, ProvisioningError } from '../errors.js';
import {
  collectionListSchema,
  describeIssues,
  vaultCollectionSchema,
  type CollectionCreateRequest,
  type CollectionsCli,
  type VaultCollection
} from './types.js';

const execFileAsync = promisify(execFile);

export interface CommandOutput {
  stdout: string;
  stderr: string;
}

export type CommandRunner = (
  command: string,
  args: string[],
  options: { env?: NodeJS.ProcessEnv }
) => Promise<CommandOutput>;

export const execFileRunner: CommandRunner = async (command, args, options) => {
  const result = await execFileAsync(command, args, {
    encoding: 'utf8',
    env: options.env,
    maxBuffer: 16 * 1024 * 1024
  });
  return { stdout: result.stdout, stderr: result.stderr };
};

export interface CliCredentials {
  organizationId: string;
  clientId: string;
  clientSecret: string;
  masterPassword: string;
  /** Executable name or path of the vault CLI. */
  command: string;
}

function commandFailure(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'stderr' in error) {
    const stderr = error.stderr;
    if (typeof stderr === 'string' && stderr.trim()) {
      return stderr.trim();
    }
  }
  return errorMessage(error);
}

export function encodeCollectionRequest(request: CollectionCreateRequest): string {
  return Buffer.from(JSON.stringify(request), 'utf8').toString('base64');
}

function shellQuote(value: string): string {
  return `'${value.replaceAll("'", "'\\''")}'`;
}

/** The pipeline an operator would run by hand to create one collection. */
export function planCollectionCommand(
  collectionPath: string,
  organizationId: string,
  command = 'bw'
): string {
  const jqFilter =
    `.organizationId=${JSON.stringify(organizationId)} | .name=${JSON.stringify(collectionPath)}`;
  return [
    `${command} get template org-collection`,
    `jq ${shellQuote(jqFilter)}`,
    `${command} encode`,
    `${command} create org-collection --organizationid ${shellQuote(organizationId)}`
  ].join(' | ');
}

/**
 * Drives the vault CLI. Holds the unlocked session key for the lifetime of
 * the client; every call after authenticate() passes it explicitly.
 */
export class BwCliClient implements CollectionsCli {
  private sessionKey: string | null = null;

  constructor(
    private readonly credentials: CliCredentials,
    private readonly runner: CommandRunner = execFileRunner
  ) {}

  get isAuthenticated(): boolean {
    return this.sessionKey !== null;
  }

  /** Returns false when the CLI had no active login to end. */
  async logout(): Promise<boolean> {
    try {
      await this.runner(this.credentials.command, ['logout'], {});
      return true;
    } catch (error) {
      if (commandFailure(error).toLowerCase().includes('not logged in')) {
        return false;
      }
      throw ProvisioningError.setup('CLI_LOGOUT_FAILED', `Vault CLI logout failed: ${commandFailure(error)}`);
    }
  }

  async authenticate(): Promise<void> {
    this.sessionKey = null;
    await this.logout();

    try {
      await this.runner(this.credentials.command, ['login', '--apikey'], {
        env: {
          ...process.env,
          BW_CLIENTID: this.credentials.clientId,
          BW_CLIENTSECRET: this.credentials.clientSecret
        }
      });
    } catch (error) {
      throw ProvisioningError.setup('CLI_LOGIN_FAILED', `Vault CLI login failed: ${commandFailure(error)}`);
    }

    let unlocked: CommandOutput;
    try {
      unlocked = await this.runner(
        this.credentials.command,
        ['unlock', '--passwordenv', 'BW_PASSWORD', '--raw'],
        { env: { ...process.env, BW_PASSWORD: this.credentials.masterPassword } }
      );
    } catch (error) {
      throw ProvisioningError.setup('CLI_UNLOCK_FAILED', `Vault unlock failed: ${commandFailure(error)}`);
    }

    const sessionKey = unlocked.stdout.trim();
    if (!sessionKey) {
      throw ProvisioningError.setup('CLI_UNLOCK_FAILED', 'Vault unlock returned no session key');
    }
    this.sessionKey = sessionKey;
  }

  async createCollection(collectionPath: string): Promise<VaultCollection> {
    const request: CollectionCreateRequest = {
      organizationId: this.credentials.organizationId,
      name: collectionPath,
      externalId: null,
      groups: []
    };

    const stdout = await this.runWithSession(
      [
        'create',
        'org-collection',
        encodeCollectionRequest(request),
        '--organizationid',
        this.credentials.organizationId
      ],
      `create collection '${collectionPath}'`
    );

    return this.parseJson(vaultCollectionSchema, stdout, `create collection '${collectionPath}'`);
  }

  async listCollections(): Promise<VaultCollection[]> {
    const stdout = await this.runWithSession(
      ['list', 'org-collections', '--organizationid', this.credentials.organizationId],
      'list collections'
    );
    return this.parseJson(collectionListSchema, stdout, 'list collections');
  }

  private async runWithSession(args: string[], operation: string): Promise<string> {
    if (!this.sessionKey) {
      throw ProvisioningError.setup(
        'CLI_NOT_AUTHENTICATED',
        `Cannot ${operation}: the vault CLI session is not unlocked`
      );
    }

    try {
      const result = await this.runner(
        this.credentials.command,
        [...args, '--session', this.sessionKey],
        {}
      );
      return result.stdout;
    } catch (error) {
      throw ProvisioningError.entity('CLI_COMMAND_FAILED', `Could not ${operation}: ${commandFailure(error)}`);
    }
  }

  private parseJson<T>(
    schema: ZodType<T, ZodTypeDef, unknown>,
    stdout: string,
    operation: string
  ): T {
    let data: unknown;
    try {
      data = JSON.parse(stdout);
    } catch (error) {
      throw ProvisioningError.entity(
        'UNEXPECTED_RESPONSE',
        `Could not ${operation}: CLI output is not JSON (${errorMessage(error)})`
      );
    }

    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      throw ProvisioningError.entity(
        'UNEXPECTED_RESPONSE',
        `Could not ${operation}: unexpected CLI output (${describeIssues(parsed.error.issues)})`
      );
    }
    return parsed.data;
  }
}
