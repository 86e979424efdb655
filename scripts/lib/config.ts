import { z, type ZodIssue } from 'zod';

import { ProvisioningError } from './errors.js';
import type { ApiCredentials } from './vault/api_session.js';
import type { CliCredentials } from './vault/bw_cli.js';
import { DEFAULT_API_URL } from './vault/public_api.js';

export const DEFAULT_IDENTITY_URL = 'https://identity.bitwarden.com/connect/token';

const required = z.string().trim().min(1);

const optionalUrl = (fallback: string) =>
  z
    .string()
    .trim()
    .optional()
    .transform((value) => value || fallback)
    .pipe(z.string().url());

const CliEnvSchema = z.object({
  BW_ORGID: required,
  BW_USERCLIENTID: required,
  BW_USERCLIENTSECRET: required,
  BW_MASTERPASSWORD: required,
  BW_CLI: z
    .string()
    .trim()
    .optional()
    .transform((value) => value || 'bw')
});

const ApiEnvSchema = z.object({
  BW_ORGID: required,
  BW_ORGCLIENTID: required,
  BW_ORGCLIENTSECRET: required,
  BW_API_URL: optionalUrl(DEFAULT_API_URL),
  BW_IDENTITY_URL: optionalUrl(DEFAULT_IDENTITY_URL)
});

export interface ApiConfig {
  organizationId: string;
  apiUrl: string;
  credentials: ApiCredentials;
}

function envError(issues: ZodIssue[]): ProvisioningError {
  const variables = Array.from(new Set(issues.map((issue) => String(issue.path[0]))));
  const missing = issues.every((issue) => issue.code === 'invalid_type' || issue.code === 'too_small');

  if (missing) {
    return ProvisioningError.setup(
      'MISSING_CREDENTIALS',
      `Missing environment variables: ${variables.join(', ')}`,
      { variables }
    );
  }

  return ProvisioningError.setup(
    'INVALID_CONFIGURATION',
    `Invalid environment variables: ${issues
      .map((issue) => `${String(issue.path[0])} (${issue.message})`)
      .join(', ')}`,
    { variables }
  );
}

/** Credentials for creating collections through the vault CLI. */
export function loadCliConfig(env: NodeJS.ProcessEnv = process.env): CliCredentials {
  const parsed = CliEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw envError(parsed.error.issues);
  }

  return {
    organizationId: parsed.data.BW_ORGID,
    clientId: parsed.data.BW_USERCLIENTID,
    clientSecret: parsed.data.BW_USERCLIENTSECRET,
    masterPassword: parsed.data.BW_MASTERPASSWORD,
    command: parsed.data.BW_CLI
  };
}

/** Organisation API credentials for the group endpoints. */
export function loadApiConfig(env: NodeJS.ProcessEnv = process.env): ApiConfig {
  const parsed = ApiEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw envError(parsed.error.issues);
  }

  return {
    organizationId: parsed.data.BW_ORGID,
    apiUrl: parsed.data.BW_API_URL,
    credentials: {
      identityUrl: parsed.data.BW_IDENTITY_URL,
      clientId: parsed.data.BW_ORGCLIENTID,
      clientSecret: parsed.data.BW_ORGCLIENTSECRET
    }
  };
}
