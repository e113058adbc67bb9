// Connection settings for the record store, read from the environment.
//
// DATAVERSE_CONNECTION_STRING=Url=https://org.crm.dynamics.com;TenantId=...;ClientId=...;ClientSecret=...

import { FatalConnectionError } from './errors';
import type { ConnectionSettings } from './types';
import { connectionSettingsSchema } from './validators';

export const CONNECTION_STRING_ENV = 'DATAVERSE_CONNECTION_STRING';

const KEY_ALIASES: Record<string, keyof ConnectionSettings> = {
  url: 'url',
  serviceuri: 'url',
  tenantid: 'tenantId',
  authority: 'tenantId',
  clientid: 'clientId',
  appid: 'clientId',
  clientsecret: 'clientSecret',
  secret: 'clientSecret'
};

/**
 * Parse `Key=Value;Key=Value` pairs. Keys are case-insensitive; values may contain "="
 * but not ";". Unrecognized keys are ignored.
 */
export function parseConnectionString(connectionString: string): ConnectionSettings {
  const fields: Partial<Record<keyof ConnectionSettings, string>> = {};

  for (const part of connectionString.split(';')) {
    const eq = part.indexOf('=');
    if (eq <= 0) continue;
    const key = KEY_ALIASES[part.slice(0, eq).trim().toLowerCase()];
    if (key) fields[key] = part.slice(eq + 1).trim();
  }

  const result = connectionSettingsSchema.safeParse(fields);
  if (!result.success) {
    const missing = result.error.issues.map((i) => i.path.join('.')).join(', ');
    throw new FatalConnectionError(`Connection string is incomplete or invalid (${missing})`);
  }
  return result.data;
}

/** Connection settings from the environment; fatal when absent */
export function loadConnectionSettings(env: NodeJS.ProcessEnv = process.env): ConnectionSettings {
  const connectionString = env[CONNECTION_STRING_ENV];
  if (!connectionString) {
    throw new FatalConnectionError(`${CONNECTION_STRING_ENV} is not set`);
  }
  return parseConnectionString(connectionString);
}
