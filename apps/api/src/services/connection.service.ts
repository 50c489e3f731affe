import type { ConnectionTestResult, OdooConnection, OdooConnectionInput } from '@punchcard/shared';
import { env } from '../config/env.js';
import { logger } from '../utils/logger.js';
import { getOdooServerVersion } from './odooRpc.service.js';

function normalize(input: OdooConnectionInput): OdooConnection {
  return {
    baseUrl: input.baseUrl.trim().replace(/\/+$/, ''),
    database: input.database.trim(),
  };
}

export function getDefaultConnection(): OdooConnection {
  return normalize({ baseUrl: env.ODOO_URL, database: env.ODOO_DB });
}

let current: OdooConnection = getDefaultConnection();

export function connectionKey(connection: OdooConnection): string {
  return `${connection.baseUrl}|${connection.database}`;
}

export function getConnection(): OdooConnection {
  return { ...current };
}

/**
 * Points new logins at another server. Existing sessions keep the
 * connection they logged in with.
 */
export function updateConnection(input: OdooConnectionInput): OdooConnection {
  const next = normalize(input);
  if (connectionKey(next) !== connectionKey(current)) {
    logger.info({ baseUrl: next.baseUrl, database: next.database }, 'Odoo connection updated');
  }
  current = next;
  return getConnection();
}

export function resetConnection(): OdooConnection {
  current = getDefaultConnection();
  logger.info({ baseUrl: current.baseUrl, database: current.database }, 'Odoo connection reset to defaults');
  return getConnection();
}

/** Probes a candidate connection without switching to it. */
export async function testConnection(candidate: OdooConnectionInput): Promise<ConnectionTestResult> {
  const connection = normalize(candidate);
  try {
    const serverVersion = await getOdooServerVersion(connection);
    return { reachable: true, serverVersion };
  } catch (err) {
    const error = err instanceof Error ? err.message : String(err);
    logger.warn({ baseUrl: connection.baseUrl, err: error }, 'Odoo connection test failed');
    return { reachable: false, error };
  }
}
