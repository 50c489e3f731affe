import type { OdooConnection } from '@punchcard/shared';
import { env } from '../config/env.js';
import { logger } from '../utils/logger.js';

export type OdooRpcErrorKind = 'transport' | 'remote';

/**
 * `transport` covers network, timeout and HTTP-level failures. `remote` is a
 * JSON-RPC error raised by Odoo itself (access rights, validation, unknown
 * fields).
 */
export class OdooRpcError extends Error {
  constructor(
    public readonly kind: OdooRpcErrorKind,
    message: string,
  ) {
    super(message);
    this.name = 'OdooRpcError';
  }
}

export interface OdooCredentials extends OdooConnection {
  uid: number;
  password: string;
}

export type OdooDomain = unknown[];

export interface SearchReadOptions {
  order?: string;
  limit?: number;
}

/** The subset of `execute_kw` the service relies on. */
export interface OdooModelClient {
  /** Rows come back untyped; callers validate the fields they asked for. */
  searchRead(
    model: string,
    domain: OdooDomain,
    fields: string[],
    options?: SearchReadOptions,
  ): Promise<unknown[]>;
  create(model: string, values: Record<string, unknown>): Promise<number>;
  write(model: string, ids: number[], values: Record<string, unknown>): Promise<boolean>;
}

interface JsonRpcResponse {
  result?: unknown;
  error?: { message?: string; data?: { message?: string; debug?: string } };
}

function isJsonRpcResponse(value: unknown): value is JsonRpcResponse {
  return typeof value === 'object' && value !== null;
}

export function normalizeBaseUrl(baseUrl: string): string {
  let url = baseUrl.trim().replace(/\/+$/, '');
  if (!url.startsWith('http://') && !url.startsWith('https://')) {
    url = `https://${url}`;
  }
  return url;
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Makes a JSON-RPC call against `<baseUrl>/jsonrpc`.
 * @returns The `result` member of the response.
 */
export async function jsonRpc(
  baseUrl: string,
  service: string,
  method: string,
  args: unknown[],
  timeoutMs: number = env.ODOO_TIMEOUT_MS,
): Promise<unknown> {
  const url = `${normalizeBaseUrl(baseUrl)}/jsonrpc`;

  let response: Response;
  try {
    response = await fetch(url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Accept: 'application/json',
      },
      body: JSON.stringify({
        jsonrpc: '2.0',
        method: 'call',
        params: { service, method, args },
        id: Math.floor(Math.random() * 1000000),
      }),
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (err) {
    logger.warn({ url, service, method, err: describeError(err) }, 'Odoo JSON-RPC request failed');
    throw new OdooRpcError('transport', describeError(err));
  }

  if (!response.ok) {
    logger.warn({ url, service, method, status: response.status }, 'Odoo JSON-RPC HTTP error');
    throw new OdooRpcError('transport', `HTTP Error: ${response.status}`);
  }

  let data: unknown;
  try {
    data = await response.json();
  } catch (err) {
    throw new OdooRpcError('transport', `Invalid JSON-RPC response: ${describeError(err)}`);
  }

  if (!isJsonRpcResponse(data)) {
    throw new OdooRpcError('transport', 'Invalid JSON-RPC response');
  }

  if (data.error) {
    const detailedMessage = data.error.data?.message || data.error.message || 'Odoo method call failed';
    throw new OdooRpcError('remote', detailedMessage);
  }

  return data.result ?? null;
}

/**
 * Calls an Odoo model method using execute_kw
 * @param model - The Odoo model name (e.g., 'hr.attendance')
 * @param method - The method to call on the model (e.g., 'search_read', 'write')
 * @param args - Positional arguments for the method
 * @param kwargs - Keyword arguments for the method
 */
export async function callOdooKw(
  credentials: OdooCredentials,
  model: string,
  method: string,
  args: unknown[] = [],
  kwargs: Record<string, unknown> = {},
): Promise<unknown> {
  try {
    return await jsonRpc(
      credentials.baseUrl,
      'object',
      'execute_kw',
      [credentials.database, credentials.uid, credentials.password, model, method, args, kwargs],
      method === 'search_read' ? env.ODOO_TIMEOUT_MS : env.ODOO_WRITE_TIMEOUT_MS,
    );
  } catch (err) {
    logger.error(
      { model, method, err: describeError(err) },
      'Error calling Odoo execute_kw',
    );
    throw err;
  }
}

export function createOdooClient(credentials: OdooCredentials): OdooModelClient {
  return {
    async searchRead(
      model: string,
      domain: OdooDomain,
      fields: string[],
      options: SearchReadOptions = {},
    ): Promise<unknown[]> {
      const result = await callOdooKw(credentials, model, 'search_read', [], {
        domain,
        fields,
        ...options,
      });
      if (!Array.isArray(result)) {
        throw new OdooRpcError('remote', `Unexpected search_read result for ${model}`);
      }
      return result;
    },

    async create(model: string, values: Record<string, unknown>): Promise<number> {
      const result = await callOdooKw(credentials, model, 'create', [values]);
      const id = Array.isArray(result) ? result[0] : result;
      if (typeof id !== 'number') {
        throw new OdooRpcError('remote', `Unexpected create result for ${model}`);
      }
      return id;
    },

    async write(model: string, ids: number[], values: Record<string, unknown>): Promise<boolean> {
      const result = await callOdooKw(credentials, model, 'write', [ids, values]);
      return result === true;
    },
  };
}

/**
 * Authenticates against `common.authenticate`.
 * @returns The Odoo user id, or null when the server rejects the credentials.
 */
export async function authenticateOdooUser(
  connection: OdooConnection,
  login: string,
  password: string,
): Promise<number | null> {
  const result = await jsonRpc(connection.baseUrl, 'common', 'authenticate', [
    connection.database,
    login,
    password,
    {},
  ]);
  return typeof result === 'number' && result > 0 ? result : null;
}

export async function getOdooServerVersion(connection: OdooConnection): Promise<string> {
  const result = await jsonRpc(connection.baseUrl, 'common', 'version', []);
  if (typeof result === 'object' && result !== null && 'server_version' in result) {
    return String(result.server_version);
  }
  return 'unknown';
}
