import { beforeEach, describe, expect, it, vi } from 'vitest';
import {
  authenticateOdooUser,
  createOdooClient,
  getOdooServerVersion,
  jsonRpc,
  normalizeBaseUrl,
  OdooRpcError,
} from './odooRpc.service.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) =>
  jsonResponse({ jsonrpc: '2.0', id: 1, result: null }),
);

function sentBody(call = 0): { jsonrpc: string; method: string; params: { service: string; method: string; args: unknown[] } } {
  const init = fetchMock.mock.calls[call]?.[1];
  return JSON.parse(String(init?.body));
}

const credentials = {
  baseUrl: 'http://odoo.test',
  database: 'testdb',
  uid: 9,
  password: 'test-password',
};

describe('odooRpc', () => {
  beforeEach(() => {
    fetchMock.mockClear();
    vi.stubGlobal('fetch', fetchMock);
  });

  describe('normalizeBaseUrl', () => {
    it('adds https and drops trailing slashes', () => {
      expect(normalizeBaseUrl('odoo.example.com/')).toBe('https://odoo.example.com');
      expect(normalizeBaseUrl('http://localhost:8069')).toBe('http://localhost:8069');
    });
  });

  describe('jsonRpc', () => {
    it('posts a JSON-RPC call envelope and returns the result', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ jsonrpc: '2.0', id: 1, result: { server_version: '17.0' } }));

      const result = await jsonRpc('odoo.example.com', 'common', 'version', []);

      expect(result).toEqual({ server_version: '17.0' });
      expect(fetchMock.mock.calls[0]?.[0]).toBe('https://odoo.example.com/jsonrpc');
      expect(fetchMock.mock.calls[0]?.[1]?.method).toBe('POST');
      expect(sentBody()).toMatchObject({
        jsonrpc: '2.0',
        method: 'call',
        params: { service: 'common', method: 'version', args: [] },
      });
    });

    it('raises a transport error on a non-2xx status', async () => {
      fetchMock.mockResolvedValueOnce(new Response('bad gateway', { status: 503 }));

      const error = await jsonRpc('http://odoo.test', 'common', 'version', []).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(OdooRpcError);
      expect(error).toMatchObject({ kind: 'transport', message: 'HTTP Error: 503' });
    });

    it('raises a transport error when the request itself fails', async () => {
      fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));

      await expect(jsonRpc('http://odoo.test', 'common', 'version', [])).rejects.toMatchObject({
        kind: 'transport',
        message: 'fetch failed',
      });
    });

    it('raises a remote error carrying the detailed Odoo message', async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse({
          jsonrpc: '2.0',
          id: 1,
          error: {
            message: 'Odoo Server Error',
            data: { message: "Invalid field 'in_latitude' on model 'hr.attendance'" },
          },
        }),
      );

      await expect(jsonRpc('http://odoo.test', 'object', 'execute_kw', [])).rejects.toMatchObject({
        kind: 'remote',
        message: "Invalid field 'in_latitude' on model 'hr.attendance'",
      });
    });

    it('falls back to the top-level error message', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ jsonrpc: '2.0', id: 1, error: { message: 'Access Denied' } }));

      await expect(jsonRpc('http://odoo.test', 'object', 'execute_kw', [])).rejects.toMatchObject({
        kind: 'remote',
        message: 'Access Denied',
      });
    });
  });

  describe('createOdooClient', () => {
    it('sends search_read through execute_kw with keyword arguments', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ jsonrpc: '2.0', id: 1, result: [{ id: 42 }] }));
      const client = createOdooClient(credentials);

      const rows = await client.searchRead('hr.attendance', [['check_out', '=', false]], ['id'], { limit: 1 });

      expect(rows).toEqual([{ id: 42 }]);
      expect(sentBody().params).toEqual({
        service: 'object',
        method: 'execute_kw',
        args: [
          'testdb',
          9,
          'test-password',
          'hr.attendance',
          'search_read',
          [],
          { domain: [['check_out', '=', false]], fields: ['id'], limit: 1 },
        ],
      });
    });

    it('returns the id from create', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ jsonrpc: '2.0', id: 1, result: 501 }));
      const client = createOdooClient(credentials);

      await expect(client.create('hr.attendance', { employee_id: 7 })).resolves.toBe(501);
      expect(sentBody().params.args.slice(3)).toEqual(['hr.attendance', 'create', [{ employee_id: 7 }], {}]);
    });

    it('rejects a create result that is not an id', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ jsonrpc: '2.0', id: 1, result: false }));
      const client = createOdooClient(credentials);

      await expect(client.create('hr.attendance', { employee_id: 7 })).rejects.toMatchObject({ kind: 'remote' });
    });

    it('sends write with the id list and values', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ jsonrpc: '2.0', id: 1, result: true }));
      const client = createOdooClient(credentials);

      await expect(client.write('hr.attendance', [42], { check_out: '2026-03-02 08:15:30' })).resolves.toBe(true);
      expect(sentBody().params.args.slice(3)).toEqual([
        'hr.attendance',
        'write',
        [[42], { check_out: '2026-03-02 08:15:30' }],
        {},
      ]);
    });
  });

  describe('common service', () => {
    it('returns the uid on successful authentication', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ jsonrpc: '2.0', id: 1, result: 9 }));

      await expect(
        authenticateOdooUser({ baseUrl: 'http://odoo.test', database: 'testdb' }, 'ana@example.com', 'test-password'),
      ).resolves.toBe(9);
      expect(sentBody().params).toEqual({
        service: 'common',
        method: 'authenticate',
        args: ['testdb', 'ana@example.com', 'test-password', {}],
      });
    });

    it('returns null when Odoo answers false', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ jsonrpc: '2.0', id: 1, result: false }));

      await expect(
        authenticateOdooUser({ baseUrl: 'http://odoo.test', database: 'testdb' }, 'ana@example.com', 'wrong'),
      ).resolves.toBeNull();
    });

    it('reads the server version', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ jsonrpc: '2.0', id: 1, result: { server_version: '17.0+e' } }));

      await expect(getOdooServerVersion({ baseUrl: 'http://odoo.test', database: 'testdb' })).resolves.toBe('17.0+e');
    });
  });
});
