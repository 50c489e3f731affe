import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  connectionKey,
  getConnection,
  getDefaultConnection,
  resetConnection,
  testConnection,
  updateConnection,
} from './connection.service.js';

const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) =>
  new Response(JSON.stringify({ jsonrpc: '2.0', id: 1, result: { server_version: '17.0' } })),
);

describe('connection service', () => {
  beforeEach(() => {
    fetchMock.mockClear();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    resetConnection();
  });

  it('starts from the configured defaults', () => {
    expect(getDefaultConnection()).toEqual({ baseUrl: 'http://odoo.test', database: 'testdb' });
    expect(getConnection()).toEqual(getDefaultConnection());
  });

  it('switches and resets the active connection', () => {
    updateConnection({ baseUrl: ' https://erp.example.com// ', database: ' prod ' });
    expect(getConnection()).toEqual({ baseUrl: 'https://erp.example.com', database: 'prod' });

    expect(resetConnection()).toEqual({ baseUrl: 'http://odoo.test', database: 'testdb' });
  });

  it('hands out copies of the active connection', () => {
    const copy = getConnection();
    copy.database = 'changed';

    expect(getConnection().database).toBe('testdb');
  });

  it('keys connections by server and database', () => {
    expect(connectionKey({ baseUrl: 'http://odoo.test', database: 'testdb' })).toBe('http://odoo.test|testdb');
  });

  it('tests a candidate without switching to it', async () => {
    await expect(testConnection({ baseUrl: 'https://erp.example.com', database: 'prod' })).resolves.toEqual({
      reachable: true,
      serverVersion: '17.0',
    });
    expect(fetchMock.mock.calls[0]?.[0]).toBe('https://erp.example.com/jsonrpc');
    expect(getConnection().baseUrl).toBe('http://odoo.test');
  });

  it('reports an unreachable server', async () => {
    fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));

    await expect(testConnection({ baseUrl: 'https://erp.example.com', database: 'prod' })).resolves.toEqual({
      reachable: false,
      error: 'fetch failed',
    });
  });
});
