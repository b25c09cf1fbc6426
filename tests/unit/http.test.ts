import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import { startHttpServer, type RunningHttpServer } from '../../src/mcp/http.js';
import { MemoryStore } from '../../src/memory/store.js';
import { MemoryOperations } from '../../src/memory/operations.js';

describe('HTTP transport', () => {
  let store: MemoryStore;
  let running: RunningHttpServer;

  beforeEach(async () => {
    store = new MemoryStore();
    running = await startHttpServer({ operations: new MemoryOperations(store), port: 0 });
  });

  afterEach(async () => {
    await running.close();
    store.close();
  });

  it('binds an ephemeral port', () => {
    expect(running.url).toMatch(/^http:\/\/127\.0\.0\.1:\d+$/);
    expect(running.url).not.toBe('http://127.0.0.1:0');
  });

  it('answers the health probe', async () => {
    const res = await fetch(`${running.url}/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: 'ok', sessions: 0 });
    expect(res.headers.get('access-control-allow-origin')).toBe('*');
  });

  it('answers CORS preflight', async () => {
    const res = await fetch(`${running.url}/mcp`, { method: 'OPTIONS' });
    expect(res.status).toBe(204);
    expect(res.headers.get('access-control-expose-headers')).toBe('Mcp-Session-Id');
  });

  it('returns 404 outside the MCP paths', async () => {
    const res = await fetch(`${running.url}/sse`);
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Not found: /sse' });
  });

  it('rejects a GET without a session', async () => {
    const res = await fetch(`${running.url}/mcp`);
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      jsonrpc: '2.0',
      error: { code: -32000, message: 'Bad Request: no valid session ID provided' },
      id: null,
    });
  });

  it('serves an MCP session', async () => {
    const client = new Client({ name: 'test-client', version: '1.0.0' });
    await client.connect(new StreamableHTTPClientTransport(new URL(`${running.url}/mcp`)));

    expect(running.sessionCount()).toBe(1);

    const result = CallToolResultSchema.parse(
      await client.callTool({ name: 'save_memory', arguments: { content: 'Código novo', user_id: 'u1' } })
    );
    expect(result.isError).toBeFalsy();
    expect(store.list('u1').map((item) => item.category)).toEqual(['technical']);

    await client.close();
  });
});
