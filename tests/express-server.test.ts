import { describe, it, expect } from '@jest/globals';
import http from 'node:http';
import { ExpressServer } from '../src/core/express-server';
import { PokeMCPServer } from '../src/server';
import { loadConfig } from '../src/core/config';
import type { ServerConfig } from '../src/types/server.types';

interface TestResponse {
  status: number;
  headers: http.IncomingHttpHeaders;
  body: unknown;
}

/**
 * One request against the app on an ephemeral loopback port
 */
function request(
  expressServer: ExpressServer,
  path: string,
  options: { method?: string; headers?: Record<string, string> } = {}
): Promise<TestResponse> {
  return new Promise((resolve, reject) => {
    const listener = http.createServer(expressServer.getApp());
    listener.listen(0, '127.0.0.1', () => {
      const address = listener.address();
      if (address === null || typeof address === 'string') {
        listener.close();
        reject(new Error('listener has no port'));
        return;
      }

      const req = http.request(
        { host: '127.0.0.1', port: address.port, path, method: options.method ?? 'GET', headers: options.headers },
        (res) => {
          let data = '';
          res.setEncoding('utf8');
          res.on('data', (chunk: string) => { data += chunk; });
          res.on('end', () => {
            listener.close();
            const body: unknown = data ? JSON.parse(data) : null;
            resolve({ status: res.statusCode ?? 0, headers: res.headers, body });
          });
        }
      );
      req.on('error', (error) => {
        listener.close();
        reject(error);
      });
      req.end();
    });
  });
}

function createServer(overrides: Partial<ServerConfig> = {}): ExpressServer {
  const config = loadConfig({ NS_API_KEY: 'test-secret' });
  return new ExpressServer({ ...config.server, ...overrides }, new PokeMCPServer(config));
}

describe('ExpressServer', () => {
  it('describes the server at the root', async () => {
    const response = await request(createServer(), '/');

    expect(response.status).toBe(200);
    expect(response.body).toMatchObject({
      name: 'Poke MCP Server',
      version: '1.2.0',
      transport: 'http',
      endpoints: { health: '/health', mcp: '/mcp' },
    });
    expect(response.body).toHaveProperty('tools', expect.arrayContaining(['ns_plan_trip', 'greet']));
  });

  it('reports health with configured integrations', async () => {
    const response = await request(createServer(), '/health');

    expect(response.status).toBe(200);
    expect(response.body).toMatchObject({
      status: 'healthy',
      service: 'poke-mcp-server',
      environment: 'development',
      integrations: { weather: true, ns: true, airlabs: false, obsidian: false },
    });
  });

  it('answers unknown paths with 404', async () => {
    const response = await request(createServer(), '/nope');

    expect(response.status).toBe(404);
    expect(response.body).toEqual({
      error: 'Endpoint not found',
      path: '/nope',
      availableEndpoints: ['/', '/health', '/mcp'],
    });
  });

  describe('CORS', () => {
    it('allows any origin in development', async () => {
      const response = await request(createServer(), '/', { headers: { Origin: 'https://client.test' } });
      expect(response.headers['access-control-allow-origin']).toBe('*');
    });

    it('echoes an allowed origin in production', async () => {
      const server = createServer({ environment: 'production', allowedOrigins: ['https://client.test'] });

      const allowed = await request(server, '/', { headers: { Origin: 'https://client.test' } });
      const other = await request(server, '/', { headers: { Origin: 'https://other.test' } });

      expect(allowed.headers['access-control-allow-origin']).toBe('https://client.test');
      expect(other.headers['access-control-allow-origin']).toBeUndefined();
    });

    it('refuses browser origins in production without an allow list', async () => {
      const response = await request(createServer({ environment: 'production' }), '/health', {
        headers: { Origin: 'https://client.test' },
      });

      expect(response.status).toBe(403);
      expect(response.body).toMatchObject({ error: 'CORS policy violation', origin: 'https://client.test' });
    });

    it('answers preflight requests', async () => {
      const response = await request(createServer(), '/mcp', { method: 'OPTIONS' });

      expect(response.status).toBe(200);
      expect(response.headers['access-control-allow-methods']).toBe('GET, POST, DELETE, OPTIONS');
    });
  });

  it('stops taking tool calls after stop', async () => {
    const config = loadConfig({});
    const mcpServer = new PokeMCPServer(config);
    const expressServer = new ExpressServer({ ...config.server, host: '127.0.0.1', port: 0 }, mcpServer);

    await expressServer.start();
    await expressServer.stop();

    expect(mcpServer.getHealthStatus().status).toBe('shutting_down');
    await expect(mcpServer.callTool('greet', { name: 'Ada' })).rejects.toThrow('Server is shutting down');
  });
});
