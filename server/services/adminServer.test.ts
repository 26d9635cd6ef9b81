import type { Server } from 'node:http';
import { AddressBook } from '../../simulation/runtime/AddressBook.js';
import { FailingServiceNode } from '../../simulation/nodes/FailingServiceNode.js';
import { TypeDistributorNode } from '../../simulation/nodes/TypeDistributorNode.js';
import type { BaseNode } from '../../simulation/nodes/BaseNode.js';
import { testConfig } from '../../simulation/test/fixtures.js';
import { closeAdminServer, createAdminApp, startAdminServer } from './adminServer.js';

async function serve(node: BaseNode): Promise<{ server: Server; baseUrl: string }> {
  const server = await startAdminServer(createAdminApp({ node, corsOrigin: 'http://localhost:5173' }), 0, '127.0.0.1');
  const address = server.address();
  const port = address !== null && typeof address === 'object' ? address.port : 0;
  return { server, baseUrl: `http://127.0.0.1:${port}` };
}

describe('admin server', () => {
  let node: FailingServiceNode;
  let server: Server;
  let baseUrl: string;

  beforeEach(async () => {
    node = new FailingServiceNode('P21', { config: testConfig(), addressBook: new AddressBook() });
    await node.start();
    ({ server, baseUrl } = await serve(node));
  });

  afterEach(async () => {
    await closeAdminServer(server);
    await node.stop(100);
  });

  it('should report health with the node identity', async () => {
    const res = await fetch(`${baseUrl}/health`);

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: 'ok', nodeId: 'P21', kind: 'failing_service', availability: 'AVAILABLE' });
  });

  it('should serve the node snapshot as JSON', async () => {
    const res = await fetch(`${baseUrl}/metrics`);

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      nodeId: 'P21',
      kind: 'failing_service',
      queueDepth: 0,
      stats: { received: 0, processed: 0 },
    });
  });

  it('should serve Prometheus text', async () => {
    const res = await fetch(`${baseUrl}/metrics/prometheus`);
    const body = await res.text();

    expect(res.headers.get('content-type')).toContain('text/plain');
    expect(body.split('\n')).toContain('pipeline_node_available{node_id="P21",kind="failing_service"} 1');
  });

  it('should inject a failure on request', async () => {
    const res = await fetch(`${baseUrl}/control/failure`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ durationMs: 60_000 }),
    });

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ nodeId: 'P21', availability: 'FAILED' });
    const health = await fetch(`${baseUrl}/health`);
    expect(await health.json()).toMatchObject({ availability: 'FAILED' });
  });

  it('should reject a malformed failure request', async () => {
    const res = await fetch(`${baseUrl}/control/failure`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ durationMs: -1 }),
    });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'Expected { durationMs: positive number }' });
  });

  it('should answer unknown routes with a JSON 404', async () => {
    const res = await fetch(`${baseUrl}/nope`);

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Route not found: GET /nope' });
  });

  it('should allow the configured CORS origin', async () => {
    const res = await fetch(`${baseUrl}/health`, { headers: { Origin: 'http://localhost:5173' } });

    expect(res.headers.get('access-control-allow-origin')).toBe('http://localhost:5173');
  });
});

describe('admin server for nodes without controls', () => {
  it('should refuse failure injection', async () => {
    const node = new TypeDistributorNode('D', { config: testConfig(), addressBook: new AddressBook() });
    const { server, baseUrl } = await serve(node);
    try {
      const res = await fetch(`${baseUrl}/control/failure`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ durationMs: 100 }),
      });

      expect(res.status).toBe(409);
      expect(await res.json()).toEqual({ error: 'D (type_distributor) does not support failure injection' });

      const health = await fetch(`${baseUrl}/health`);
      expect(health.status).toBe(503);
    } finally {
      await closeAdminServer(server);
    }
  });
});
