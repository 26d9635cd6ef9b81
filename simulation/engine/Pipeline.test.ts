import type { ConfigOverrides } from '../types/config.js';
import { CyclicQueueNode } from '../nodes/CyclicQueueNode.js';
import { FailingServiceNode } from '../nodes/FailingServiceNode.js';
import { testConfig, waitFor } from '../test/fixtures.js';
import { instancePort, launchPipeline, type PipelineHandle } from './Pipeline.js';

describe('launchPipeline', () => {
  let pipeline: PipelineHandle | null = null;

  async function launch(overrides: ConfigOverrides = {}): Promise<PipelineHandle> {
    pipeline = await launchPipeline(testConfig(overrides), { random: () => 0 });
    return pipeline;
  }

  function firstClient(handle: PipelineHandle) {
    const [client] = handle.clients;
    if (!client) throw new Error('pipeline started without clients');
    return client;
  }

  afterEach(async () => {
    await pipeline?.stop(100);
    pipeline = null;
  });

  it('should start every node in tier order', async () => {
    const handle = await launch();

    expect(handle.handles.map((node) => node.id)).toEqual([
      'P21', 'P22', 'P23', 'Q21', 'Q22', 'Q23', 'D', 'P11', 'P12', 'P13', 'Q1', 'K1', 'K2',
    ]);
    expect(handle.clients.map((client) => client.id)).toEqual(['K1', 'K2']);
    expect(handle.handles.every((node) => node.address.port > 0)).toBe(true);
  });

  it('should carry a z3 request through both tiers to one response in single mode', async () => {
    const handle = await launch({ dispatchMode: 'single' });
    const client = firstClient(handle);

    const requestId = await client.submit('z3');
    const outcome = await client.awaitOutcome(requestId);

    expect(outcome.status).toBe('SUCCESS');
    expect(outcome.responses).toHaveLength(1);
    expect(outcome.responses[0]?.processedBy).toBe('P23');
    expect(outcome.responses[0]?.hops).toEqual(['K1', 'Q1', 'P11', 'D', 'Q23', 'P23']);
  });

  it('should collect three responses per request in broadcast mode', async () => {
    const handle = await launch({ dispatchMode: 'broadcast' });
    const client = firstClient(handle);

    const outcome = await client.awaitOutcome(await client.submit('z1'));

    expect(outcome.status).toBe('SUCCESS');
    expect(outcome.responses.map((response) => response.processedBy).sort()).toEqual(['P21', 'P22', 'P23']);
  });

  it('should fail a request whose second-tier peer stays failed past the client timeout', async () => {
    const handle = await launch({ dispatchMode: 'broadcast', client: { timeoutMs: 400 } });
    const client = firstClient(handle);
    const target = handle.node('P23');
    if (!(target instanceof FailingServiceNode)) throw new Error('P23 is not a failing service node');
    target.forceFailure(5_000);

    const outcome = await client.awaitOutcome(await client.submit('z3'));

    expect(outcome).toMatchObject({ status: 'FAILED', reason: 'timeout' });
    expect(outcome.responses.length).toBeLessThan(3);
    expect(outcome.responses.map((response) => response.processedBy)).not.toContain('P23');
  });

  it('should scale a loaded first-tier role and route through the new instance', async () => {
    const handle = await launch({ dispatchMode: 'single' });
    const entry = handle.node('Q1');
    if (!(entry instanceof CyclicQueueNode) || !entry.scaling) throw new Error('Q1 has no scaling controller');

    await entry.scaling.recordSamples('P11', [500, 500, 500]);
    const events = await entry.scaling.tick();

    expect(events.map((event) => event.instanceId)).toEqual(['P11#2']);
    expect(handle.spawned().map((node) => node.id)).toEqual(['P11#2']);

    const client = firstClient(handle);
    const submitted: string[] = [];
    for (let i = 0; i < 4; i += 1) {
      submitted.push(await client.submit('z2'));
    }
    await Promise.all(submitted.map((requestId) => client.awaitOutcome(requestId)));

    expect(entry.snapshot().routingTable).toEqual(['P11', 'P12', 'P13', 'P11#2']);
    expect(handle.node('P11#2')?.snapshot().stats.received).toBe(1);
  });

  it('should stop an instance spawned by a scaling tick that was running at shutdown', async () => {
    const handle = await launch({ dispatchMode: 'single' });
    const entry = handle.node('Q1');
    if (!(entry instanceof CyclicQueueNode) || !entry.scaling) throw new Error('Q1 has no scaling controller');
    await entry.scaling.recordSamples('P11', [500, 500, 500]);

    const ticking = entry.scaling.tick();
    await handle.stop(50);
    await ticking;
    pipeline = null;

    expect(handle.spawned().filter((instance) => instance.node.isRunning)).toEqual([]);
    expect(await entry.scaling.tick()).toEqual([]);
  });

  it('should run a client workload and summarize it', async () => {
    const handle = await launch({ dispatchMode: 'single' });
    const client = firstClient(handle);

    const summary = await client.runWorkload({ count: 3, intervalMs: 0 });

    expect(summary).toEqual({ clientId: 'K1', total: 3, successful: 3, failed: 0, successRate: 1 });
    await waitFor(() => handle.snapshot().outcomes.successful === 3);
    expect(handle.snapshot().successRate).toBe(1);
  });
});

describe('instancePort', () => {
  it('should step scaled instances away from the role port', () => {
    const config = testConfig({ ports: { P12: 5012 } });

    expect(instancePort(config, 'P12', 1)).toBe(5012);
    expect(instancePort(config, 'P12', 3)).toBe(5212);
    expect(instancePort(config, 'P11', 2)).toBe(0);
  });
});
