import { createConnection } from 'node:net';
import type { TransportConfig } from '../types/config.js';
import type { NodeAddress, WireMessage } from '../types/pipeline.js';
import { makeRequest, waitFor } from '../test/fixtures.js';
import { sendMessage } from '../transport/connection.js';
import { LENGTH_PREFIX_BYTES } from '../transport/framing.js';
import { createLogger } from '../utils/log.js';
import { NodeRuntime, type MessageHandler } from './NodeRuntime.js';

const TRANSPORT: TransportConfig = { ackTimeoutMs: 500, idleTimeoutMs: 500, maxFrameBytes: 64 * 1024 };
const LOOPBACK: NodeAddress = { host: '127.0.0.1', port: 0 };
const REQUEST: WireMessage = { kind: 'REQUEST', request: makeRequest('z1') };

describe('NodeRuntime', () => {
  let runtime: NodeRuntime | null = null;

  async function start(handler: MessageHandler): Promise<NodeAddress> {
    runtime = new NodeRuntime('P11', handler, TRANSPORT, createLogger('P11'));
    return runtime.listen(LOOPBACK);
  }

  afterEach(async () => {
    await runtime?.stop(100);
    runtime = null;
  });

  it('should bind an ephemeral port and answer with the handler reply', async () => {
    const seen: WireMessage[] = [];
    const address = await start(async (message) => {
      seen.push(message);
      return { kind: 'ACK', nodeId: 'P11', accepted: true };
    });

    expect(address.port).toBeGreaterThan(0);
    await expect(sendMessage('P11', address, REQUEST, TRANSPORT)).resolves.toEqual({
      kind: 'ACK',
      nodeId: 'P11',
      accepted: true,
    });
    expect(seen).toEqual([REQUEST]);
  });

  it('should drop only the connection when the handler fails', async () => {
    let calls = 0;
    const address = await start(async () => {
      calls += 1;
      if (calls === 1) throw new Error('handler blew up');
      return { kind: 'ACK', nodeId: 'P11', accepted: true };
    });

    await expect(sendMessage('P11', address, REQUEST, TRANSPORT)).rejects.toMatchObject({ reason: 'no_ack' });
    await expect(sendMessage('P11', address, REQUEST, TRANSPORT)).resolves.toMatchObject({ accepted: true });
  });

  it('should close the connection without a reply when the handler has none', async () => {
    const address = await start(async () => null);

    await expect(sendMessage('P11', address, REQUEST, TRANSPORT)).rejects.toMatchObject({ reason: 'no_ack' });
  });

  it('should not call the handler for a malformed frame', async () => {
    const handler = jest.fn<ReturnType<MessageHandler>, Parameters<MessageHandler>>(async () => null);
    const address = await start(handler);

    const body = Buffer.from('not json at all');
    const prefix = Buffer.alloc(LENGTH_PREFIX_BYTES);
    prefix.writeUInt32BE(body.length, 0);
    const socket = createConnection({ host: address.host, port: address.port });
    socket.on('error', () => undefined);
    await new Promise<void>((resolve) => {
      socket.once('close', () => resolve());
      socket.write(Buffer.concat([prefix, body]));
    });

    expect(handler).not.toHaveBeenCalled();
  });

  it('should let in-flight handlers finish before stopping', async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const address = await start(async () => {
      await gate;
      return { kind: 'ACK', nodeId: 'P11', accepted: true };
    });
    const current = runtime;
    if (!current) throw new Error('runtime not started');

    const pending = sendMessage('P11', address, REQUEST, TRANSPORT);
    await waitFor(() => current.inFlightCount === 1);

    const stopped = current.stop(1_000);
    expect(current.isAccepting).toBe(false);
    release();

    await expect(pending).resolves.toMatchObject({ accepted: true });
    await stopped;
    expect(current.inFlightCount).toBe(0);
  });

  it('should refuse to listen twice', async () => {
    await start(async () => null);

    await expect(runtime?.listen(LOOPBACK)).rejects.toThrow('P11 is already listening');
  });
});
