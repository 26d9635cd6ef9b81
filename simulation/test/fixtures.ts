import { createConfig, DEFAULT_PORTS, type ConfigOverrides, type PipelineConfig } from '../types/config.js';
import type { NodeAddress, PipelineRequest, PipelineResponse, RequestType, WireMessage } from '../types/pipeline.js';
import { priorityOf } from '../types/topology.js';
import type { AddressBook } from '../runtime/AddressBook.js';
import { NodeRuntime } from '../runtime/NodeRuntime.js';
import { createLogger } from '../utils/log.js';

const EPHEMERAL_PORTS: Record<string, number> = Object.fromEntries(Object.keys(DEFAULT_PORTS).map((id) => [id, 0]));

// Loopback, ephemeral ports, fixed short service times and no random failures.
export function testConfig(overrides: ConfigOverrides = {}): PipelineConfig {
  const base = createConfig({
    ports: EPHEMERAL_PORTS,
    shutdownGraceMs: 200,
    transport: { ackTimeoutMs: 1_000, idleTimeoutMs: 1_000 },
    firstTier: { serviceTime: { minMs: 5, maxMs: 5 }, heartbeatIntervalMs: 50 },
    secondTier: {
      serviceTime: { minMs: 5, maxMs: 5 },
      failure: { probability: 0, checkIntervalMs: 60_000 },
    },
    scaling: { intervalMs: 60_000, waitThresholdMs: 100 },
    client: { timeoutMs: 2_000, requestIntervalMs: 0 },
  });
  return createConfig(overrides, base);
}

export function makeRequest(type: RequestType, overrides: Partial<PipelineRequest> = {}): PipelineRequest {
  return {
    requestId: 'K1_1_1000',
    type,
    clientId: 'K1',
    priority: priorityOf(type),
    createdAt: 1_000,
    hops: ['K1'],
    ...overrides,
  };
}

export function makeResponse(processedBy: string, overrides: Partial<PipelineResponse> = {}): PipelineResponse {
  return {
    requestId: 'K1_1_1000',
    type: 'z1',
    clientId: 'K1',
    processedBy,
    hops: ['K1', 'Q1', 'P11', 'D', 'Q21', processedBy],
    timestamp: 2_000,
    success: true,
    ...overrides,
  };
}

export async function waitFor(condition: () => boolean, timeoutMs = 2_000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) {
      throw new Error(`Condition not met within ${timeoutMs}ms`);
    }
    await new Promise((resolve) => setTimeout(resolve, 10));
  }
}

export interface StubPeer {
  id: string;
  address: NodeAddress;
  received: WireMessage[];
  stop(): Promise<void>;
}

// Stands in for a pipeline node: records every message and answers with `reply` (accepting ACK by default).
export async function startStub(
  id: string,
  addressBook: AddressBook,
  reply: (message: WireMessage) => WireMessage | null = () => ({ kind: 'ACK', nodeId: id, accepted: true }),
): Promise<StubPeer> {
  const received: WireMessage[] = [];
  const config = testConfig();
  const runtime = new NodeRuntime(
    id,
    async (message) => {
      received.push(message);
      return reply(message);
    },
    config.transport,
    createLogger(id),
  );
  const address = await runtime.listen({ host: config.host, port: 0 });
  addressBook.register(id, address);
  return { id, address, received, stop: () => runtime.stop(100) };
}

export function requestsIn(messages: readonly WireMessage[]): PipelineRequest[] {
  return messages.flatMap((message) => (message.kind === 'REQUEST' ? [message.request] : []));
}
