import type { NodeAddress, NodeKind, NodeSnapshot, SystemSnapshot } from '../types/pipeline.js';
import type { PipelineConfig } from '../types/config.js';
import { PIPELINE_NODES, type NodeDefinition } from '../types/topology.js';
import { AddressBook } from '../runtime/AddressBook.js';
import type { BaseNode, NodeContext } from '../nodes/BaseNode.js';
import { ClientNode } from '../nodes/ClientNode.js';
import { CyclicQueueNode } from '../nodes/CyclicQueueNode.js';
import { FailingServiceNode } from '../nodes/FailingServiceNode.js';
import { ForwardingQueueNode } from '../nodes/ForwardingQueueNode.js';
import { PriorityServiceNode } from '../nodes/PriorityServiceNode.js';
import { TypeDistributorNode } from '../nodes/TypeDistributorNode.js';
import { createLogger } from '../utils/log.js';
import { describeError, type Clock, type RandomSource } from '../utils/random.js';
import { MetricsAggregator } from './MetricsAggregator.js';
import type { InstanceSpawner } from './ScalingController.js';

export interface NodeHandle {
  readonly id: string;
  readonly kind: NodeKind;
  readonly address: NodeAddress;
  readonly node: BaseNode;
  stop(gracePeriodMs?: number): Promise<void>;
  snapshot(): NodeSnapshot;
  uptimeMs(): number;
}

export interface LaunchOptions {
  random?: RandomSource;
  now?: Clock;
}

export interface PipelineHandle {
  readonly config: PipelineConfig;
  readonly addressBook: AddressBook;
  readonly handles: readonly NodeHandle[];
  readonly clients: ClientNode[];
  node(nodeId: string): BaseNode | undefined;
  spawned(): readonly NodeHandle[];
  snapshot(): SystemSnapshot;
  stop(gracePeriodMs?: number): Promise<void>;
}

const log = createLogger('pipeline');

export function createNode(definition: NodeDefinition, context: NodeContext): BaseNode {
  switch (definition.kind) {
    case 'client':
      return new ClientNode(definition.id, context);
    case 'cyclic_queue':
      return new CyclicQueueNode(definition.id, context);
    case 'priority_service':
      return new PriorityServiceNode(definition.id, context);
    case 'type_distributor':
      return new TypeDistributorNode(definition.id, context);
    case 'forwarding_queue':
      return new ForwardingQueueNode(definition.id, context);
    case 'failing_service':
      return new FailingServiceNode(definition.id, context);
    default:
      throw new Error(`Unsupported node kind: ${String(definition.kind)}`);
  }
}

function handleFor(node: BaseNode, address: NodeAddress): NodeHandle {
  return {
    id: node.id,
    kind: node.kind,
    address,
    node,
    stop: (gracePeriodMs) => node.stop(gracePeriodMs),
    snapshot: () => node.snapshot(),
    uptimeMs: () => node.uptimeMs(),
  };
}

export async function startNode(definition: NodeDefinition, context: NodeContext, address?: NodeAddress): Promise<NodeHandle> {
  const node = createNode(definition, context);
  const bound = await node.start(address);
  return handleFor(node, bound);
}

// Scaled instances share their role's configuration; ports step away from the role's port.
export function instancePort(config: PipelineConfig, role: string, ordinal: number): number {
  const base = config.ports[role] ?? 0;
  return base === 0 ? 0 : base + config.scaling.instancePortOffset * (ordinal - 1);
}

export async function launchPipeline(config: PipelineConfig, options: LaunchOptions = {}): Promise<PipelineHandle> {
  const addressBook = AddressBook.fromPorts(config.host, config.ports);
  const handles: NodeHandle[] = [];
  const spawnedHandles: NodeHandle[] = [];
  const baseContext: NodeContext = { config, addressBook, random: options.random, now: options.now };

  const spawner: InstanceSpawner = {
    spawn: async (role, instanceId, ordinal) => {
      const node = new PriorityServiceNode(instanceId, baseContext, role);
      const address = await node.start({ host: config.host, port: instancePort(config, role, ordinal) });
      spawnedHandles.push(handleFor(node, address));
      return address;
    },
  };

  const aggregator = new MetricsAggregator();
  const now = options.now ?? Date.now;

  const stopAll = async (gracePeriodMs: number = config.shutdownGraceMs): Promise<void> => {
    const clients = handles.filter((handle) => handle.kind === 'client');
    const rest = handles.filter((handle) => handle.kind !== 'client').reverse();
    await Promise.all(clients.map((handle) => handle.stop(gracePeriodMs)));
    for (const handle of rest) {
      await handle.stop(gracePeriodMs);
      // Q1 waits out any scaling tick while stopping, so the spawned list is final here.
      if (handle.kind === 'cyclic_queue') {
        for (const instance of [...spawnedHandles].reverse()) {
          await instance.stop(gracePeriodMs);
        }
      }
    }
    log.info(`stopped ${handles.length + spawnedHandles.length} nodes`);
  };

  try {
    for (const definition of PIPELINE_NODES) {
      const context = definition.kind === 'cyclic_queue' ? { ...baseContext, spawner } : baseContext;
      handles.push(await startNode(definition, context));
    }
  } catch (err) {
    log.error(`launch failed: ${describeError(err)}`);
    await stopAll();
    throw err;
  }
  log.info(`started ${handles.map((handle) => `${handle.id}@${handle.address.port}`).join(' ')}`);

  const nodes = (): BaseNode[] => [...handles, ...spawnedHandles].map((handle) => handle.node);
  const clients = handles.flatMap((handle) => (handle.node instanceof ClientNode ? [handle.node] : []));

  return {
    config,
    addressBook,
    handles,
    clients,
    node: (nodeId) => nodes().find((node) => node.id === nodeId),
    spawned: () => spawnedHandles,
    snapshot: () => aggregator.computeSnapshot({ snapshotAt: now(), nodes: nodes().map((node) => node.snapshot()) }),
    stop: stopAll,
  };
}
