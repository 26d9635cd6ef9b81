import type { AckMessage, HeartbeatMessage, NodeSnapshot, PipelineRequest } from '../types/pipeline.js';
import { CapacityExceededError } from '../types/errors.js';
import { FIRST_TIER_IDS } from '../types/topology.js';
import { CyclicDistributor, type RouteTarget } from '../engine/CyclicDistributor.js';
import { ScalingController } from '../engine/ScalingController.js';
import { describeError } from '../utils/random.js';
import { BaseNode, type NodeContext } from './BaseNode.js';

/**
 * Entry node: forwards each request to the next first-tier instance in rotation and
 * hosts the scaling controller fed by first-tier heartbeats.
 */
export class CyclicQueueNode extends BaseNode {
  readonly distributor: CyclicDistributor;

  readonly scaling: ScalingController | null;

  constructor(
    id: string,
    context: NodeContext,
    initialTargets: readonly RouteTarget[] = FIRST_TIER_IDS.map((nodeId) => ({ nodeId, role: nodeId })),
  ) {
    super(id, 'cyclic_queue', context);
    this.distributor = new CyclicDistributor(initialTargets);

    if (context.spawner) {
      this.scaling = new ScalingController(this.config.scaling, this.distributor, context.spawner, this.now, `${id}/scaling`);
      for (const target of initialTargets) {
        this.scaling.registerRole(target.role, target.nodeId);
      }
    } else {
      this.scaling = null;
    }
  }

  protected onStart(): void {
    if (this.scaling) {
      this.scaling.start();
    } else {
      this.log.info('no instance spawner configured, scaling disabled');
    }
  }

  protected async onStopping(): Promise<void> {
    await this.scaling?.stop();
  }

  protected async handleRequest(request: PipelineRequest): Promise<AckMessage> {
    const stamped = this.stamp(request);
    const { position, target } = await this.distributor.distributeNext();
    try {
      await this.forward(target.nodeId, stamped);
      this.log.info(`${request.type} ${request.requestId} -> ${target.nodeId} (slot ${position}/${this.distributor.size})`);
      return this.ack(true);
    } catch (err) {
      this.log.error(`failed to forward ${request.requestId} to ${target.nodeId}: ${describeError(err)}`);
      return this.ack(false, err instanceof CapacityExceededError ? 'capacity' : 'unavailable');
    }
  }

  protected async handleHeartbeat(heartbeat: HeartbeatMessage): Promise<AckMessage> {
    if (!this.scaling) {
      return this.ack(true);
    }
    const known = await this.scaling.recordSamples(heartbeat.nodeId, heartbeat.waitSamplesMs);
    if (!known) {
      this.log.warn(`heartbeat from unknown instance ${heartbeat.nodeId}`);
      return this.ack(false, 'invalid');
    }
    return this.ack(true);
  }

  protected describe(): Partial<NodeSnapshot> {
    const snapshot: Partial<NodeSnapshot> = {
      routingTable: this.distributor.snapshot().map((target) => target.nodeId),
    };
    if (this.scaling) {
      snapshot.instanceCounts = this.scaling.instanceCounts();
    }
    return snapshot;
  }
}
