import type { AckMessage, NodeSnapshot, PipelineRequest } from '../types/pipeline.js';
import { CapacityExceededError } from '../types/errors.js';
import { ENTRY_NODE_ID, TYPE_DISTRIBUTOR_ID } from '../types/topology.js';
import { PriorityQueueEngine, type QueueEntry } from '../engine/PriorityQueueEngine.js';
import { describeError, uniformBetween } from '../utils/random.js';
import { BaseNode, type NodeContext } from './BaseNode.js';

/**
 * First-tier processor: three priority FIFOs drained by one loop, with a simulated
 * service delay before forwarding to the type distributor. Wait-time samples are
 * reported to the entry node for scaling decisions.
 */
export class PriorityServiceNode extends BaseNode {
  readonly role: string;

  private readonly queue: PriorityQueueEngine;

  private pendingSamples: number[] = [];

  constructor(id: string, context: NodeContext, role: string = id) {
    super(id, 'priority_service', context);
    this.role = role;
    this.queue = new PriorityQueueEngine(id, this.config.queueMaxLength, [1, 2, 3], this.now);
  }

  protected onStart(): void {
    this.runQueue(() => this.queue.dequeueNext(), (entry) => this.process(entry));
    this.every(this.config.firstTier.heartbeatIntervalMs, () => this.reportWaitTimes());
  }

  protected handleRequest(request: PipelineRequest): AckMessage {
    try {
      this.queue.enqueue(request);
    } catch (err) {
      if (err instanceof CapacityExceededError) {
        this.collector.recordRejected();
        this.log.warn(`rejecting ${request.requestId}: ${err.message}`);
        return this.ack(false, 'capacity');
      }
      throw err;
    }
    this.collector.recordQueueLength(this.queue.size());
    this.log.debug(`queued ${request.type} ${request.requestId} (depths ${JSON.stringify(this.queue.sizeByPriority())})`);
    this.notifyWork();
    return this.ack(true);
  }

  protected describe(): Partial<NodeSnapshot> {
    return {
      queueDepth: this.queue.size(),
      queueDepthByPriority: this.queue.sizeByPriority(),
    };
  }

  private async process(entry: QueueEntry): Promise<void> {
    const waitMs = this.now() - entry.enqueuedAt;
    this.collector.recordProcessed(waitMs);
    this.pendingSamples.push(waitMs);

    const serviceMs = uniformBetween(this.config.firstTier.serviceTime.minMs, this.config.firstTier.serviceTime.maxMs, this.random);
    if (!(await this.pause(serviceMs))) {
      return;
    }

    const request = this.stamp(entry.request);
    this.log.info(`processed ${request.requestId} (wait ${waitMs.toFixed(0)}ms, service ${serviceMs.toFixed(0)}ms)`);
    try {
      await this.forward(TYPE_DISTRIBUTOR_ID, request);
    } catch (err) {
      this.log.error(`failed to forward ${request.requestId} to ${TYPE_DISTRIBUTOR_ID}: ${describeError(err)}`);
    }
  }

  private async reportWaitTimes(): Promise<void> {
    if (this.pendingSamples.length === 0) {
      return;
    }
    const samples = this.pendingSamples;
    this.pendingSamples = [];
    try {
      await this.send(ENTRY_NODE_ID, {
        kind: 'HEARTBEAT',
        nodeId: this.id,
        role: this.role,
        sentAt: this.now(),
        waitSamplesMs: samples,
        queueDepth: this.queue.size(),
      });
    } catch (err) {
      this.log.warn(`heartbeat to ${ENTRY_NODE_ID} dropped ${samples.length} samples: ${describeError(err)}`);
    }
  }
}
