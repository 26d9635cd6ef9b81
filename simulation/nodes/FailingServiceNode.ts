import type { AckMessage, NodeSnapshot, PipelineRequest, PipelineResponse } from '../types/pipeline.js';
import { CapacityExceededError } from '../types/errors.js';
import { BoundedFifo, type QueueEntry } from '../engine/PriorityQueueEngine.js';
import { FailureStateMachine, type FailureWindow } from '../engine/FailureStateMachine.js';
import { describeError, uniformBetween } from '../utils/random.js';
import { BaseNode, type NodeContext } from './BaseNode.js';

/**
 * Second-tier processor with a self-managed failure model. While FAILED it rejects new
 * work and silently drops what is queued, so the originating client sees a timeout.
 * Successful requests are answered directly to the client named in the request.
 */
export class FailingServiceNode extends BaseNode {
  readonly failure: FailureStateMachine;

  private readonly queue: BoundedFifo<QueueEntry>;

  constructor(id: string, context: NodeContext) {
    super(id, 'failing_service', context);
    this.failure = new FailureStateMachine(this.config.secondTier.failure, this.random, this.now);
    this.queue = new BoundedFifo<QueueEntry>(id, this.config.queueMaxLength);
  }

  protected onStart(): void {
    this.runQueue(() => this.queue.shift(), (entry) => this.process(entry));
    this.every(this.config.secondTier.failure.checkIntervalMs, () => this.checkAvailability());
  }

  forceFailure(durationMs: number): FailureWindow {
    const window = this.failure.forceFailure(durationMs);
    this.log.warn(`failure injected, unavailable until ${new Date(window.recoverAt).toISOString()}`);
    return window;
  }

  protected handleRequest(request: PipelineRequest): AckMessage {
    if (!this.failure.isAvailable()) {
      this.collector.recordRejected();
      this.log.warn(`rejecting ${request.requestId}: node is FAILED`);
      return this.ack(false, 'unavailable');
    }
    try {
      this.queue.push({ request, enqueuedAt: this.now() });
    } catch (err) {
      if (err instanceof CapacityExceededError) {
        this.collector.recordRejected();
        return this.ack(false, 'capacity');
      }
      throw err;
    }
    this.collector.recordQueueLength(this.queue.length);
    this.notifyWork();
    return this.ack(true);
  }

  protected describe(): Partial<NodeSnapshot> {
    return {
      availability: this.failure.availability(),
      queueDepth: this.queue.length,
    };
  }

  private checkAvailability(): void {
    const transition = this.failure.check();
    if (transition === 'failed') {
      const deadline = this.failure.recoveryDeadline ?? this.now();
      this.log.warn(`entered FAILED state, recovering in ${Math.max(0, deadline - this.now()).toFixed(0)}ms`);
    } else if (transition === 'recovered') {
      this.log.info('recovered, AVAILABLE again');
    }
  }

  private async process(entry: QueueEntry): Promise<void> {
    const { request } = entry;
    if (!this.failure.isAvailable()) {
      this.log.warn(`dropping ${request.requestId}: node is FAILED`);
      return;
    }

    const waitMs = this.now() - entry.enqueuedAt;
    this.collector.recordProcessed(waitMs);
    const serviceMs = uniformBetween(this.config.secondTier.serviceTime.minMs, this.config.secondTier.serviceTime.maxMs, this.random);
    if (!(await this.pause(serviceMs))) {
      return;
    }
    // A failure that opened during service also loses the request.
    if (!this.failure.isAvailable()) {
      this.log.warn(`dropping ${request.requestId}: failed during processing`);
      return;
    }

    const stamped = this.stamp(request);
    const response: PipelineResponse = {
      requestId: request.requestId,
      type: request.type,
      clientId: request.clientId,
      processedBy: this.id,
      hops: stamped.hops,
      timestamp: this.now(),
      success: true,
    };
    try {
      await this.send(request.clientId, { kind: 'RESPONSE', response });
      this.collector.recordForwarded();
      this.log.info(`answered ${request.requestId} to ${request.clientId} via ${stamped.hops.join(' -> ')}`);
    } catch (err) {
      this.collector.recordForwardFailure();
      this.log.error(`could not deliver response for ${request.requestId} to ${request.clientId}: ${describeError(err)}`);
    }
  }
}
