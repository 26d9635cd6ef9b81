import type { AckMessage, NodeSnapshot, PipelineRequest } from '../types/pipeline.js';
import { CapacityExceededError } from '../types/errors.js';
import { BoundedFifo, type QueueEntry } from '../engine/PriorityQueueEngine.js';
import { queueTargetOf } from '../engine/TypeRouter.js';
import { describeError } from '../utils/random.js';
import { BaseNode, type NodeContext } from './BaseNode.js';

/** Second-tier queue: FIFO in front of exactly one fixed processing peer. */
export class ForwardingQueueNode extends BaseNode {
  readonly target: string;

  private readonly queue: BoundedFifo<QueueEntry>;

  constructor(id: string, context: NodeContext, target: string = queueTargetOf(id)) {
    super(id, 'forwarding_queue', context);
    this.target = target;
    this.queue = new BoundedFifo<QueueEntry>(id, this.config.queueMaxLength);
  }

  protected onStart(): void {
    this.runQueue(() => this.queue.shift(), (entry) => this.process(entry));
  }

  protected handleRequest(request: PipelineRequest): AckMessage {
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
    return { queueDepth: this.queue.length };
  }

  private async process(entry: QueueEntry): Promise<void> {
    const waitMs = this.now() - entry.enqueuedAt;
    this.collector.recordProcessed(waitMs);
    const request = this.stamp(entry.request);
    try {
      await this.forward(this.target, request);
      this.log.info(`forwarded ${request.requestId} to ${this.target} (wait ${waitMs.toFixed(0)}ms)`);
    } catch (err) {
      this.log.warn(`could not forward ${request.requestId} to ${this.target}: ${describeError(err)}`);
    }
  }
}
