import type {
  AckMessage,
  NodeSnapshot,
  PipelineRequest,
  PipelineResponse,
  RequestOutcome,
  RequestType,
} from '../types/pipeline.js';
import { REQUEST_TYPES } from '../types/pipeline.js';
import { ENTRY_NODE_ID, priorityOf } from '../types/topology.js';
import { ResponseAggregator } from '../engine/ResponseAggregator.js';
import { TypeRouter, expectedPeersFor } from '../engine/TypeRouter.js';
import { createRequestId, describeError } from '../utils/random.js';
import { BaseNode, type NodeContext } from './BaseNode.js';

export interface WorkloadOptions {
  count: number;
  intervalMs: number;
  types?: readonly RequestType[];
}

export interface ClientSummary {
  clientId: string;
  total: number;
  successful: number;
  failed: number;
  successRate: number;
}

/**
 * Request originator. Submits into the entry node and collects the second-tier
 * responses on its own listener; each request is finalized by the aggregator.
 */
export class ClientNode extends BaseNode {
  private readonly aggregator: ResponseAggregator;

  private readonly router: TypeRouter;

  private sequence = 0;

  constructor(id: string, context: NodeContext, router: TypeRouter = new TypeRouter()) {
    super(id, 'client', context);
    this.router = router;
    this.aggregator = new ResponseAggregator({ timeoutMs: this.config.client.timeoutMs, now: this.now });
    this.aggregator.onFinalized((outcome) => {
      const line = `${outcome.requestId} ${outcome.status} (${outcome.reason}, ${outcome.responses.length}/${outcome.expectedPeers.length} responses)`;
      if (outcome.status === 'SUCCESS') {
        this.log.info(line);
      } else {
        this.log.warn(line);
      }
    });
  }

  protected onStopping(): void {
    this.aggregator.close();
  }

  /** Returns the request id; the outcome is available through `awaitOutcome`. */
  async submit(type: RequestType): Promise<string> {
    this.sequence += 1;
    const createdAt = this.now();
    const request: PipelineRequest = {
      requestId: createRequestId(this.id, this.sequence, createdAt),
      type,
      clientId: this.id,
      priority: priorityOf(type),
      createdAt,
      hops: [this.id],
    };

    // Registered before sending so an early response cannot race the record.
    this.aggregator.register(request.requestId, expectedPeersFor(type, this.config.dispatchMode, this.router));
    try {
      await this.send(ENTRY_NODE_ID, { kind: 'REQUEST', request });
      this.collector.recordForwarded();
      this.log.debug(`sent ${type} ${request.requestId}`);
    } catch (err) {
      this.collector.recordForwardFailure();
      this.log.error(`could not submit ${request.requestId}: ${describeError(err)}`);
      this.aggregator.fail(request.requestId, 'undeliverable');
    }
    return request.requestId;
  }

  async awaitOutcome(requestId: string): Promise<RequestOutcome> {
    const outcome = await this.aggregator.whenFinalized(requestId);
    if (!outcome) {
      throw new Error(`Unknown request ${requestId}`);
    }
    return outcome;
  }

  // Submits `count` requests, cycling through the types, then waits for every outcome.
  async runWorkload(options: WorkloadOptions): Promise<ClientSummary> {
    const types = options.types && options.types.length > 0 ? options.types : REQUEST_TYPES;
    const submitted: string[] = [];
    for (let i = 0; i < options.count && this.isRunning; i += 1) {
      const type = types[i % types.length] ?? 'z1';
      submitted.push(await this.submit(type));
      if (i < options.count - 1 && !(await this.pause(options.intervalMs))) {
        break;
      }
    }
    await Promise.all(submitted.map((requestId) => this.awaitOutcome(requestId)));
    return this.summarize(submitted);
  }

  outcomes(): RequestOutcome[] {
    return this.aggregator.outcomes();
  }

  summary(): ClientSummary {
    return this.summarize(this.aggregator.outcomes().map((outcome) => outcome.requestId));
  }

  protected handleResponse(response: PipelineResponse): AckMessage {
    if (response.clientId !== this.id) {
      this.log.warn(`response ${response.requestId} addressed to ${response.clientId}`);
      return this.ack(false, 'invalid');
    }
    this.collector.recordReceived();
    const result = this.aggregator.accept(response);
    if (result !== 'accepted') {
      this.log.debug(`ignored response ${response.requestId} from ${response.processedBy}: ${result}`);
    }
    return this.ack(true);
  }

  protected describe(): Partial<NodeSnapshot> {
    return { outcomes: this.aggregator.counts() };
  }

  private summarize(requestIds: readonly string[]): ClientSummary {
    let successful = 0;
    let failed = 0;
    for (const requestId of requestIds) {
      const outcome = this.aggregator.outcome(requestId);
      if (!outcome) continue;
      if (outcome.status === 'SUCCESS') successful += 1;
      else failed += 1;
    }
    const total = successful + failed;
    return {
      clientId: this.id,
      total,
      successful,
      failed,
      successRate: total === 0 ? 0 : successful / total,
    };
  }
}
