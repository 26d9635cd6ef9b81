import { setTimeout as sleep } from 'node:timers/promises';
import type {
  AckMessage,
  HeartbeatMessage,
  NodeAddress,
  NodeKind,
  NodeSnapshot,
  PipelineRequest,
  PipelineResponse,
  RejectReason,
  WireMessage,
} from '../types/pipeline.js';
import type { PipelineConfig } from '../types/config.js';
import { MetricsCollector } from '../engine/MetricsCollector.js';
import type { InstanceSpawner } from '../engine/ScalingController.js';
import type { AddressBook } from '../runtime/AddressBook.js';
import { NodeRuntime } from '../runtime/NodeRuntime.js';
import { sendMessage } from '../transport/connection.js';
import { createLogger, type Logger } from '../utils/log.js';
import { describeError, type Clock, type RandomSource } from '../utils/random.js';

export interface NodeContext {
  config: PipelineConfig;
  addressBook: AddressBook;
  spawner?: InstanceSpawner;
  random?: RandomSource;
  now?: Clock;
}

// Base node contract shared by every pipeline role.
// It owns the accept loop, kind-based dispatch, outbound sends, background timers and the
// single processing loop; concrete nodes only implement the handlers they care about.
export abstract class BaseNode {
  readonly id: string;

  readonly kind: NodeKind;

  protected readonly config: PipelineConfig;

  protected readonly addressBook: AddressBook;

  protected readonly collector = new MetricsCollector();

  protected readonly log: Logger;

  protected readonly now: Clock;

  protected readonly random: RandomSource;

  private readonly runtime: NodeRuntime;

  private readonly timers = new Set<ReturnType<typeof setInterval>>();

  private readonly abort = new AbortController();

  private readonly loops: Promise<void>[] = [];

  private workWaiters: Array<() => void> = [];

  private bound: NodeAddress | null = null;

  private startedAt = 0;

  private running = false;

  constructor(id: string, kind: NodeKind, context: NodeContext) {
    this.id = id;
    this.kind = kind;
    this.config = context.config;
    this.addressBook = context.addressBook;
    this.now = context.now ?? Date.now;
    this.random = context.random ?? Math.random;
    this.log = createLogger(id);
    this.runtime = new NodeRuntime(id, (message) => this.dispatch(message), this.config.transport, this.log);
  }

  get address(): NodeAddress {
    if (!this.bound) {
      throw new Error(`${this.id} has not been started`);
    }
    return this.bound;
  }

  get isRunning(): boolean {
    return this.running;
  }

  uptimeMs(): number {
    return this.running ? this.now() - this.startedAt : 0;
  }

  async start(address?: NodeAddress): Promise<NodeAddress> {
    if (this.running) {
      throw new Error(`${this.id} is already running`);
    }
    const target = address ?? { host: this.config.host, port: this.config.ports[this.id] ?? 0 };
    this.bound = await this.runtime.listen(target);
    this.addressBook.register(this.id, this.bound);
    this.running = true;
    this.startedAt = this.now();
    await this.onStart();
    this.log.info(`${this.kind} listening on ${this.bound.host}:${this.bound.port}`);
    return this.bound;
  }

  async stop(gracePeriodMs: number = this.config.shutdownGraceMs): Promise<void> {
    if (!this.running) {
      return;
    }
    this.running = false;
    for (const timer of this.timers) {
      clearInterval(timer);
    }
    this.timers.clear();
    await this.onStopping();
    this.wakeLoops();

    await this.runtime.stop(gracePeriodMs);

    if (this.loops.length > 0) {
      let graceTimer: ReturnType<typeof setTimeout> | undefined;
      const grace = new Promise<void>((resolve) => {
        graceTimer = setTimeout(resolve, gracePeriodMs);
      });
      await Promise.race([Promise.allSettled(this.loops), grace]);
      clearTimeout(graceTimer);
    }
    this.abort.abort();
    await Promise.allSettled(this.loops);
    this.log.info(`stopped\n${this.collector.describe(this.id)}`);
  }

  snapshot(): NodeSnapshot {
    return {
      nodeId: this.id,
      kind: this.kind,
      snapshotAt: this.now(),
      stats: this.collector.snapshot(),
      ...this.describe(),
    };
  }

  protected describe(): Partial<NodeSnapshot> {
    return {};
  }

  protected onStart(): void | Promise<void> {}

  protected onStopping(): void | Promise<void> {}

  protected handleRequest(_request: PipelineRequest): Promise<AckMessage> | AckMessage {
    return this.ack(false, 'unsupported');
  }

  protected handleResponse(_response: PipelineResponse): Promise<AckMessage> | AckMessage {
    return this.ack(false, 'unsupported');
  }

  protected handleHeartbeat(_heartbeat: HeartbeatMessage): Promise<AckMessage> | AckMessage {
    return this.ack(false, 'unsupported');
  }

  protected ack(accepted: boolean, reason?: RejectReason): AckMessage {
    return reason ? { kind: 'ACK', nodeId: this.id, accepted, reason } : { kind: 'ACK', nodeId: this.id, accepted };
  }

  protected stamp(request: PipelineRequest): PipelineRequest {
    return { ...request, hops: [...request.hops, this.id] };
  }

  protected send(targetId: string, message: WireMessage): Promise<AckMessage> {
    return sendMessage(targetId, this.addressBook.resolve(targetId), message, this.config.transport);
  }

  protected async forward(targetId: string, request: PipelineRequest): Promise<void> {
    try {
      await this.send(targetId, { kind: 'REQUEST', request });
      this.collector.recordForwarded();
      this.log.debug(`forwarded ${request.requestId} to ${targetId}`);
    } catch (err) {
      this.collector.recordForwardFailure();
      throw err;
    }
  }

  protected every(intervalMs: number, task: () => void | Promise<void>): void {
    const timer = setInterval(() => {
      Promise.resolve()
        .then(task)
        .catch((err: unknown) => this.log.error(`background task failed: ${describeError(err)}`));
    }, intervalMs);
    this.timers.add(timer);
  }

  /** Resolves false instead of waiting out the delay once shutdown has given up on the grace period. */
  protected async pause(ms: number): Promise<boolean> {
    try {
      await sleep(ms, undefined, { signal: this.abort.signal });
      return true;
    } catch (err) {
      if (this.abort.signal.aborted) {
        return false;
      }
      throw err;
    }
  }

  protected runQueue<T>(dequeue: () => T | null | undefined, process: (item: T) => Promise<void>): void {
    const loop = (async () => {
      while (this.running) {
        const item = dequeue();
        if (item === null || item === undefined) {
          await new Promise<void>((resolve) => this.workWaiters.push(resolve));
          continue;
        }
        try {
          await process(item);
        } catch (err) {
          this.log.error(`processing failed: ${describeError(err)}`);
        }
      }
    })();
    this.loops.push(loop);
  }

  protected notifyWork(): void {
    this.wakeLoops();
  }

  private wakeLoops(): void {
    const waiters = this.workWaiters;
    this.workWaiters = [];
    for (const wake of waiters) wake();
  }

  private async dispatch(message: WireMessage): Promise<WireMessage | null> {
    switch (message.kind) {
      case 'REQUEST':
        this.collector.recordReceived();
        return this.handleRequest(message.request);
      case 'RESPONSE':
        return this.handleResponse(message.response);
      case 'HEARTBEAT':
        return this.handleHeartbeat(message);
      case 'ACK':
        return this.ack(false, 'unsupported');
    }
  }
}
