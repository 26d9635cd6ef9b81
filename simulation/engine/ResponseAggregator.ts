import type { OutcomeReason, PipelineResponse, RequestOutcome } from '../types/pipeline.js';
import type { Clock } from '../utils/random.js';

export type AcceptResult = 'accepted' | 'duplicate' | 'unexpected_peer' | 'late' | 'unknown';

interface PendingRequestRecord {
  requestId: string;
  submittedAt: number;
  deadline: number;
  expectedPeers: string[];
  received: Map<string, PipelineResponse>;
  timer: ReturnType<typeof setTimeout>;
}

export interface AggregatorOptions {
  timeoutMs: number;
  now?: Clock;
}

type OutcomeListener = (outcome: RequestOutcome) => void;

/**
 * Client-side collection of second-tier responses. A request succeeds once every
 * expected peer has answered with success; it fails at its deadline, or as soon as
 * all peers have answered and any of them reported failure. Finalized records ignore
 * further responses.
 */
export class ResponseAggregator {
  private readonly pending = new Map<string, PendingRequestRecord>();

  private readonly finalized = new Map<string, RequestOutcome>();

  private readonly listeners: OutcomeListener[] = [];

  private settleWaiters: Array<() => void> = [];

  private readonly outcomeWaiters = new Map<string, Array<(outcome: RequestOutcome) => void>>();

  private readonly timeoutMs: number;

  private readonly now: Clock;

  constructor(options: AggregatorOptions) {
    this.timeoutMs = options.timeoutMs;
    this.now = options.now ?? Date.now;
  }

  register(requestId: string, expectedPeers: readonly string[]): void {
    if (this.pending.has(requestId) || this.finalized.has(requestId)) {
      throw new Error(`Request ${requestId} is already tracked`);
    }
    if (expectedPeers.length === 0) {
      throw new Error(`Request ${requestId} must expect at least one peer`);
    }
    const submittedAt = this.now();
    this.pending.set(requestId, {
      requestId,
      submittedAt,
      deadline: submittedAt + this.timeoutMs,
      expectedPeers: [...new Set(expectedPeers)],
      received: new Map(),
      timer: setTimeout(() => this.finalize(requestId, 'timeout'), this.timeoutMs),
    });
  }

  accept(response: PipelineResponse): AcceptResult {
    const record = this.pending.get(response.requestId);
    if (!record) {
      return this.finalized.has(response.requestId) ? 'late' : 'unknown';
    }
    if (!record.expectedPeers.includes(response.processedBy)) {
      return 'unexpected_peer';
    }
    if (record.received.has(response.processedBy)) {
      return 'duplicate';
    }

    record.received.set(response.processedBy, response);
    if (record.received.size === record.expectedPeers.length) {
      const allSucceeded = [...record.received.values()].every((received) => received.success);
      this.finalize(record.requestId, allSucceeded ? 'completed' : 'partial_failure');
    }
    return 'accepted';
  }

  // For requests that never entered the pipeline.
  fail(requestId: string, reason: Extract<OutcomeReason, 'undeliverable' | 'timeout'>): RequestOutcome | null {
    return this.finalize(requestId, reason);
  }

  // Deadline sweep; the per-record timers call finalize on their own, this catches anything overdue.
  expireDue(at: number = this.now()): RequestOutcome[] {
    const expired: RequestOutcome[] = [];
    for (const record of [...this.pending.values()]) {
      if (at >= record.deadline) {
        const outcome = this.finalize(record.requestId, 'timeout');
        if (outcome) expired.push(outcome);
      }
    }
    return expired;
  }

  onFinalized(listener: OutcomeListener): void {
    this.listeners.push(listener);
  }

  outcome(requestId: string): RequestOutcome | undefined {
    return this.finalized.get(requestId);
  }

  outcomes(): RequestOutcome[] {
    return [...this.finalized.values()];
  }

  isPending(requestId: string): boolean {
    return this.pending.has(requestId);
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  counts(): { pending: number; successful: number; failed: number } {
    let successful = 0;
    let failed = 0;
    for (const outcome of this.finalized.values()) {
      if (outcome.status === 'SUCCESS') successful += 1;
      else failed += 1;
    }
    return { pending: this.pending.size, successful, failed };
  }

  // Resolves with the outcome; undefined when the id was never registered.
  whenFinalized(requestId: string): Promise<RequestOutcome | undefined> {
    const finished = this.finalized.get(requestId);
    if (finished || !this.pending.has(requestId)) {
      return Promise.resolve(finished);
    }
    return new Promise<RequestOutcome>((resolve) => {
      const waiters = this.outcomeWaiters.get(requestId) ?? [];
      waiters.push(resolve);
      this.outcomeWaiters.set(requestId, waiters);
    });
  }

  whenSettled(): Promise<void> {
    if (this.pending.size === 0) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => this.settleWaiters.push(resolve));
  }

  // Shutdown: whatever is still open is reported as timed out.
  close(): void {
    for (const requestId of [...this.pending.keys()]) {
      this.finalize(requestId, 'timeout');
    }
  }

  private finalize(requestId: string, reason: OutcomeReason): RequestOutcome | null {
    const record = this.pending.get(requestId);
    if (!record) {
      return null;
    }
    clearTimeout(record.timer);
    this.pending.delete(requestId);

    const outcome: RequestOutcome = {
      requestId,
      status: reason === 'completed' ? 'SUCCESS' : 'FAILED',
      reason,
      submittedAt: record.submittedAt,
      finalizedAt: this.now(),
      expectedPeers: record.expectedPeers,
      responses: [...record.received.values()],
    };
    this.finalized.set(requestId, outcome);

    for (const listener of this.listeners) {
      listener(outcome);
    }
    const waiters = this.outcomeWaiters.get(requestId);
    if (waiters) {
      this.outcomeWaiters.delete(requestId);
      for (const resolve of waiters) resolve(outcome);
    }
    if (this.pending.size === 0) {
      const settled = this.settleWaiters;
      this.settleWaiters = [];
      for (const resolve of settled) resolve();
    }
    return outcome;
  }
}
