import type { StatsSnapshot } from '../types/pipeline.js';

const QUEUE_SAMPLE_LIMIT = 1_000;

export class MetricsCollector {
  private received = 0;

  private processed = 0;

  private forwarded = 0;

  private forwardFailures = 0;

  private rejected = 0;

  private totalWaitMs = 0;

  private queueLengths: number[] = [];

  recordReceived(): void {
    this.received += 1;
  }

  recordProcessed(waitMs: number): void {
    this.processed += 1;
    this.totalWaitMs += Math.max(0, waitMs);
  }

  recordForwarded(): void {
    this.forwarded += 1;
  }

  recordForwardFailure(): void {
    this.forwardFailures += 1;
  }

  recordRejected(): void {
    this.rejected += 1;
  }

  recordQueueLength(length: number): void {
    this.queueLengths.push(length);
    if (this.queueLengths.length > QUEUE_SAMPLE_LIMIT) {
      this.queueLengths = this.queueLengths.slice(-QUEUE_SAMPLE_LIMIT);
    }
  }

  averageWaitMs(): number {
    return this.processed === 0 ? 0 : this.totalWaitMs / this.processed;
  }

  averageQueueLength(): number {
    if (this.queueLengths.length === 0) {
      return 0;
    }
    return this.queueLengths.reduce((sum, length) => sum + length, 0) / this.queueLengths.length;
  }

  snapshot(): StatsSnapshot {
    return {
      received: this.received,
      processed: this.processed,
      forwarded: this.forwarded,
      forwardFailures: this.forwardFailures,
      rejected: this.rejected,
      avgWaitMs: this.averageWaitMs(),
      avgQueueLength: this.averageQueueLength(),
    };
  }

  describe(nodeId: string): string {
    const stats = this.snapshot();
    return [
      `Statistics for ${nodeId}:`,
      `  Received: ${stats.received}`,
      `  Processed: ${stats.processed}`,
      `  Forwarded: ${stats.forwarded} (failed: ${stats.forwardFailures})`,
      `  Rejected: ${stats.rejected}`,
      `  Avg Wait Time: ${stats.avgWaitMs.toFixed(1)}ms`,
      `  Avg Queue Length: ${stats.avgQueueLength.toFixed(2)}`,
    ].join('\n');
  }
}
