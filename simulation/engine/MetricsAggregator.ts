import type { NodeSnapshot, SystemSnapshot } from '../types/pipeline.js';

// Folds per-node snapshots into one system view; the bottleneck is the node with the highest average wait.
export class MetricsAggregator {
  computeSnapshot(params: { snapshotAt: number; nodes: readonly NodeSnapshot[] }): SystemSnapshot {
    const { snapshotAt, nodes } = params;
    const byId: Record<string, NodeSnapshot> = {};
    let totalReceived = 0;
    let totalProcessed = 0;
    let totalRejected = 0;
    let worstWait = 0;
    let bottleneckNodeId: string | null = null;
    const outcomes = { pending: 0, successful: 0, failed: 0 };

    for (const node of nodes) {
      byId[node.nodeId] = node;
      totalReceived += node.stats.received;
      totalProcessed += node.stats.processed;
      totalRejected += node.stats.rejected;

      if (node.stats.avgWaitMs > worstWait) {
        worstWait = node.stats.avgWaitMs;
        bottleneckNodeId = node.nodeId;
      }
      if (node.outcomes) {
        outcomes.pending += node.outcomes.pending;
        outcomes.successful += node.outcomes.successful;
        outcomes.failed += node.outcomes.failed;
      }
    }

    const finished = outcomes.successful + outcomes.failed;
    return {
      snapshotAt,
      nodes: byId,
      totalReceived,
      totalProcessed,
      totalRejected,
      bottleneckNodeId,
      outcomes,
      successRate: finished === 0 ? 0 : outcomes.successful / finished,
    };
  }
}
